import { ERROR_MESSAGES, type BridgeConfig } from "@/config";
import type { Notifier } from "@/lib/push-notifier";
import {
  extractPowerReading,
  extractSingleSignal,
  logAllSignals,
} from "@/lib/signal-extractor";
import type { PowerReading, TelemetryPayload } from "@/lib/types/fusionsolar";
import {
  describeFetchFailure,
  type FetchFailure,
  type Result,
} from "@/lib/types/results";

export interface TelemetrySource {
  fetchRealtimeData(
    deviceId: string,
  ): Promise<Result<TelemetryPayload, FetchFailure>>;
}

export interface ReadingSink {
  sendReading(targetIndex: number, value: number, label: string): Promise<boolean>;
}

export interface BridgeDependencies {
  config: BridgeConfig;
  notifier: Notifier;
  /** May reject with ConfigurationError, which aborts the run */
  createTelemetrySource: () => Promise<TelemetrySource>;
  sink: ReadingSink;
}

/**
 * What one cycle achieved. Informational: a cycle that ran to the end
 * counts as completed even when forwarding failed.
 */
export interface BridgeCycleSummary {
  primaryReading: PowerReading | null;
  primaryForwarded: boolean;
  secondaryValue: number | null;
  secondaryForwarded: boolean;
  completed: boolean;
}

/**
 * Run one fetch/extract/forward cycle for both devices, strictly in sequence
 */
export async function runBridgeCycle(
  deps: BridgeDependencies,
): Promise<BridgeCycleSummary> {
  const { config, notifier, sink } = deps;
  const { primaryDevice, secondaryDevice, secondarySignal } = config.fusionSolar;
  const { primaryIdx, secondaryIdx } = config.domoticz;

  const summary: BridgeCycleSummary = {
    primaryReading: null,
    primaryForwarded: false,
    secondaryValue: null,
    secondaryForwarded: false,
    completed: false,
  };

  console.log("[Bridge] Starting cycle");
  const source = await deps.createTelemetrySource();

  // Primary device: three power figures, one forwarded
  const primary = await source.fetchRealtimeData(primaryDevice);
  if (!primary.success) {
    console.error(
      `[Bridge] Primary device ${primaryDevice} fetch failed: ${describeFetchFailure(primary.error)}`,
    );
    return summary;
  }

  logAllSignals(primary.data);

  const reading = extractPowerReading(primary.data);
  if (!reading) {
    console.error(`[Bridge] ${ERROR_MESSAGES.NO_POWER_SIGNALS}`);
    return summary;
  }
  summary.primaryReading = reading;

  summary.primaryForwarded = await sink.sendReading(
    primaryIdx,
    reading.activePower,
    "Active power",
  );
  if (summary.primaryForwarded) {
    console.log(`[Bridge] Active power forwarded to idx ${primaryIdx}`);
  } else {
    console.error(`[Bridge] Active power could not be forwarded to idx ${primaryIdx}`);
  }

  // Secondary device: one signal already in watts
  const secondary = await source.fetchRealtimeData(secondaryDevice);
  const secondaryValue = secondary.success
    ? extractSingleSignal(secondary.data, secondarySignal)
    : null;

  if (secondaryValue !== null) {
    summary.secondaryValue = secondaryValue;
    summary.secondaryForwarded = await sink.sendReading(
      secondaryIdx,
      secondaryValue,
      `Secondary ${secondarySignal}`,
    );
    if (summary.secondaryForwarded) {
      console.log(`[Bridge] Secondary ${secondarySignal} forwarded to idx ${secondaryIdx}`);
    } else {
      console.error(
        `[Bridge] Secondary ${secondarySignal} could not be forwarded to idx ${secondaryIdx}`,
      );
    }
  } else {
    const reason = secondary.success
      ? `signal "${secondarySignal}" missing or not numeric`
      : describeFetchFailure(secondary.error);
    console.error(`[Bridge] Secondary device ${secondaryDevice} failed: ${reason}`);
    await notifier.notify(
      `FusionSolar bridge: ${ERROR_MESSAGES.SECONDARY_FAILED}`,
      `Secondary device ${secondaryDevice}: ${reason}`,
    );
  }

  summary.completed = true;
  console.log("[Bridge] Cycle completed successfully");
  return summary;
}
