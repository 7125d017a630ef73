import type {
  PowerReading,
  TelemetryPayload,
} from "@/lib/types/fusionsolar";
import { errorMessage } from "@/lib/types/results";

/**
 * Primary device signal labels and the reading field each one fills.
 * Values are reported in kW.
 */
export const POWER_SIGNAL_SLOTS: Readonly<Record<string, keyof PowerReading>> = {
  "Active power": "activePower",
  "Active power consumption": "consumption",
  "Active power to grid": "gridPower",
};

const KW_TO_W = 1000;

// Plain decimal, optional exponent; no units, hex or Infinity
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Whole-string decimal parse; null for anything that is not exactly a number
 */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

function parseSignalValue(name: string, realValue: string): number {
  const value = parseDecimal(realValue);
  if (value === null) {
    throw new Error(`Signal "${name}" has non-numeric value "${realValue}"`);
  }
  return value;
}

/**
 * Extract the primary device power figures in watts.
 *
 * When a label repeats, the last occurrence wins. Returns null when none of
 * the labels is present, or when any matched value is not numeric (no
 * partial readings).
 */
export function extractPowerReading(
  payload: TelemetryPayload,
): PowerReading | null {
  try {
    const reading: PowerReading = {
      activePower: 0,
      consumption: 0,
      gridPower: 0,
    };
    let foundAny = false;

    for (const group of payload.data) {
      for (const signal of group.signals ?? []) {
        if (!Object.hasOwn(POWER_SIGNAL_SLOTS, signal.name)) continue;
        const slot = POWER_SIGNAL_SLOTS[signal.name];
        reading[slot] = parseSignalValue(signal.name, signal.realValue) * KW_TO_W;
        foundAny = true;
      }
    }

    if (!foundAny) {
      console.error("[Signals] No power signals found in payload");
      return null;
    }

    console.log(
      `[Signals] Active power ${reading.activePower} W, consumption ${reading.consumption} W, to grid ${reading.gridPower} W`,
    );
    return reading;
  } catch (error) {
    console.error("[Signals] Error extracting power reading:", errorMessage(error));
    return null;
  }
}

/**
 * Value of the first signal with the given label, as reported (no unit conversion)
 */
export function extractSingleSignal(
  payload: TelemetryPayload,
  label: string,
): number | null {
  for (const group of payload.data) {
    for (const signal of group.signals ?? []) {
      if (signal.name !== label) continue;
      const value = parseDecimal(signal.realValue);
      if (value === null) {
        console.error(
          `[Signals] Signal "${label}" has non-numeric value "${signal.realValue}"`,
        );
        return null;
      }
      return value;
    }
  }

  console.error(`[Signals] Signal "${label}" not found in payload`);
  return null;
}

/**
 * Dump every signal for operator visibility
 */
export function logAllSignals(payload: TelemetryPayload): void {
  try {
    payload.data.forEach((group, index) => {
      const signals = group.signals ?? [];
      console.log(`[Signals] Group ${index + 1}: ${signals.length} signals`);
      for (const signal of signals) {
        const unit = signal.unit ? ` ${signal.unit}` : "";
        console.log(`[Signals]   ${signal.name}: ${signal.realValue}${unit}`);
      }
    });
  } catch (error) {
    console.error("[Signals] Error listing signals:", errorMessage(error));
  }
}
