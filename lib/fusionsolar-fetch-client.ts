import {
  ERROR_MESSAGES,
  FUSIONSOLAR_API,
  type FusionSolarConfig,
} from "@/config";
import { CookieSession } from "@/lib/cookie-session";
import { isTransportError, nodeFetch, type HttpFetch } from "@/lib/http";
import type { Notifier } from "@/lib/push-notifier";
import {
  TelemetryPayloadSchema,
  type TelemetryPayload,
} from "@/lib/types/fusionsolar";
import {
  ConfigurationError,
  describeFetchFailure,
  errorMessage,
  type FetchFailure,
  type Result,
} from "@/lib/types/results";

/**
 * FusionSolar client using node-fetch with manual cookie handling.
 *
 * There is no login flow: the session cookies are exported from a browser
 * and loaded once. Requests carry no timeout and are never retried.
 */
export class FusionSolarFetchClient {
  private readonly config: FusionSolarConfig;
  private readonly session: CookieSession;
  private readonly notifier: Notifier;
  private readonly fetchFn: HttpFetch;

  constructor(
    config: FusionSolarConfig,
    session: CookieSession,
    notifier: Notifier,
    fetchFn: HttpFetch = nodeFetch,
  ) {
    this.config = config;
    this.session = session;
    this.notifier = notifier;
    this.fetchFn = fetchFn;
  }

  /**
   * Load the cookie file and build a client.
   * Alerts the operator once before rejecting, since nothing can run without cookies.
   *
   * @throws ConfigurationError when the cookie file cannot be loaded
   */
  static async create(
    config: FusionSolarConfig,
    notifier: Notifier,
    fetchFn: HttpFetch = nodeFetch,
  ): Promise<FusionSolarFetchClient> {
    try {
      const session = await CookieSession.fromFile(config.cookiesFile);
      console.log(
        `[FusionSolar] Loaded ${session.size} cookies from ${config.cookiesFile}`,
      );
      return new FusionSolarFetchClient(config, session, notifier, fetchFn);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[FusionSolar] ${ERROR_MESSAGES.COOKIES_UNREADABLE} ${message}`);
      await FusionSolarFetchClient.alert(notifier, ERROR_MESSAGES.COOKIES_UNREADABLE, message);
      if (error instanceof ConfigurationError) throw error;
      throw new ConfigurationError(message, { cause: error });
    }
  }

  private static async alert(
    notifier: Notifier,
    title: string,
    body: string,
  ): Promise<void> {
    await notifier.notify(`FusionSolar bridge: ${title}`, body);
  }

  /**
   * Build the realtime-data URL for a device.
   * The trailing `_` parameter is a cache-buster.
   */
  buildRealtimeDataUrl(deviceId: string, now: number = Date.now()): string {
    const params = new URLSearchParams({
      deviceDn: deviceId,
      displayAccessModel: "true",
      _: String(now),
    });
    return `${this.config.baseUrl}${FUSIONSOLAR_API.realtimeDataEndpoint}?${params}`;
  }

  /**
   * Fetch realtime signals for one device.
   * Failures are reported to the operator and returned, never thrown.
   */
  public async fetchRealtimeData(
    deviceId: string,
  ): Promise<Result<TelemetryPayload, FetchFailure>> {
    const result = await this.requestRealtimeData(deviceId);

    if (!result.success) {
      const description = describeFetchFailure(result.error);
      console.error(`[FusionSolar] Fetch failed for ${deviceId}: ${description}`);
      await FusionSolarFetchClient.alert(
        this.notifier,
        titleFor(result.error),
        `Device ${deviceId}: ${description}`,
      );
    }

    return result;
  }

  private async requestRealtimeData(
    deviceId: string,
  ): Promise<Result<TelemetryPayload, FetchFailure>> {
    try {
      const url = this.buildRealtimeDataUrl(deviceId);
      console.log(`[FusionSolar] Fetching realtime data for ${deviceId}`);

      const headers: Record<string, string> = {
        Accept: "application/json",
        "User-Agent": FUSIONSOLAR_API.userAgent,
      };
      const cookie = this.session.getCookieString(url);
      if (cookie) headers.Cookie = cookie;

      const response = await this.fetchFn(url, { headers });
      console.log(`[FusionSolar] Response status: ${response.status}`);

      if (response.status !== 200) {
        return {
          success: false,
          error: {
            kind: "http",
            statusCode: response.status,
            statusText: response.statusText,
          },
        };
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        // A dropped connection while reading the body is still a transport failure
        if (isTransportError(error)) throw error;
        return { success: false, error: { kind: "parse", message: errorMessage(error) } };
      }

      const parsed = TelemetryPayloadSchema.safeParse(body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return {
          success: false,
          error: {
            kind: "parse",
            message: issue
              ? `${issue.path.join(".") || "(root)"}: ${issue.message}`
              : parsed.error.message,
          },
        };
      }

      const payload = parsed.data;
      if (!payload.success) {
        console.warn(
          `[FusionSolar] Payload for ${deviceId} reports success=false (failCode ${payload.failCode})`,
        );
      }
      logDataAge(deviceId, payload);

      return { success: true, data: payload };
    } catch (error) {
      if (isTransportError(error)) {
        return { success: false, error: { kind: "connection", message: errorMessage(error) } };
      }
      return { success: false, error: { kind: "unexpected", message: errorMessage(error) } };
    }
  }
}

function titleFor(failure: FetchFailure): string {
  switch (failure.kind) {
    case "connection":
      return ERROR_MESSAGES.NETWORK_ERROR;
    case "http":
    case "parse":
      return ERROR_MESSAGES.INVALID_RESPONSE;
    case "unexpected":
      return ERROR_MESSAGES.UNEXPECTED_ERROR;
  }
}

// Log the freshest signal timestamp vs current time
function logDataAge(deviceId: string, payload: TelemetryPayload): void {
  let latest = 0;
  for (const group of payload.data) {
    for (const signal of group.signals ?? []) {
      if (signal.latestTime > latest) latest = signal.latestTime;
    }
  }
  if (latest === 0) {
    console.log(`[FusionSolar] Data received for ${deviceId}`);
    return;
  }

  const dataTime = new Date(latest);
  const delaySeconds = Math.floor((Date.now() - latest) / 1000);
  console.log(
    `[FusionSolar] Data received for ${deviceId}, timestamp ${dataTime.toISOString()} (${delaySeconds}s old)`,
  );
}
