import { DOMOTICZ_API, type DomoticzConfig } from "@/config";
import { nodeFetch, type HttpFetch } from "@/lib/http";
import { errorMessage } from "@/lib/types/results";

/**
 * Writes readings into Domoticz virtual devices through /json.htm?param=udevice
 */
export class DomoticzForwarder {
  private readonly config: DomoticzConfig;
  private readonly fetchFn: HttpFetch;

  constructor(config: DomoticzConfig, fetchFn: HttpFetch = nodeFetch) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  buildUpdateUrl(targetIndex: number, value: number): string {
    const params = new URLSearchParams({
      param: "udevice",
      type: "command",
      idx: String(targetIndex),
      nvalue: "0",
      // Sub-watt precision is dropped
      svalue: String(Math.trunc(value)),
    });
    return `http://${this.config.host}:${this.config.port}${DOMOTICZ_API.endpoint}?${params}`;
  }

  private authorizationHeader(): string {
    const credentials = Buffer.from(
      `${this.config.username}:${this.config.password}`,
    ).toString("base64");
    return `Basic ${credentials}`;
  }

  /**
   * Send one reading to the device at targetIndex.
   *
   * @returns true only when Domoticz answered 200 and did not report an error
   */
  async sendReading(
    targetIndex: number,
    value: number,
    label: string,
  ): Promise<boolean> {
    try {
      const response = await this.fetchFn(this.buildUpdateUrl(targetIndex, value), {
        headers: {
          Authorization: this.authorizationHeader(),
          Accept: "application/json",
        },
        timeout: this.config.timeoutMs,
      });

      if (response.status !== 200) {
        console.error(
          `[Domoticz] Failed to send ${label} to idx ${targetIndex}: HTTP ${response.status}`,
        );
        return false;
      }

      const status = readStatus(await response.text());
      if (status !== undefined && status !== "OK") {
        console.error(
          `[Domoticz] ${label} rejected by idx ${targetIndex}: status ${status}`,
        );
        return false;
      }

      console.log(`[Domoticz] Sent ${label} = ${Math.trunc(value)} to idx ${targetIndex}`);
      return true;
    } catch (error) {
      console.error(
        `[Domoticz] Error sending ${label} to idx ${targetIndex}:`,
        errorMessage(error),
      );
      return false;
    }
  }
}

// Domoticz replies {"status": "OK" | "ERR", ...}; other bodies are not judged
function readStatus(body: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  if (typeof json === "object" && json !== null && "status" in json) {
    return typeof json.status === "string" ? json.status : undefined;
  }
  return undefined;
}
