import { PUSHBULLET_API, type PushbulletConfig } from "@/config";
import { errorMessage } from "@/lib/types/results";
import { nodeFetch, type HttpFetch } from "@/lib/http";

/**
 * Operator alert sink used by every other component
 */
export interface Notifier {
  /** Resolves once the alert was attempted; never rejects */
  notify(title: string, body: string): Promise<void>;
}

/**
 * Sends alerts as Pushbullet notes
 */
export class PushNotifier implements Notifier {
  private readonly config: PushbulletConfig;
  private readonly fetchFn: HttpFetch;

  constructor(config: PushbulletConfig, fetchFn: HttpFetch = nodeFetch) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  async notify(title: string, body: string): Promise<void> {
    if (!this.config.token) {
      console.warn(`[Notify] No push token configured, alert not sent: ${title} - ${body}`);
      return;
    }

    try {
      const response = await this.fetchFn(
        `${this.config.baseUrl}${PUSHBULLET_API.pushesEndpoint}`,
        {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.config.token}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify({ type: "note", title, body }),
        },
      );

      if (response.status !== 200) {
        console.error(
          `[Notify] Push failed with HTTP ${response.status}: ${response.statusText}`,
        );
        return;
      }

      console.log(`[Notify] Alert sent: ${title}`);
    } catch (error) {
      console.error("[Notify] Error sending alert:", errorMessage(error));
    }
  }
}
