import { readFile } from "fs/promises";
import { CookieFileSchema, type CookieRecord } from "@/lib/types/fusionsolar";
import { ConfigurationError, errorMessage } from "@/lib/types/results";

/**
 * Read-only cookie jar built from an exported cookie file.
 * Cookies are sent by hand in the Cookie header, node-fetch keeps no jar.
 */
export class CookieSession {
  private readonly cookies: readonly CookieRecord[];

  constructor(cookies: readonly CookieRecord[]) {
    this.cookies = cookies;
  }

  /**
   * Load cookies from a JSON array of {name, value, domain, path?, secure?, httpOnly?}
   *
   * @throws ConfigurationError when the file is missing, not JSON, or a record lacks a required field
   */
  static async fromFile(filePath: string): Promise<CookieSession> {
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read cookie file ${filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(
        `Cookie file ${filePath} is not valid JSON: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    const parsed = CookieFileSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid";
      throw new ConfigurationError(
        `Cookie file ${filePath} has an invalid record (${where})`,
        { cause: parsed.error },
      );
    }

    return new CookieSession(parsed.data);
  }

  get size(): number {
    return this.cookies.length;
  }

  /**
   * Cookies that apply to a URL, in file order
   */
  cookiesFor(url: string): CookieRecord[] {
    const { hostname, pathname, protocol } = new URL(url);
    const host = hostname.toLowerCase();

    return this.cookies.filter((cookie) => {
      if (cookie.secure && protocol !== "https:") return false;

      const domain = cookie.domain.toLowerCase().replace(/^\./, "");
      if (host !== domain && !host.endsWith(`.${domain}`)) return false;

      const path = cookie.path || "/";
      return pathname === path || pathname.startsWith(path.endsWith("/") ? path : `${path}/`);
    });
  }

  /**
   * Cookie header value for a URL, or undefined when nothing applies
   */
  getCookieString(url: string): string | undefined {
    const applicable = this.cookiesFor(url);
    if (applicable.length === 0) return undefined;
    return applicable.map((cookie) => `${cookie.name}=${cookie.value}`).join("; ");
  }
}
