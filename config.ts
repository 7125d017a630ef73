// Configuration for the FusionSolar -> Domoticz bridge

import { ConfigurationError } from "@/lib/types/results";

// FusionSolar API Configuration
export const FUSIONSOLAR_API = {
  realtimeDataEndpoint: "/rest/pvms/web/device/v1/device-realtime-data",
  defaultCookiesFile: "cookies.json",
  defaultSecondarySignal: "Active power",
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
} as const;

// Domoticz API Configuration
export const DOMOTICZ_API = {
  endpoint: "/json.htm",
  defaultPort: 8080,
  defaultPrimaryIdx: 77,
  defaultSecondaryIdx: 78,
  timeout: 10000, // 10 seconds
} as const;

// Pushbullet API Configuration
export const PUSHBULLET_API = {
  baseUrl: "https://api.pushbullet.com",
  pushesEndpoint: "/v2/pushes",
} as const;

// Error Messages
export const ERROR_MESSAGES = {
  COOKIES_UNREADABLE: "Unable to load FusionSolar cookies.",
  NETWORK_ERROR: "Network error while contacting FusionSolar.",
  INVALID_RESPONSE: "Invalid response from FusionSolar.",
  UNEXPECTED_ERROR: "Unexpected error while fetching FusionSolar data.",
  NO_POWER_SIGNALS: "No power signals found in primary device data.",
  SECONDARY_FAILED: "Secondary device reading failed.",
} as const;

export interface FusionSolarConfig {
  baseUrl: string;
  cookiesFile: string;
  primaryDevice: string;
  secondaryDevice: string;
  secondarySignal: string;
}

export interface DomoticzConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  primaryIdx: number;
  secondaryIdx: number;
  timeoutMs: number;
}

export interface PushbulletConfig {
  baseUrl: string;
  token?: string;
}

export interface BridgeConfig {
  fusionSolar: FusionSolarConfig;
  domoticz: DomoticzConfig;
  pushbullet: PushbulletConfig;
}

type Env = Record<string, string | undefined>;

/**
 * Build the bridge configuration from environment variables.
 *
 * All missing required variables are reported together.
 *
 * @throws ConfigurationError when a required variable is missing or a number is invalid
 */
export function loadBridgeConfig(env: Env = process.env): BridgeConfig {
  const missing: string[] = [];
  const invalid: string[] = [];

  const required = (key: string): string => {
    const value = env[key]?.trim();
    if (!value) {
      missing.push(key);
      return "";
    }
    return value;
  };

  const positiveInt = (key: string, fallback: number): number => {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      invalid.push(`${key}=${raw}`);
      return fallback;
    }
    return parsed;
  };

  const config: BridgeConfig = {
    fusionSolar: {
      baseUrl: required("FUSIONSOLAR_BASE_URL").replace(/\/+$/, ""),
      cookiesFile:
        env.FUSIONSOLAR_COOKIES_FILE?.trim() ||
        FUSIONSOLAR_API.defaultCookiesFile,
      primaryDevice: required("FUSIONSOLAR_PRIMARY_DEVICE"),
      secondaryDevice: required("FUSIONSOLAR_SECONDARY_DEVICE"),
      secondarySignal:
        env.FUSIONSOLAR_SECONDARY_SIGNAL?.trim() ||
        FUSIONSOLAR_API.defaultSecondarySignal,
    },
    domoticz: {
      host: required("DOMOTICZ_HOST"),
      port: positiveInt("DOMOTICZ_PORT", DOMOTICZ_API.defaultPort),
      username: required("DOMOTICZ_USERNAME"),
      password: required("DOMOTICZ_PASSWORD"),
      primaryIdx: positiveInt(
        "DOMOTICZ_PRIMARY_IDX",
        DOMOTICZ_API.defaultPrimaryIdx,
      ),
      secondaryIdx: positiveInt(
        "DOMOTICZ_SECONDARY_IDX",
        DOMOTICZ_API.defaultSecondaryIdx,
      ),
      timeoutMs: positiveInt("DOMOTICZ_TIMEOUT_MS", DOMOTICZ_API.timeout),
    },
    pushbullet: {
      baseUrl: PUSHBULLET_API.baseUrl,
      token: env.PUSHBULLET_TOKEN?.trim() || undefined,
    },
  };

  if (missing.length > 0 || invalid.length > 0) {
    const problems: string[] = [];
    if (missing.length > 0) problems.push(`Missing ${missing.join(", ")}`);
    if (invalid.length > 0) problems.push(`Invalid ${invalid.join(", ")}`);
    console.error("[Config] Bridge configuration incomplete:", problems.join("; "));
    throw new ConfigurationError(
      `Bridge configuration incomplete: ${problems.join("; ")}`,
    );
  }

  return config;
}
