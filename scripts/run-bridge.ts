#!/usr/bin/env tsx

/**
 * Run one FusionSolar -> Domoticz cycle and exit.
 * Scheduling is left to cron or a systemd timer.
 *
 * Usage:
 *   npm run bridge
 *   npm run bridge -- --cookies /etc/fusionsolar/cookies.json
 *   npm run bridge -- --env-file .env.production
 */

import * as path from "path";
import * as dotenv from "dotenv";
import { Command } from "commander";
import { loadBridgeConfig } from "../config";
import { runBridgeCycle } from "../lib/bridge-runner";
import { DomoticzForwarder } from "../lib/domoticz-forwarder";
import { FusionSolarFetchClient } from "../lib/fusionsolar-fetch-client";
import { PushNotifier } from "../lib/push-notifier";
import { ConfigurationError } from "../lib/types/results";

interface CliOptions {
  cookies?: string;
  envFile: string;
}

async function main() {
  const program = new Command()
    .name("run-bridge")
    .description("Forward FusionSolar realtime power to Domoticz")
    .option("--cookies <path>", "cookie file exported from a FusionSolar browser session")
    .option("--env-file <path>", "dotenv file to load", ".env.local")
    .parse();

  const options = program.opts<CliOptions>();
  dotenv.config({ path: path.resolve(process.cwd(), options.envFile) });

  const config = loadBridgeConfig(process.env);
  if (options.cookies) {
    config.fusionSolar.cookiesFile = options.cookies;
  }

  const notifier = new PushNotifier(config.pushbullet);
  await runBridgeCycle({
    config,
    notifier,
    createTelemetrySource: () =>
      FusionSolarFetchClient.create(config.fusionSolar, notifier),
    sink: new DomoticzForwarder(config.domoticz),
  });
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error("❌ Unexpected error:", error);
  }
  process.exitCode = 1;
});
