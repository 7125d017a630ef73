import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { FetchError } from "node-fetch";
import { runBridgeCycle, type BridgeDependencies } from "../bridge-runner";
import { DomoticzForwarder } from "../domoticz-forwarder";
import { FusionSolarFetchClient } from "../fusionsolar-fetch-client";
import type { HttpFetch } from "../http";
import { ConfigurationError } from "../types/results";
import {
  RecordingNotifier,
  TEST_COOKIES,
  jsonResponse,
  payload,
  signal,
  testConfig,
  textResponse,
  writeCookieFile,
} from "./test-http-helper";

const PRIMARY_PAYLOAD = payload(
  [signal("Grid voltage", "231.0", "V"), signal("Active power", "1.5")],
  [signal("Active power consumption", "0.5"), signal("Active power to grid", "1.0")],
);

const SECONDARY_PAYLOAD = payload([signal("Active power", "612.8", "W")]);

describe("runBridgeCycle", () => {
  let fusionFetch: jest.Mock<HttpFetch>;
  let domoticzFetch: jest.Mock<HttpFetch>;
  let notifier: RecordingNotifier;

  function dependencies(cookiesFile = writeCookieFile(TEST_COOKIES)): BridgeDependencies {
    const config = testConfig(cookiesFile);
    return {
      config,
      notifier,
      createTelemetrySource: () =>
        FusionSolarFetchClient.create(config.fusionSolar, notifier, fusionFetch),
      sink: new DomoticzForwarder(config.domoticz, domoticzFetch),
    };
  }

  function domoticzIndexes(): string[] {
    return domoticzFetch.mock.calls.map(([url]) => new URL(url).searchParams.get("idx") ?? "");
  }

  beforeEach(() => {
    jest.restoreAllMocks();
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
    fusionFetch = jest.fn<HttpFetch>();
    domoticzFetch = jest.fn<HttpFetch>();
    notifier = new RecordingNotifier();
  });

  it("should forward both devices when everything succeeds", async () => {
    fusionFetch
      .mockResolvedValueOnce(jsonResponse(PRIMARY_PAYLOAD))
      .mockResolvedValueOnce(jsonResponse(SECONDARY_PAYLOAD));
    domoticzFetch
      .mockResolvedValueOnce(jsonResponse({ status: "OK" }))
      .mockResolvedValueOnce(jsonResponse({ status: "OK" }));

    const summary = await runBridgeCycle(dependencies());

    expect(summary).toEqual({
      primaryReading: { activePower: 1500, consumption: 500, gridPower: 1000 },
      primaryForwarded: true,
      secondaryValue: 612.8,
      secondaryForwarded: true,
      completed: true,
    });
    expect(domoticzFetch.mock.calls.map(([url]) => url)).toEqual([
      "http://192.168.1.10:8080/json.htm?param=udevice&type=command&idx=77&nvalue=0&svalue=1500",
      "http://192.168.1.10:8080/json.htm?param=udevice&type=command&idx=78&nvalue=0&svalue=612",
    ]);
    expect(notifier.alerts).toHaveLength(0);
  });

  it("should fetch the primary device before the secondary one", async () => {
    fusionFetch
      .mockResolvedValueOnce(jsonResponse(PRIMARY_PAYLOAD))
      .mockResolvedValueOnce(jsonResponse(SECONDARY_PAYLOAD));
    domoticzFetch.mockImplementation(async () => jsonResponse({ status: "OK" }));

    await runBridgeCycle(dependencies());

    const devices = fusionFetch.mock.calls.map(([url]) => new URL(url).searchParams.get("deviceDn"));
    expect(devices).toEqual(["NE=1001", "NE=2002"]);
  });

  it("should complete when primary forwarding fails and the secondary fetch cannot connect", async () => {
    fusionFetch
      .mockResolvedValueOnce(jsonResponse(PRIMARY_PAYLOAD))
      .mockRejectedValueOnce(new FetchError("connect ECONNREFUSED 10.0.0.1:443", "system"));
    domoticzFetch.mockResolvedValueOnce(textResponse("Internal Server Error", 500));

    const summary = await runBridgeCycle(dependencies());

    expect(summary.completed).toBe(true);
    expect(summary.primaryForwarded).toBe(false);
    expect(summary.secondaryValue).toBeNull();
    expect(domoticzIndexes()).toEqual(["77"]);

    expect(console.error).toHaveBeenCalledWith(
      "[Bridge] Active power could not be forwarded to idx 77",
    );
    expect(console.error).toHaveBeenCalledWith(
      "[Bridge] Secondary device NE=2002 failed: Connection error: connect ECONNREFUSED 10.0.0.1:443",
    );

    const titles = notifier.alerts.map((alert) => alert.title);
    expect(titles).toContain("FusionSolar bridge: Secondary device reading failed.");
    expect(titles.some((title) => title.includes("Domoticz") || title.includes("forward"))).toBe(false);
    expect(notifier.alerts[notifier.alerts.length - 1]).toEqual({
      title: "FusionSolar bridge: Secondary device reading failed.",
      body: "Secondary device NE=2002: Connection error: connect ECONNREFUSED 10.0.0.1:443",
    });
    expect(console.log).toHaveBeenCalledWith("[Bridge] Cycle completed successfully");
  });

  it("should alert about the secondary device when its signal is missing", async () => {
    fusionFetch
      .mockResolvedValueOnce(jsonResponse(PRIMARY_PAYLOAD))
      .mockResolvedValueOnce(jsonResponse(payload([signal("Reactive power", "3", "var")])));
    domoticzFetch.mockResolvedValueOnce(jsonResponse({ status: "OK" }));

    const summary = await runBridgeCycle(dependencies());

    expect(summary.completed).toBe(true);
    expect(domoticzIndexes()).toEqual(["77"]);
    expect(notifier.alerts).toEqual([
      {
        title: "FusionSolar bridge: Secondary device reading failed.",
        body: 'Secondary device NE=2002: signal "Active power" missing or not numeric',
      },
    ]);
  });

  it("should not alert when only secondary forwarding fails", async () => {
    fusionFetch
      .mockResolvedValueOnce(jsonResponse(PRIMARY_PAYLOAD))
      .mockResolvedValueOnce(jsonResponse(SECONDARY_PAYLOAD));
    domoticzFetch
      .mockResolvedValueOnce(jsonResponse({ status: "OK" }))
      .mockRejectedValueOnce(new FetchError("network timeout", "request-timeout"));

    const summary = await runBridgeCycle(dependencies());

    expect(summary.secondaryForwarded).toBe(false);
    expect(summary.completed).toBe(true);
    expect(notifier.alerts).toHaveLength(0);
  });

  it("should stop after a failed primary fetch", async () => {
    fusionFetch.mockResolvedValueOnce(textResponse("Bad Gateway", 502, "Bad Gateway"));

    const summary = await runBridgeCycle(dependencies());

    expect(summary.completed).toBe(false);
    expect(fusionFetch).toHaveBeenCalledTimes(1);
    expect(domoticzFetch).not.toHaveBeenCalled();
    // Only the client's own alert
    expect(notifier.alerts).toEqual([
      {
        title: "FusionSolar bridge: Invalid response from FusionSolar.",
        body: "Device NE=1001: HTTP 502: Bad Gateway",
      },
    ]);
  });

  it("should stop when the primary payload has no power signals", async () => {
    fusionFetch.mockResolvedValueOnce(jsonResponse(payload([signal("Grid voltage", "230", "V")])));

    const summary = await runBridgeCycle(dependencies());

    expect(summary).toEqual({
      primaryReading: null,
      primaryForwarded: false,
      secondaryValue: null,
      secondaryForwarded: false,
      completed: false,
    });
    expect(fusionFetch).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(
      "[Bridge] No power signals found in primary device data.",
    );
  });

  it("should reject with ConfigurationError when the cookie file is invalid", async () => {
    const cookiesFile = writeCookieFile([{ value: "no-name", domain: "fusionsolar.huawei.com" }]);

    await expect(runBridgeCycle(dependencies(cookiesFile))).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(fusionFetch).not.toHaveBeenCalled();
    expect(notifier.alerts).toHaveLength(1);
  });
});
