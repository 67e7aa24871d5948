import { describe, expect, it } from "vitest";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      nodeEnv: "development",
      logLevel: "info",
      platform: { apiUrl: "https://api.machines.dev/v1", token: "" },
      lease: { ttlSeconds: 30, holder: "machine-fleet-control" },
      timeouts: {
        updateWaitMs: 300_000,
        ephemeralStartMs: 15_000,
        teardownMs: 5_000,
        cleanupMs: 5_000,
        healthCheckMs: 60_000,
        execMs: 60_000,
      },
      pollIntervalMs: 1_000,
      ephemeral: { guestPreset: "shared-cpu-1x" },
    });
  });

  it("reads and coerces environment variables", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      LOG_LEVEL: "debug",
      FLEET_API_URL: "http://127.0.0.1:4280/v1",
      FLEET_API_TOKEN: "test-token",
      FLEET_LEASE_TTL_SECONDS: "120",
      FLEET_LEASE_HOLDER: "deploy-bot",
      FLEET_UPDATE_WAIT_TIMEOUT_MS: "60000",
      FLEET_EPHEMERAL_START_TIMEOUT_MS: "30000",
      FLEET_POLL_INTERVAL_MS: "250",
      FLEET_EPHEMERAL_GUEST: "performance-1x",
    });

    expect(config.nodeEnv).toBe("production");
    expect(config.logLevel).toBe("debug");
    expect(config.platform).toEqual({ apiUrl: "http://127.0.0.1:4280/v1", token: "test-token" });
    expect(config.lease).toEqual({ ttlSeconds: 120, holder: "deploy-bot" });
    expect(config.timeouts.updateWaitMs).toBe(60_000);
    expect(config.timeouts.ephemeralStartMs).toBe(30_000);
    expect(config.timeouts.teardownMs).toBe(5_000);
    expect(config.pollIntervalMs).toBe(250);
    expect(config.ephemeral.guestPreset).toBe("performance-1x");
  });

  it("rejects a lease TTL outside 1..3600 seconds", () => {
    expect(() => loadConfig({ FLEET_LEASE_TTL_SECONDS: "0" })).toThrow();
    expect(() => loadConfig({ FLEET_LEASE_TTL_SECONDS: "3601" })).toThrow();
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadConfig({ FLEET_TEARDOWN_TIMEOUT_MS: "soon" })).toThrow();
  });

  it("rejects an invalid API URL", () => {
    expect(() => loadConfig({ FLEET_API_URL: "not a url" })).toThrow();
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
