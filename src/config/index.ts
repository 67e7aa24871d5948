import { z } from "zod";

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Machines API endpoint and credentials. */
  platform: z
    .object({
      apiUrl: z.string().url().default("https://api.machines.dev/v1"),
      token: z.string().default(""),
    })
    .default({
      apiUrl: "https://api.machines.dev/v1",
      token: "",
    }),

  /** Lease parameters sent with every acquisition. */
  lease: z
    .object({
      ttlSeconds: z.coerce.number().int().min(1).max(3600).default(30),
      holder: z.string().min(1).default("machine-fleet-control"),
    })
    .default({
      ttlSeconds: 30,
      holder: "machine-fleet-control",
    }),

  /** Deadlines for waits and cleanup, in milliseconds. */
  timeouts: z
    .object({
      updateWaitMs: z.coerce.number().int().positive().default(300_000),
      ephemeralStartMs: z.coerce.number().int().positive().default(15_000),
      teardownMs: z.coerce.number().int().positive().default(5_000),
      cleanupMs: z.coerce.number().int().positive().default(5_000),
      healthCheckMs: z.coerce.number().int().positive().default(60_000),
      execMs: z.coerce.number().int().positive().default(60_000),
    })
    .default({
      updateWaitMs: 300_000,
      ephemeralStartMs: 15_000,
      teardownMs: 5_000,
      cleanupMs: 5_000,
      healthCheckMs: 60_000,
      execMs: 60_000,
    }),

  pollIntervalMs: z.coerce.number().int().positive().default(1_000),

  ephemeral: z
    .object({
      guestPreset: z.string().min(1).default("shared-cpu-1x"),
    })
    .default({
      guestPreset: "shared-cpu-1x",
    }),
});

export type Config = z.infer<typeof configSchema>;

/** Build a Config from an environment map. Unset variables fall back to schema defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    platform: {
      apiUrl: env.FLEET_API_URL,
      token: env.FLEET_API_TOKEN,
    },
    lease: {
      ttlSeconds: env.FLEET_LEASE_TTL_SECONDS,
      holder: env.FLEET_LEASE_HOLDER,
    },
    timeouts: {
      updateWaitMs: env.FLEET_UPDATE_WAIT_TIMEOUT_MS,
      ephemeralStartMs: env.FLEET_EPHEMERAL_START_TIMEOUT_MS,
      teardownMs: env.FLEET_TEARDOWN_TIMEOUT_MS,
      cleanupMs: env.FLEET_CLEANUP_TIMEOUT_MS,
      healthCheckMs: env.FLEET_HEALTH_CHECK_TIMEOUT_MS,
      execMs: env.FLEET_EXEC_TIMEOUT_MS,
    },
    pollIntervalMs: env.FLEET_POLL_INTERVAL_MS,
    ephemeral: {
      guestPreset: env.FLEET_EPHEMERAL_GUEST,
    },
  });
}

export const config = loadConfig();
