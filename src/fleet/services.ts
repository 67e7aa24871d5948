import type { Config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { EphemeralRunner, type IMachinePrompter } from "./ephemeral-runner.js";
import { type IHealthVerifier, MachineChecksVerifier } from "./health-verifier.js";
import { LeaseManager } from "./lease-manager.js";
import { MachineUpdater } from "./machine-updater.js";
import { type IPlatformClient, MachinesApiClient } from "./platform-client.js";
import { type IRemoteExecutor, MachineExecExecutor, type OutputSink } from "./remote-exec.js";
import { StateWaiter } from "./state-waiter.js";

export interface FleetServices {
  client: IPlatformClient;
  leases: LeaseManager;
  waiter: StateWaiter;
  health: IHealthVerifier;
  updater: MachineUpdater;
  runner: EphemeralRunner;
}

export interface FleetServiceOverrides {
  /** Swap the HTTP client, e.g. for an in-process fake. */
  client?: IPlatformClient;
  health?: IHealthVerifier;
  executor?: IRemoteExecutor;
  prompter?: IMachinePrompter;
  stdout?: OutputSink;
  stderr?: OutputSink;
}

/**
 * Wire the fleet components for one app. Every component gets its collaborators
 * here; nothing is shared through module state, so two apps can be driven side by side.
 */
export function createFleetServices(
  appName: string,
  config: Config,
  overrides: FleetServiceOverrides = {},
): FleetServices {
  let client = overrides.client;
  if (!client) {
    if (!config.platform.token) {
      throw new Error("FLEET_API_TOKEN is required to reach the machines API");
    }
    client = new MachinesApiClient({ appName, token: config.platform.token, baseUrl: config.platform.apiUrl });
  }

  const leases = new LeaseManager(client, {
    ttlSeconds: config.lease.ttlSeconds,
    holder: config.lease.holder,
    cleanupTimeoutMs: config.timeouts.cleanupMs,
  });
  const waiter = new StateWaiter(client, { pollIntervalMs: config.pollIntervalMs });
  const health =
    overrides.health ??
    new MachineChecksVerifier(client, {
      pollIntervalMs: config.pollIntervalMs,
      timeoutMs: config.timeouts.healthCheckMs,
    });

  const updater = new MachineUpdater({
    client,
    leases,
    waiter,
    health,
    updateWaitTimeoutMs: config.timeouts.updateWaitMs,
  });

  const executor =
    overrides.executor ??
    new MachineExecExecutor(client, {
      stdout: overrides.stdout ?? process.stdout,
      stderr: overrides.stderr ?? process.stderr,
      timeoutSeconds: Math.ceil(config.timeouts.execMs / 1000),
    });

  const runner = new EphemeralRunner({
    client,
    waiter,
    executor,
    prompter: overrides.prompter,
    startTimeoutMs: config.timeouts.ephemeralStartMs,
    teardownTimeoutMs: config.timeouts.teardownMs,
    cleanupTimeoutMs: config.timeouts.cleanupMs,
    guestPreset: config.ephemeral.guestPreset,
  });

  logger.debug(`Fleet services ready for app ${appName}`, { app: appName, apiUrl: config.platform.apiUrl });
  return { client, leases, waiter, health, updater, runner };
}
