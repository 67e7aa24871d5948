import { logger } from "../config/logger.js";
import { errorMessage, HealthCheckFailedError, LeaseRequiredError, WaitCancelledError } from "./errors.js";
import type { IHealthVerifier } from "./health-verifier.js";
import type { LeaseManager, Scoped } from "./lease-manager.js";
import { applyConfigDelta, isScheduled } from "./machine-config.js";
import type { IPlatformClient } from "./platform-client.js";
import type { StateWaiter } from "./state-waiter.js";
import type { CleanupWarning, Lease, Machine, MachineConfigDelta, MachineState } from "./types.js";

/** Scheduled machines go idle right after reconfiguration; on-demand ones resume running. */
const SCHEDULED_TARGET: readonly MachineState[] = ["stopping", "stopped"];
const ON_DEMAND_TARGET: readonly MachineState[] = ["started"];

export interface UpdateOptions {
  signal?: AbortSignal;
}

export interface MachineUpdateOutcome {
  machineId: string;
  state: MachineState;
}

export interface MachineUpdateResult {
  machineId: string;
  success: boolean;
  state?: MachineState;
  error?: string;
}

export interface RollingUpdateResult {
  updated: MachineUpdateResult[];
  failed: MachineUpdateResult[];
  warnings: CleanupWarning[];
}

export interface MachineUpdaterDeps {
  client: IPlatformClient;
  leases: LeaseManager;
  waiter: StateWaiter;
  health: IHealthVerifier;
  /** Ceiling on the post-update state wait. */
  updateWaitTimeoutMs: number;
}

/**
 * Pushes config changes to leased machines: update -> wait for the expected state ->
 * verify health. A failed health check is reported but never rolled back.
 */
export class MachineUpdater {
  private readonly client: IPlatformClient;
  private readonly leases: LeaseManager;
  private readonly waiter: StateWaiter;
  private readonly health: IHealthVerifier;
  private readonly updateWaitTimeoutMs: number;

  constructor(deps: MachineUpdaterDeps) {
    this.client = deps.client;
    this.leases = deps.leases;
    this.waiter = deps.waiter;
    this.health = deps.health;
    this.updateWaitTimeoutMs = deps.updateWaitTimeoutMs;
  }

  /** Update one machine. The caller must already hold `lease` on it. */
  async update(
    machine: Machine,
    lease: Lease,
    delta: MachineConfigDelta,
    opts: UpdateOptions = {},
  ): Promise<MachineUpdateOutcome> {
    if (lease.machineId !== machine.id || !this.leases.isHeld(lease)) {
      throw new LeaseRequiredError(machine.id);
    }

    logger.info(`Updating machine ${machine.id}`, { machineId: machine.id });

    const config = applyConfigDelta(machine.config, delta);
    const pushed = await this.client.update(machine.id, config, lease.nonce, { signal: opts.signal });

    const target = isScheduled(config) ? SCHEDULED_TARGET : ON_DEMAND_TARGET;
    const settled = await this.waiter.waitFor(machine.id, target, {
      timeoutMs: this.updateWaitTimeoutMs,
      instanceId: pushed.instanceId || undefined,
      signal: opts.signal,
    });

    const report = await this.health.verify([settled], { signal: opts.signal });
    if (!report.ok) {
      throw new HealthCheckFailedError(report.failures);
    }

    logger.info(`Machine ${machine.id} updated successfully`, { machineId: machine.id, state: settled.state });
    return { machineId: machine.id, state: settled.state };
  }

  /** Lease, fetch and update a single machine by ID. */
  async updateOne(
    machineId: string,
    delta: MachineConfigDelta,
    opts: UpdateOptions = {},
  ): Promise<Scoped<MachineUpdateOutcome>> {
    return this.leases.withLease(
      machineId,
      async (lease) => {
        const machine = await this.client.get(machineId, { signal: opts.signal });
        return this.update(machine, lease, delta, opts);
      },
      { signal: opts.signal },
    );
  }

  /**
   * Update every machine in turn. All leases are taken before the first mutation and
   * released when the batch settles. A failure on one machine is recorded and the
   * rest still run; only cancellation stops the batch.
   */
  async rollingUpdate(
    machines: readonly Machine[],
    delta: MachineConfigDelta,
    opts: UpdateOptions = {},
  ): Promise<RollingUpdateResult> {
    logger.info(`Starting rolling update of ${machines.length} machines`);

    const { result, warnings } = await this.leases.withLeases(
      machines.map((m) => m.id),
      async (leases) => {
        const updated: MachineUpdateResult[] = [];
        const failed: MachineUpdateResult[] = [];

        for (const [i, machine] of machines.entries()) {
          if (opts.signal?.aborted) throw new WaitCancelledError(machine.id);
          try {
            // Merge over the config as it is now that the lease is held, not as it was listed.
            const current = await this.client.get(machine.id, { signal: opts.signal });
            const outcome = await this.update(current, leases[i], delta, opts);
            updated.push({ machineId: machine.id, success: true, state: outcome.state });
          } catch (err) {
            if (err instanceof WaitCancelledError) throw err;
            if (opts.signal?.aborted) throw new WaitCancelledError(machine.id);
            const message = errorMessage(err);
            logger.error(`Failed to update machine ${machine.id}`, { machineId: machine.id, err: message });
            failed.push({ machineId: machine.id, success: false, error: message });
          }
        }

        return { updated, failed };
      },
      { signal: opts.signal },
    );

    logger.info(`Rolling update complete: ${result.updated.length} updated, ${result.failed.length} failed`);
    return { ...result, warnings };
  }
}
