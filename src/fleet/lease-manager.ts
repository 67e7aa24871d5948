import { logger } from "../config/logger.js";
import { errorMessage, LeaseConflictError } from "./errors.js";
import type { IPlatformClient, RequestOptions } from "./platform-client.js";
import type { CleanupWarning, Lease } from "./types.js";

export interface LeaseManagerOptions {
  ttlSeconds: number;
  holder: string;
  /** Deadline for each release call, independent of the caller's signal. */
  cleanupTimeoutMs: number;
}

export interface Scoped<T> {
  result: T;
  warnings: CleanupWarning[];
}

/**
 * Acquires and releases per-machine leases. Holds at most one lease per machine;
 * a second acquire for the same machine is rejected rather than retried.
 *
 * Release is best-effort: the platform expires stale leases on its own, so a
 * failed release is logged and reported, never thrown.
 */
export class LeaseManager {
  /** Outstanding leases keyed by machine ID. */
  private readonly held = new Map<string, Lease>();

  constructor(
    private readonly client: IPlatformClient,
    private readonly options: LeaseManagerOptions,
  ) {}

  async acquire(machineId: string, opts: RequestOptions = {}): Promise<Lease> {
    if (this.held.has(machineId)) {
      throw new LeaseConflictError(machineId, "a lease is already held by this process");
    }

    const grant = await this.client.acquireLease(
      machineId,
      { ttlSeconds: this.options.ttlSeconds, holder: this.options.holder },
      opts,
    );
    const lease: Lease = {
      machineId,
      nonce: grant.nonce,
      holder: this.options.holder,
      expiresAt: grant.expiresAt,
    };
    this.held.set(machineId, lease);
    logger.debug(`Acquired lease on machine ${machineId}`, { machineId, expiresAt: grant.expiresAt });
    return lease;
  }

  /** True while this exact lease is outstanding. */
  isHeld(lease: Lease): boolean {
    return this.held.get(lease.machineId)?.nonce === lease.nonce;
  }

  /**
   * Release a lease. A lease that is no longer held is ignored, so each lease is
   * released at most once.
   */
  async release(lease: Lease): Promise<CleanupWarning | null> {
    if (!this.isHeld(lease)) return null;
    // Forget the nonce first: it must never be reused, even if the platform call fails.
    this.held.delete(lease.machineId);

    try {
      await this.client.releaseLease(lease.machineId, lease.nonce, {
        signal: AbortSignal.timeout(this.options.cleanupTimeoutMs),
      });
      logger.debug(`Released lease on machine ${lease.machineId}`, { machineId: lease.machineId });
      return null;
    } catch (err) {
      const message = `Failed to release lease on machine ${lease.machineId}: ${errorMessage(err)}`;
      logger.warn(message, { machineId: lease.machineId });
      return { machineId: lease.machineId, operation: "release-lease", message };
    }
  }

  /** Run `fn` while holding a lease on `machineId`. The lease is released on every exit path. */
  async withLease<T>(
    machineId: string,
    fn: (lease: Lease) => Promise<T>,
    opts: RequestOptions = {},
  ): Promise<Scoped<T>> {
    const lease = await this.acquire(machineId, opts);
    const warnings: CleanupWarning[] = [];
    try {
      const result = await fn(lease);
      return { result, warnings };
    } finally {
      const warning = await this.release(lease);
      if (warning) warnings.push(warning);
    }
  }

  /**
   * Acquire leases on every machine before running `fn`, and release all of them
   * when it settles. If any acquisition fails, the leases already taken are
   * released and the acquisition error is rethrown without running `fn`.
   */
  async withLeases<T>(
    machineIds: readonly string[],
    fn: (leases: Lease[]) => Promise<T>,
    opts: RequestOptions = {},
  ): Promise<Scoped<T>> {
    const leases: Lease[] = [];
    const warnings: CleanupWarning[] = [];
    try {
      for (const machineId of machineIds) {
        leases.push(await this.acquire(machineId, opts));
      }
      const result = await fn(leases);
      return { result, warnings };
    } finally {
      for (const lease of leases) {
        const warning = await this.release(lease);
        if (warning) warnings.push(warning);
      }
    }
  }
}
