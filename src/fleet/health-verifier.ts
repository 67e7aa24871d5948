import { logger } from "../config/logger.js";
import { errorMessage, type HealthFailure, WaitCancelledError } from "./errors.js";
import type { IPlatformClient } from "./platform-client.js";
import { sleep } from "./sleep.js";
import type { Machine, MachineCheckStatus } from "./types.js";

export type HealthReport = { ok: true } | { ok: false; failures: HealthFailure[] };

export interface VerifyOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Runs a machine's configured health checks and reports pass or fail. */
export interface IHealthVerifier {
  verify(machines: readonly Machine[], opts?: VerifyOptions): Promise<HealthReport>;
}

/**
 * Health verification from the check statuses the platform reports for each machine.
 * Waits until every check declared in a machine's config is passing; anything still
 * not passing at the deadline is a failure.
 */
export class MachineChecksVerifier implements IHealthVerifier {
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly client: IPlatformClient,
    options: { pollIntervalMs: number; timeoutMs: number },
  ) {
    this.pollIntervalMs = options.pollIntervalMs;
    this.timeoutMs = options.timeoutMs;
  }

  async verify(machines: readonly Machine[], opts: VerifyOptions = {}): Promise<HealthReport> {
    const failures: HealthFailure[] = [];
    for (const machine of machines) {
      failures.push(...(await this.verifyMachine(machine, opts)));
    }
    return failures.length === 0 ? { ok: true } : { ok: false, failures };
  }

  private async verifyMachine(machine: Machine, opts: VerifyOptions): Promise<HealthFailure[]> {
    const declared = Object.keys(machine.config.checks ?? {});
    if (declared.length === 0) {
      logger.warn(`Machine ${machine.id} has no health checks configured, assuming healthy`, { machineId: machine.id });
      return [];
    }

    const deadline = Date.now() + (opts.timeoutMs ?? this.timeoutMs);
    let statuses: MachineCheckStatus[] = [];

    for (;;) {
      if (opts.signal?.aborted) throw new WaitCancelledError(machine.id);

      try {
        statuses = (await this.client.get(machine.id, { signal: opts.signal })).checks;
      } catch (err) {
        if (opts.signal?.aborted) throw new WaitCancelledError(machine.id);
        return [{ machineId: machine.id, check: "*", status: "unknown", output: errorMessage(err) }];
      }

      const pending = pendingChecks(machine.id, declared, statuses);
      if (pending.length === 0) return [];

      const remaining = deadline - Date.now();
      if (remaining <= 0) return pending;

      try {
        await sleep(Math.min(this.pollIntervalMs, remaining), opts.signal);
      } catch (err) {
        if (opts.signal?.aborted) throw new WaitCancelledError(machine.id);
        throw err;
      }
    }
  }
}

function pendingChecks(machineId: string, declared: readonly string[], statuses: readonly MachineCheckStatus[]) {
  const failures: HealthFailure[] = [];
  for (const name of declared) {
    const status = statuses.find((s) => s.name === name);
    if (status?.status === "passing") continue;
    failures.push({
      machineId,
      check: name,
      status: status?.status ?? "unknown",
      output: status?.output ?? "",
    });
  }
  return failures;
}
