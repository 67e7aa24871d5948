import type { MachineEvent, MachineState } from "./types.js";

/** Any non-2xx platform response not mapped to a more specific error. */
export class PlatformApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly platformMessage: string,
  ) {
    super(`Platform API error ${statusCode}: ${platformMessage}`);
    this.name = "PlatformApiError";
  }
}

/** The machine (or its app) no longer exists. Not retried. */
export class MachineNotFoundError extends Error {
  readonly name = "MachineNotFoundError" as const;
  constructor(public readonly machineId: string) {
    super(`Machine not found: ${machineId}`);
  }
}

/** Another holder owns the machine's lease. Surfaced immediately, never retried. */
export class LeaseConflictError extends Error {
  readonly name = "LeaseConflictError" as const;
  constructor(
    public readonly machineId: string,
    detail: string,
  ) {
    super(`Lease conflict on machine ${machineId}: ${detail}`);
  }
}

/** The platform rejected a configuration. The message is the platform's, verbatim. */
export class MachineValidationError extends Error {
  readonly name = "MachineValidationError" as const;
}

/** A mutation was attempted without a live lease on the machine. */
export class LeaseRequiredError extends Error {
  readonly name = "LeaseRequiredError" as const;
  constructor(public readonly machineId: string) {
    super(`A lease on machine ${machineId} must be held to update it`);
  }
}

export class WaitTimeoutError extends Error {
  readonly name = "WaitTimeoutError" as const;
  constructor(
    public readonly machineId: string,
    public readonly targets: readonly MachineState[],
    public readonly lastState: MachineState | null,
    public readonly timeoutMs: number,
  ) {
    super(
      `Timed out after ${timeoutMs}ms waiting for machine ${machineId} to reach ${targets.join("/")} (last state: ${lastState ?? "unknown"})`,
    );
  }
}

/** The caller aborted a wait. Distinct from a timeout. */
export class WaitCancelledError extends Error {
  readonly name = "WaitCancelledError" as const;
  constructor(public readonly machineId: string) {
    super(`Wait for machine ${machineId} was cancelled`);
  }
}

/**
 * The machine reached a terminal state other than the one awaited. The message is
 * one of "machine was destroyed unexpectedly", "machine exited unexpectedly" or
 * "machine exited unexpectedly with code N".
 */
export class UnexpectedTerminationError extends Error {
  readonly name = "UnexpectedTerminationError" as const;
  constructor(
    message: string,
    public readonly machineId: string,
    public readonly observedState: MachineState,
    public readonly exitEvent: MachineEvent | null,
    public readonly exitCode: number | null,
  ) {
    super(message);
  }
}

export interface HealthFailure {
  machineId: string;
  check: string;
  status: string;
  output: string;
}

/** Health verification failed after an update. The config change stays applied. */
export class HealthCheckFailedError extends Error {
  readonly name = "HealthCheckFailedError" as const;
  constructor(public readonly failures: readonly HealthFailure[]) {
    super(
      `failed to wait for health checks to pass: ${failures
        .map((f) => `${f.machineId}/${f.check} is ${f.status}`)
        .join(", ")}`,
    );
  }
}

export class NoMachinesAvailableError extends Error {
  readonly name = "NoMachinesAvailableError" as const;
  constructor() {
    super("no machines are available");
  }
}

export class MachineSelectionError extends Error {
  readonly name = "MachineSelectionError" as const;
}

export class RemoteExecutionError extends Error {
  readonly name = "RemoteExecutionError" as const;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
