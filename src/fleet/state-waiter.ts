import { logger } from "../config/logger.js";
import { errorMessage, type UnexpectedTerminationError, WaitCancelledError, WaitTimeoutError } from "./errors.js";
import { describeTermination } from "./machine-events.js";
import type { IPlatformClient } from "./platform-client.js";
import { sleep } from "./sleep.js";
import { isTerminalState, type Machine, type MachineEvent, type MachineState } from "./types.js";

export interface WaitOptions {
  timeoutMs: number;
  /** Only count a target state reported by this instance (the one an update just created). */
  instanceId?: string;
  /** Aborting this signal ends the wait with WaitCancelledError. */
  signal?: AbortSignal;
}

/**
 * Polls a machine until it reaches one of the target states.
 *
 * Outcomes: resolves with the machine on success; WaitTimeoutError at the deadline,
 * including when a poll is still in flight then;
 * WaitCancelledError when the caller's signal aborts; UnexpectedTerminationError if
 * the machine is being destroyed while waiting for a non-terminal state. Client errors
 * (MachineNotFoundError and friends) propagate unchanged.
 */
export class StateWaiter {
  private readonly pollIntervalMs: number;

  constructor(
    private readonly client: IPlatformClient,
    options: { pollIntervalMs: number },
  ) {
    this.pollIntervalMs = options.pollIntervalMs;
  }

  async waitFor(
    machineId: string,
    target: MachineState | readonly MachineState[],
    opts: WaitOptions,
  ): Promise<Machine> {
    const targets: readonly MachineState[] = typeof target === "string" ? [target] : target;
    const deadline = Date.now() + opts.timeoutMs;
    const { signal } = opts;
    let lastState: MachineState | null = null;

    // Aborts an in-flight poll at the deadline or when the caller aborts, whichever comes first.
    const poll = new AbortController();
    const onAbort = () => poll.abort(signal?.reason);
    const deadlineTimer = setTimeout(() => poll.abort(), opts.timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      for (;;) {
        if (signal?.aborted) throw new WaitCancelledError(machineId);

        let machine: Machine;
        try {
          machine = await this.client.get(machineId, { signal: poll.signal });
        } catch (err) {
          if (signal?.aborted) throw new WaitCancelledError(machineId);
          if (poll.signal.aborted) throw new WaitTimeoutError(machineId, targets, lastState, opts.timeoutMs);
          throw err;
        }

        lastState = machine.state;
        if (targets.includes(machine.state) && (!opts.instanceId || machine.instanceId === opts.instanceId)) {
          return machine;
        }
        if (isTerminalState(machine.state) && !targets.some(isTerminalState)) {
          throw await this.terminationError(machine, poll.signal);
        }

        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          throw new WaitTimeoutError(machineId, targets, lastState, opts.timeoutMs);
        }

        try {
          await sleep(Math.min(this.pollIntervalMs, remaining), signal);
        } catch (err) {
          if (signal?.aborted) throw new WaitCancelledError(machineId);
          throw err;
        }
      }
    } finally {
      clearTimeout(deadlineTimer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async terminationError(machine: Machine, signal: AbortSignal): Promise<UnexpectedTerminationError> {
    let events: MachineEvent[] = machine.events;
    if (events.length === 0) {
      try {
        events = await this.client.events(machine.id, { signal });
      } catch (err) {
        logger.warn(`Could not read event log of machine ${machine.id}`, { machineId: machine.id, err: errorMessage(err) });
      }
    }
    return describeTermination(machine.id, machine.state, events);
  }
}
