import { z } from "zod";
import { UnexpectedTerminationError } from "./errors.js";
import type { MachineEvent, MachineState } from "./types.js";

const exitRequestSchema = z.object({
  exit_event: z.object({
    exit_code: z.number().int(),
  }),
});

/** The most recent exit event. Events arrive newest first, so the first match wins. */
export function findExitEvent(events: readonly MachineEvent[]): MachineEvent | null {
  for (const event of events) {
    if (event.type === "exit") return event;
  }
  return null;
}

/** Exit code carried by an exit event's request payload, or null if it can't be parsed. */
export function exitCodeOf(event: MachineEvent): number | null {
  const parsed = exitRequestSchema.safeParse(event.request);
  return parsed.success ? parsed.data.exit_event.exit_code : null;
}

/**
 * Build the error for a machine that reached a terminal state nobody asked for.
 * No exit event: "destroyed unexpectedly". Exit event without a readable code:
 * "exited unexpectedly". Otherwise the code is included.
 */
export function describeTermination(
  machineId: string,
  observedState: MachineState,
  events: readonly MachineEvent[],
): UnexpectedTerminationError {
  const exitEvent = findExitEvent(events);
  if (!exitEvent || !exitEvent.request) {
    return new UnexpectedTerminationError("machine was destroyed unexpectedly", machineId, observedState, exitEvent, null);
  }

  const exitCode = exitCodeOf(exitEvent);
  if (exitCode === null) {
    return new UnexpectedTerminationError("machine exited unexpectedly", machineId, observedState, exitEvent, null);
  }

  return new UnexpectedTerminationError(
    `machine exited unexpectedly with code ${exitCode}`,
    machineId,
    observedState,
    exitEvent,
    exitCode,
  );
}
