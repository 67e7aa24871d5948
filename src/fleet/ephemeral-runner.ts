import { logger } from "../config/logger.js";
import { encodeCommand } from "./command-encoder.js";
import {
  errorMessage,
  MachineNotFoundError,
  MachineSelectionError,
  NoMachinesAvailableError,
  UnexpectedTerminationError,
  WaitCancelledError,
} from "./errors.js";
import { buildEphemeralRunnerConfig, guestPreset, isReleaseCommandMachine } from "./machine-config.js";
import { describeTermination } from "./machine-events.js";
import type { IPlatformClient } from "./platform-client.js";
import type { IRemoteExecutor } from "./remote-exec.js";
import type { StateWaiter } from "./state-waiter.js";
import { type App, type AppConfig, type CleanupWarning, isTerminalState, type Machine } from "./types.js";

const MANUAL_CLEANUP_HINT = "You may need to destroy the machine manually.";

/** How the machine that runs the command is chosen. */
export type MachineSelection =
  /** An existing, started machine. Never destroyed afterwards. */
  | { kind: "machine"; machineId: string }
  /** Ask the operator to pick a started machine, or to create a new one. */
  | { kind: "select" }
  /** Always create a fresh ephemeral machine. */
  | { kind: "ephemeral" };

/** Asks the operator to pick one of `options`; resolves to the chosen index. */
export interface IMachinePrompter {
  select(message: string, options: readonly string[]): Promise<number>;
}

export interface RunOptions {
  selection?: MachineSelection;
  /** Leave a machine created for this run in place instead of destroying it. */
  keep?: boolean;
  interactive?: boolean;
  signal?: AbortSignal;
}

export interface RunOutcome {
  machineId: string;
  ephemeral: boolean;
  exitCode: number;
  command: string;
  warnings: CleanupWarning[];
}

export interface EphemeralRunnerDeps {
  client: IPlatformClient;
  waiter: StateWaiter;
  executor: IRemoteExecutor;
  prompter?: IMachinePrompter;
  startTimeoutMs: number;
  teardownTimeoutMs: number;
  /** Deadline for the destruction check after a failed start. */
  cleanupTimeoutMs: number;
  guestPreset: string;
}

interface SelectedMachine {
  machine: Machine;
  ephemeral: boolean;
}

/**
 * Runs a one-off command on a machine. Machines created here are torn down when the
 * command finishes, however it finishes; a teardown that fails is reported as a
 * warning and never hides the command's exit code.
 */
export class EphemeralRunner {
  private readonly client: IPlatformClient;
  private readonly waiter: StateWaiter;
  private readonly executor: IRemoteExecutor;
  private readonly prompter: IMachinePrompter | undefined;
  private readonly startTimeoutMs: number;
  private readonly teardownTimeoutMs: number;
  private readonly cleanupTimeoutMs: number;
  private readonly guestPreset: string;

  constructor(deps: EphemeralRunnerDeps) {
    this.client = deps.client;
    this.waiter = deps.waiter;
    this.executor = deps.executor;
    this.prompter = deps.prompter;
    this.startTimeoutMs = deps.startTimeoutMs;
    this.teardownTimeoutMs = deps.teardownTimeoutMs;
    this.cleanupTimeoutMs = deps.cleanupTimeoutMs;
    this.guestPreset = deps.guestPreset;
  }

  async runCommand(app: App, appConfig: AppConfig, args: readonly string[], opts: RunOptions = {}): Promise<RunOutcome> {
    const command = encodeCommand(appConfig.commands, args);
    const { machine, ephemeral } = await this.selectMachine(
      app,
      appConfig,
      opts.selection ?? { kind: "ephemeral" },
      opts.signal,
    );

    const warnings: CleanupWarning[] = [];
    try {
      const session = await this.executor.openSession(machine);
      const exitCode = await this.executor.execute(session, command, {
        interactive: opts.interactive ?? false,
        signal: opts.signal,
      });
      logger.info(`Command on machine ${machine.id} exited with code ${exitCode}`, { machineId: machine.id, exitCode });
      return { machineId: machine.id, ephemeral, exitCode, command, warnings };
    } finally {
      if (ephemeral && !opts.keep) {
        warnings.push(...(await this.teardown(machine)));
      } else if (ephemeral) {
        logger.info(`Keeping ephemeral machine ${machine.id} as requested`, { machineId: machine.id });
      }
    }
  }

  private async selectMachine(
    app: App,
    appConfig: AppConfig,
    selection: MachineSelection,
    signal?: AbortSignal,
  ): Promise<SelectedMachine> {
    switch (selection.kind) {
      case "machine":
        return this.getMachineById(selection.machineId, signal);
      case "select":
        return this.promptForMachine(app, appConfig, signal);
      case "ephemeral":
        return this.makeEphemeralMachine(app, appConfig, signal);
      default: {
        const unknown: never = selection;
        throw new MachineSelectionError(`Unknown machine selection ${JSON.stringify(unknown)}`);
      }
    }
  }

  private async getMachineById(machineId: string, signal?: AbortSignal): Promise<SelectedMachine> {
    const machine = await this.client.get(machineId, { signal });
    if (machine.state !== "started") {
      throw new MachineSelectionError(`machine ${machineId} is not started`);
    }
    if (isReleaseCommandMachine(machine)) {
      throw new MachineSelectionError(`machine ${machineId} is a release command machine`);
    }
    return { machine, ephemeral: false };
  }

  private async promptForMachine(app: App, appConfig: AppConfig, signal?: AbortSignal): Promise<SelectedMachine> {
    if (!this.prompter) {
      throw new MachineSelectionError("interactive machine selection needs a prompter");
    }

    const machines = (await this.client.list({ state: "started" }, { signal })).filter(
      (m) => !isReleaseCommandMachine(m),
    );
    if (machines.length === 0) throw new NoMachinesAvailableError();

    const options = [
      `create an ephemeral ${this.guestPreset} machine`,
      ...machines.map((m) => `${m.region}: ${m.id} ${m.privateIp} ${m.name}`),
    ];
    const index = await this.prompter.select("Select a machine:", options);
    if (index === 0) return this.makeEphemeralMachine(app, appConfig, signal);

    const picked = machines[index - 1];
    if (!picked) throw new MachineSelectionError(`invalid selection ${index}`);
    return { machine: picked, ephemeral: false };
  }

  private async makeEphemeralMachine(app: App, appConfig: AppConfig, signal?: AbortSignal): Promise<SelectedMachine> {
    if (!app.currentImage) {
      throw new MachineSelectionError(
        "can't create an ephemeral runner machine since the app has not yet been released",
      );
    }

    const config = buildEphemeralRunnerConfig(appConfig, app.currentImage, guestPreset(this.guestPreset));
    let machine: Machine;
    try {
      machine = await this.client.launch({ config, region: appConfig.primaryRegion }, { signal });
    } catch (err) {
      throw new Error(`failed to launch ephemeral runner machine: ${errorMessage(err)}`, { cause: err });
    }
    logger.info(`Created an ephemeral machine ${machine.id} to run the command`, { app: app.name, machineId: machine.id });

    logger.info(`Waiting for ${machine.id} to start`, { machineId: machine.id });
    try {
      const started = await this.waiter.waitFor(machine.id, "started", { timeoutMs: this.startTimeoutMs, signal });
      return { machine: started, ephemeral: true };
    } catch (err) {
      if (err instanceof WaitCancelledError) {
        logger.info(`Start of ephemeral machine ${machine.id} cancelled, tearing it down`, { machineId: machine.id });
        await this.teardown(machine);
        throw err;
      }
      logger.error(`Ephemeral machine ${machine.id} failed to start`, { machineId: machine.id, err: errorMessage(err) });
      throw await this.explainStartFailure(machine.id, err);
    }
  }

  /**
   * After a failed start, find out whether the platform destroyed the machine on its
   * own. If so, the exit cause from its event log replaces the original error;
   * otherwise the operator is told to clean up and the original error stands.
   */
  private async explainStartFailure(machineId: string, firstErr: unknown): Promise<unknown> {
    if (firstErr instanceof UnexpectedTerminationError) return firstErr;

    const signal = AbortSignal.timeout(this.cleanupTimeoutMs);
    let current: Machine;
    try {
      current = await this.client.get(machineId, { signal });
    } catch (err) {
      logger.warn(`Failed to check status of machine ${machineId}. ${MANUAL_CLEANUP_HINT}`, {
        machineId,
        err: errorMessage(err),
      });
      return new Error(`failed to check status of machine: ${errorMessage(err)}`, { cause: firstErr });
    }

    if (!isTerminalState(current.state)) {
      logger.warn(`Ephemeral machine ${machineId} is still ${current.state}. ${MANUAL_CLEANUP_HINT}`, { machineId });
      return firstErr;
    }

    let events = current.events;
    if (events.length === 0) {
      try {
        events = await this.client.events(machineId, { signal });
      } catch (err) {
        logger.warn(`Could not read event log of machine ${machineId}`, { machineId, err: errorMessage(err) });
      }
    }
    return describeTermination(machineId, current.state, events);
  }

  /**
   * Stop the machine, then wait for the platform to destroy it, within one budget.
   * The destroy wait gets whatever the stop left over and enforces it as its own deadline.
   */
  private async teardown(machine: Machine): Promise<CleanupWarning[]> {
    const deadline = Date.now() + this.teardownTimeoutMs;

    try {
      await this.client.stop(
        machine.id,
        { timeoutSeconds: Math.max(1, Math.ceil(this.teardownTimeoutMs / 1000)) },
        { signal: AbortSignal.timeout(this.teardownTimeoutMs) },
      );
    } catch (err) {
      if (err instanceof MachineNotFoundError) return [];
      const message = `Failed to stop ephemeral runner machine ${machine.id}: ${errorMessage(err)}. ${MANUAL_CLEANUP_HINT}`;
      logger.warn(message, { machineId: machine.id });
      return [{ machineId: machine.id, operation: "stop", message }];
    }

    logger.info(`Waiting for ephemeral runner machine ${machine.id} to be destroyed`, { machineId: machine.id });
    try {
      await this.waiter.waitFor(machine.id, "destroyed", { timeoutMs: Math.max(0, deadline - Date.now()) });
    } catch (err) {
      if (err instanceof MachineNotFoundError) return [];
      const message = `Failed to wait for ephemeral runner machine ${machine.id} to be destroyed: ${errorMessage(err)}. ${MANUAL_CLEANUP_HINT}`;
      logger.warn(message, { machineId: machine.id });
      return [{ machineId: machine.id, operation: "wait-destroyed", message }];
    }

    logger.info(`Ephemeral runner machine ${machine.id} destroyed`, { machineId: machine.id });
    return [];
  }
}
