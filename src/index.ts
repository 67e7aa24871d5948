export { type Config, config, loadConfig } from "./config/index.js";
export { logger } from "./config/logger.js";
export { encodeCommand, quoteArg } from "./fleet/command-encoder.js";
export {
  EphemeralRunner,
  type IMachinePrompter,
  type MachineSelection,
  type RunOptions,
  type RunOutcome,
} from "./fleet/ephemeral-runner.js";
export {
  errorMessage,
  HealthCheckFailedError,
  type HealthFailure,
  LeaseConflictError,
  LeaseRequiredError,
  MachineNotFoundError,
  MachineSelectionError,
  MachineValidationError,
  NoMachinesAvailableError,
  PlatformApiError,
  RemoteExecutionError,
  UnexpectedTerminationError,
  WaitCancelledError,
  WaitTimeoutError,
} from "./fleet/errors.js";
export { type HealthReport, type IHealthVerifier, MachineChecksVerifier } from "./fleet/health-verifier.js";
export { LeaseManager, type Scoped } from "./fleet/lease-manager.js";
export {
  applyConfigDelta,
  buildEphemeralRunnerConfig,
  GUEST_PRESETS,
  guestPreset,
  isReleaseCommandMachine,
} from "./fleet/machine-config.js";
export { describeTermination, exitCodeOf, findExitEvent } from "./fleet/machine-events.js";
export {
  MachineUpdater,
  type MachineUpdateOutcome,
  type MachineUpdateResult,
  type RollingUpdateResult,
} from "./fleet/machine-updater.js";
export { type IPlatformClient, MachinesApiClient } from "./fleet/platform-client.js";
export { type IRemoteExecutor, MachineExecExecutor, type RemoteSession } from "./fleet/remote-exec.js";
export { createFleetServices, type FleetServices } from "./fleet/services.js";
export { StateWaiter, type WaitOptions } from "./fleet/state-waiter.js";
export type * from "./fleet/types.js";
export { isTerminalState, MACHINE_STATES, TERMINAL_STATES } from "./fleet/types.js";
