/**
 * Domain model for remote machines. The platform owns the authoritative copy;
 * everything here is a snapshot taken at the last API call and may be stale.
 */

export const MACHINE_STATES = [
  "created",
  "starting",
  "started",
  "stopping",
  "stopped",
  "replacing",
  "destroying",
  "destroyed",
] as const;

export type MachineState = (typeof MACHINE_STATES)[number];

/** States a machine never leaves. Waiting for anything else after seeing one of these is hopeless. */
export const TERMINAL_STATES: readonly MachineState[] = ["destroying", "destroyed"];

export function isTerminalState(state: MachineState): boolean {
  return TERMINAL_STATES.includes(state);
}

export interface GuestConfig {
  cpuKind: "shared" | "performance";
  cpus: number;
  memoryMb: number;
}

export interface MachineInit {
  exec?: string[];
  entrypoint?: string[];
  cmd?: string[];
}

export type RestartPolicy = "no" | "always" | "on-failure";

export interface MachineRestart {
  policy: RestartPolicy;
  maxRetries?: number;
}

/** A health check declared in a machine's config. */
export interface MachineCheck {
  type: "http" | "tcp";
  port?: number;
  interval?: string;
  timeout?: string;
  gracePeriod?: string;
  method?: string;
  path?: string;
}

export interface MachineConfig {
  image: string;
  guest?: GuestConfig;
  init?: MachineInit;
  env: Record<string, string>;
  restart?: MachineRestart;
  checks?: Record<string, MachineCheck>;
  metadata: Record<string, string>;
  /** Cron-style schedule name ("hourly", "daily", ...). Empty or absent for on-demand machines. */
  schedule?: string;
  autoDestroy?: boolean;
  dns?: { skipRegistration?: boolean };
}

/** Partial config merged over a machine's current config by an update. */
export type MachineConfigDelta = Partial<MachineConfig>;

export interface MachineEvent {
  type: string;
  status: string;
  source: string;
  /** Unix epoch milliseconds. */
  timestamp: number;
  /** Free-form request payload; exit events carry `exit_event.exit_code` here. */
  request?: Record<string, unknown>;
}

export type CheckStatus = "passing" | "warning" | "critical";

export interface MachineCheckStatus {
  name: string;
  status: CheckStatus;
  output: string;
  updatedAt: string | null;
}

export interface Machine {
  id: string;
  name: string;
  state: MachineState;
  region: string;
  instanceId: string;
  privateIp: string;
  config: MachineConfig;
  /** Newest first, as the platform returns them. */
  events: MachineEvent[];
  checks: MachineCheckStatus[];
  /** Empty when no lease is outstanding. */
  leaseNonce: string;
  createdAt: string;
  updatedAt: string;
}

/** An advisory exclusive-mutation token on one machine. */
export interface Lease {
  machineId: string;
  nonce: string;
  holder: string;
  expiresAt: number | null;
}

/** The deployed application a set of machines belongs to. */
export interface App {
  name: string;
  organization: string;
  /** Image reference of the current release, or null if the app was never released. */
  currentImage: string | null;
}

/** The slice of the application config this core needs. Loading and merging it happens elsewhere. */
export interface AppConfig {
  env: Record<string, string>;
  primaryRegion?: string;
  /** Command aliases: alias name -> literal shell command. */
  commands: Record<string, string>;
}

export type CleanupOperation = "release-lease" | "stop" | "wait-destroyed";

/**
 * A cleanup step that failed after the main operation finished. Reported to the
 * operator, never thrown.
 */
export interface CleanupWarning {
  machineId: string;
  operation: CleanupOperation;
  message: string;
}
