import type { AppConfig, GuestConfig, Machine, MachineConfig, MachineConfigDelta } from "./types.js";

/** Metadata key holding the process group a machine belongs to. */
export const METADATA_PROCESS_GROUP = "process_group";
/** Process group of the one-shot machines that run an app's release command. */
export const RELEASE_COMMAND_PROCESS_GROUP = "release_command";
export const EPHEMERAL_RUNNER_PROCESS_GROUP = "ephemeral_runner";

export const GUEST_PRESETS = {
  "shared-cpu-1x": { cpuKind: "shared", cpus: 1, memoryMb: 256 },
  "shared-cpu-2x": { cpuKind: "shared", cpus: 2, memoryMb: 512 },
  "shared-cpu-4x": { cpuKind: "shared", cpus: 4, memoryMb: 1024 },
  "performance-1x": { cpuKind: "performance", cpus: 1, memoryMb: 2048 },
  "performance-2x": { cpuKind: "performance", cpus: 2, memoryMb: 4096 },
} as const satisfies Record<string, GuestConfig>;

export type GuestPresetName = keyof typeof GUEST_PRESETS;

function isGuestPresetName(name: string): name is GuestPresetName {
  return Object.hasOwn(GUEST_PRESETS, name);
}

export function guestPreset(name: string): GuestConfig {
  if (!isGuestPresetName(name)) {
    throw new Error(`Unknown guest preset "${name}". Known presets: ${Object.keys(GUEST_PRESETS).join(", ")}`);
  }
  return { ...GUEST_PRESETS[name] };
}

/**
 * Merge a delta over a machine's current config. Top-level keys replace;
 * env and metadata are merged key by key.
 */
export function applyConfigDelta(current: MachineConfig, delta: MachineConfigDelta): MachineConfig {
  return {
    ...current,
    ...delta,
    env: { ...current.env, ...delta.env },
    metadata: { ...current.metadata, ...delta.metadata },
  };
}

/** True if the config runs on a schedule rather than on demand. */
export function isScheduled(config: MachineConfig): boolean {
  return (config.schedule ?? "") !== "";
}

export function isReleaseCommandMachine(machine: Machine): boolean {
  return machine.config.metadata[METADATA_PROCESS_GROUP] === RELEASE_COMMAND_PROCESS_GROUP;
}

/**
 * Config for a disposable machine that idles until a command is run on it and is
 * destroyed by the platform once stopped.
 */
export function buildEphemeralRunnerConfig(appConfig: AppConfig, image: string, guest: GuestConfig): MachineConfig {
  const env: Record<string, string> = { ...appConfig.env };
  if (appConfig.primaryRegion) {
    env.PRIMARY_REGION = appConfig.primaryRegion;
  }

  return {
    image,
    guest,
    init: { exec: ["sleep", "inf"] },
    env,
    restart: { policy: "no" },
    metadata: { [METADATA_PROCESS_GROUP]: EPHEMERAL_RUNNER_PROCESS_GROUP },
    autoDestroy: true,
    dns: { skipRegistration: true },
  };
}
