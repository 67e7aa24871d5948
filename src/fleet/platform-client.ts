import { z } from "zod";
import { LeaseConflictError, MachineNotFoundError, MachineValidationError, PlatformApiError } from "./errors.js";
import {
  MACHINE_STATES,
  type Machine,
  type MachineCheck,
  type MachineConfig,
  type MachineEvent,
  type MachineState,
} from "./types.js";

/** Header carrying the lease nonce on every mutating call. */
export const LEASE_NONCE_HEADER = "fly-machine-lease-nonce";

// ---------------------------------------------------------------------------
// Wire schemas (only what we need)
// ---------------------------------------------------------------------------

const wireGuestSchema = z.object({
  cpu_kind: z.enum(["shared", "performance"]).default("shared"),
  cpus: z.number().int(),
  memory_mb: z.number().int(),
});

const wireCheckSchema = z.object({
  type: z.enum(["http", "tcp"]),
  port: z.number().int().optional(),
  interval: z.string().optional(),
  timeout: z.string().optional(),
  grace_period: z.string().optional(),
  method: z.string().optional(),
  path: z.string().optional(),
});

const wireConfigSchema = z.object({
  image: z.string(),
  guest: wireGuestSchema.optional(),
  init: z
    .object({
      exec: z.array(z.string()).nullish(),
      entrypoint: z.array(z.string()).nullish(),
      cmd: z.array(z.string()).nullish(),
    })
    .optional(),
  env: z.record(z.string(), z.string()).nullish(),
  restart: z
    .object({
      policy: z.enum(["no", "always", "on-failure"]),
      max_retries: z.number().int().optional(),
    })
    .optional(),
  checks: z.record(z.string(), wireCheckSchema).nullish(),
  metadata: z.record(z.string(), z.string()).nullish(),
  schedule: z.string().optional(),
  auto_destroy: z.boolean().optional(),
  dns: z.object({ skip_registration: z.boolean().optional() }).optional(),
});

type WireConfig = z.input<typeof wireConfigSchema>;

const wireEventSchema = z.object({
  type: z.string(),
  status: z.string().default(""),
  source: z.string().default(""),
  timestamp: z.number(),
  request: z.record(z.string(), z.unknown()).nullish(),
});

const wireCheckStatusSchema = z.object({
  name: z.string(),
  status: z.enum(["passing", "warning", "critical"]),
  output: z.string().default(""),
  updated_at: z.string().nullish(),
});

const wireMachineSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  state: z.enum(MACHINE_STATES),
  region: z.string().default(""),
  instance_id: z.string().default(""),
  private_ip: z.string().default(""),
  config: wireConfigSchema,
  events: z.array(wireEventSchema).nullish(),
  checks: z.array(wireCheckStatusSchema).nullish(),
  lease_nonce: z.string().nullish(),
  created_at: z.string().default(""),
  updated_at: z.string().default(""),
});

const wireLeaseSchema = z.object({
  data: z.object({
    nonce: z.string().min(1),
    expires_at: z.number().nullish(),
    owner: z.string().default(""),
  }),
});

const wireExecResultSchema = z.object({
  stdout: z.string().default(""),
  stderr: z.string().default(""),
  exit_code: z.number().int(),
});

const errorBodySchema = z.object({ error: z.string().optional(), message: z.string().optional() });

// ---------------------------------------------------------------------------
// Mapping
// ---------------------------------------------------------------------------

function fromWireConfig(wire: z.infer<typeof wireConfigSchema>): MachineConfig {
  const config: MachineConfig = {
    image: wire.image,
    env: wire.env ?? {},
    metadata: wire.metadata ?? {},
  };
  if (wire.guest) {
    config.guest = { cpuKind: wire.guest.cpu_kind, cpus: wire.guest.cpus, memoryMb: wire.guest.memory_mb };
  }
  if (wire.init) {
    config.init = {
      exec: wire.init.exec ?? undefined,
      entrypoint: wire.init.entrypoint ?? undefined,
      cmd: wire.init.cmd ?? undefined,
    };
  }
  if (wire.restart) {
    config.restart = { policy: wire.restart.policy, maxRetries: wire.restart.max_retries };
  }
  if (wire.checks) {
    const checks: Record<string, MachineCheck> = {};
    for (const [name, c] of Object.entries(wire.checks)) {
      checks[name] = {
        type: c.type,
        port: c.port,
        interval: c.interval,
        timeout: c.timeout,
        gracePeriod: c.grace_period,
        method: c.method,
        path: c.path,
      };
    }
    config.checks = checks;
  }
  if (wire.schedule !== undefined) config.schedule = wire.schedule;
  if (wire.auto_destroy !== undefined) config.autoDestroy = wire.auto_destroy;
  if (wire.dns) config.dns = { skipRegistration: wire.dns.skip_registration };
  return config;
}

export function toWireConfig(config: MachineConfig): WireConfig {
  const wire: WireConfig = {
    image: config.image,
    env: config.env,
    metadata: config.metadata,
  };
  if (config.guest) {
    wire.guest = { cpu_kind: config.guest.cpuKind, cpus: config.guest.cpus, memory_mb: config.guest.memoryMb };
  }
  if (config.init) wire.init = { ...config.init };
  if (config.restart) wire.restart = { policy: config.restart.policy, max_retries: config.restart.maxRetries };
  if (config.checks) {
    const checks: NonNullable<WireConfig["checks"]> = {};
    for (const [name, c] of Object.entries(config.checks)) {
      checks[name] = {
        type: c.type,
        port: c.port,
        interval: c.interval,
        timeout: c.timeout,
        grace_period: c.gracePeriod,
        method: c.method,
        path: c.path,
      };
    }
    wire.checks = checks;
  }
  if (config.schedule !== undefined) wire.schedule = config.schedule;
  if (config.autoDestroy !== undefined) wire.auto_destroy = config.autoDestroy;
  if (config.dns) wire.dns = { skip_registration: config.dns.skipRegistration };
  return wire;
}

function fromWireEvent(wire: z.infer<typeof wireEventSchema>): MachineEvent {
  const event: MachineEvent = {
    type: wire.type,
    status: wire.status,
    source: wire.source,
    timestamp: wire.timestamp,
  };
  if (wire.request) event.request = wire.request;
  return event;
}

function fromWireMachine(wire: z.infer<typeof wireMachineSchema>): Machine {
  return {
    id: wire.id,
    name: wire.name,
    state: wire.state,
    region: wire.region,
    instanceId: wire.instance_id,
    privateIp: wire.private_ip,
    config: fromWireConfig(wire.config),
    events: (wire.events ?? []).map(fromWireEvent),
    checks: (wire.checks ?? []).map((c) => ({
      name: c.name,
      status: c.status,
      output: c.output,
      updatedAt: c.updated_at ?? null,
    })),
    leaseNonce: wire.lease_nonce ?? "",
    createdAt: wire.created_at,
    updatedAt: wire.updated_at,
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ListFilter {
  state?: MachineState;
  region?: string;
  includeDeleted?: boolean;
}

export interface LeaseRequest {
  ttlSeconds: number;
  holder: string;
}

export interface LeaseGrant {
  nonce: string;
  /** Unix epoch seconds, if the platform reported one. */
  expiresAt: number | null;
  owner: string;
}

export interface LaunchInput {
  config: MachineConfig;
  region?: string;
  name?: string;
}

export interface StopInput {
  nonce?: string;
  timeoutSeconds?: number;
}

export interface ExecInput {
  command: string[];
  timeoutSeconds?: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Machine CRUD, lease and event-log operations for a single app. */
export interface IPlatformClient {
  readonly appName: string;
  get(machineId: string, opts?: RequestOptions): Promise<Machine>;
  list(filter?: ListFilter, opts?: RequestOptions): Promise<Machine[]>;
  acquireLease(machineId: string, request: LeaseRequest, opts?: RequestOptions): Promise<LeaseGrant>;
  releaseLease(machineId: string, nonce: string, opts?: RequestOptions): Promise<void>;
  update(machineId: string, config: MachineConfig, nonce: string, opts?: RequestOptions): Promise<Machine>;
  launch(input: LaunchInput, opts?: RequestOptions): Promise<Machine>;
  stop(machineId: string, input: StopInput, opts?: RequestOptions): Promise<void>;
  events(machineId: string, opts?: RequestOptions): Promise<MachineEvent[]>;
  exec(machineId: string, input: ExecInput, opts?: RequestOptions): Promise<ExecResult>;
}

/** HTTP client for the Machines API, scoped to one app. */
export class MachinesApiClient implements IPlatformClient {
  readonly appName: string;
  private readonly baseUrl: string;
  private readonly token: string;

  constructor(options: { appName: string; token: string; baseUrl?: string }) {
    this.appName = options.appName;
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? "https://api.machines.dev/v1").replace(/\/+$/, "");
  }

  /** Get a machine by ID */
  async get(machineId: string, opts: RequestOptions = {}): Promise<Machine> {
    const body = await this.request("GET", this.machinePath(machineId), { machineId, signal: opts.signal });
    return fromWireMachine(wireMachineSchema.parse(body));
  }

  /** List the app's machines */
  async list(filter: ListFilter = {}, opts: RequestOptions = {}): Promise<Machine[]> {
    const params = new URLSearchParams();
    if (filter.includeDeleted) params.set("include_deleted", "true");
    if (filter.region) params.set("region", filter.region);
    const query = params.toString() ? `?${params.toString()}` : "";

    const body = await this.request("GET", `${this.appPath()}/machines${query}`, { signal: opts.signal });
    const machines = z.array(wireMachineSchema).parse(body).map(fromWireMachine);
    return filter.state ? machines.filter((m) => m.state === filter.state) : machines;
  }

  async acquireLease(machineId: string, request: LeaseRequest, opts: RequestOptions = {}): Promise<LeaseGrant> {
    const body = await this.request("POST", `${this.machinePath(machineId)}/lease`, {
      machineId,
      body: { ttl: request.ttlSeconds, description: request.holder },
      signal: opts.signal,
    });
    const { data } = wireLeaseSchema.parse(body);
    return { nonce: data.nonce, expiresAt: data.expires_at ?? null, owner: data.owner };
  }

  async releaseLease(machineId: string, nonce: string, opts: RequestOptions = {}): Promise<void> {
    await this.request("DELETE", `${this.machinePath(machineId)}/lease`, {
      machineId,
      nonce,
      expectBody: false,
      signal: opts.signal,
    });
  }

  /** Replace a machine's config. The platform restarts it to apply the change. */
  async update(machineId: string, config: MachineConfig, nonce: string, opts: RequestOptions = {}): Promise<Machine> {
    const body = await this.request("POST", this.machinePath(machineId), {
      machineId,
      nonce,
      body: { config: toWireConfig(config) },
      signal: opts.signal,
    });
    return fromWireMachine(wireMachineSchema.parse(body));
  }

  async launch(input: LaunchInput, opts: RequestOptions = {}): Promise<Machine> {
    const body = await this.request("POST", `${this.appPath()}/machines`, {
      body: { name: input.name, region: input.region, config: toWireConfig(input.config) },
      signal: opts.signal,
    });
    return fromWireMachine(wireMachineSchema.parse(body));
  }

  async stop(machineId: string, input: StopInput, opts: RequestOptions = {}): Promise<void> {
    await this.request("POST", `${this.machinePath(machineId)}/stop`, {
      machineId,
      nonce: input.nonce,
      body: input.timeoutSeconds !== undefined ? { timeout: `${input.timeoutSeconds}s` } : {},
      expectBody: false,
      signal: opts.signal,
    });
  }

  async events(machineId: string, opts: RequestOptions = {}): Promise<MachineEvent[]> {
    const body = await this.request("GET", `${this.machinePath(machineId)}/events`, {
      machineId,
      signal: opts.signal,
    });
    return z.array(wireEventSchema).parse(body).map(fromWireEvent);
  }

  async exec(machineId: string, input: ExecInput, opts: RequestOptions = {}): Promise<ExecResult> {
    const body = await this.request("POST", `${this.machinePath(machineId)}/exec`, {
      machineId,
      body: { command: input.command, timeout: input.timeoutSeconds },
      signal: opts.signal,
    });
    const result = wireExecResultSchema.parse(body);
    return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exit_code };
  }

  private appPath(): string {
    return `/apps/${encodeURIComponent(this.appName)}`;
  }

  private machinePath(machineId: string): string {
    return `${this.appPath()}/machines/${encodeURIComponent(machineId)}`;
  }

  private headers(nonce?: string): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      "Content-Type": "application/json",
    };
    if (nonce) headers[LEASE_NONCE_HEADER] = nonce;
    return headers;
  }

  private async request(
    method: "GET" | "POST" | "DELETE",
    path: string,
    options: { machineId?: string; nonce?: string; body?: unknown; expectBody?: boolean; signal?: AbortSignal },
  ): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(options.nonce),
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: options.signal,
    });

    if (!res.ok) {
      const raw: unknown = await res.json().catch(() => ({}));
      const parsed = errorBodySchema.safeParse(raw);
      const message = (parsed.success ? (parsed.data.error ?? parsed.data.message) : undefined) ?? res.statusText;
      throw this.toError(res.status, message, options.machineId);
    }

    if (options.expectBody === false || res.status === 204) return undefined;
    return res.json();
  }

  private toError(status: number, message: string, machineId?: string): Error {
    if (status === 404 && machineId) return new MachineNotFoundError(machineId);
    if (status === 409 && machineId) return new LeaseConflictError(machineId, message);
    if (status === 400 || status === 422) return new MachineValidationError(message);
    return new PlatformApiError(status, message);
  }
}
