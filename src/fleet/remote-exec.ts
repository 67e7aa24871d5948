import { errorMessage, RemoteExecutionError } from "./errors.js";
import type { IPlatformClient } from "./platform-client.js";
import type { Machine } from "./types.js";

export interface RemoteSession {
  machineId: string;
  privateIp: string;
}

export interface ExecuteOptions {
  /** Attach the operator's terminal to the command. */
  interactive: boolean;
  signal?: AbortSignal;
}

/** Runs an encoded command line on a machine and reports its exit code. */
export interface IRemoteExecutor {
  openSession(machine: Machine): Promise<RemoteSession>;
  execute(session: RemoteSession, command: string, opts: ExecuteOptions): Promise<number>;
}

/** Anything output can be copied to, e.g. process.stdout. */
export interface OutputSink {
  write(chunk: string): unknown;
}

/**
 * Executes commands through the platform's exec endpoint. Output is captured by the
 * platform and copied to the sinks once the command exits, so there is no terminal
 * to attach: interactive sessions need a tunnel transport and are rejected.
 */
export class MachineExecExecutor implements IRemoteExecutor {
  constructor(
    private readonly client: IPlatformClient,
    private readonly options: { stdout: OutputSink; stderr: OutputSink; timeoutSeconds: number },
  ) {}

  async openSession(machine: Machine): Promise<RemoteSession> {
    if (machine.state !== "started") {
      throw new RemoteExecutionError(`machine ${machine.id} is not started (state: ${machine.state})`);
    }
    return { machineId: machine.id, privateIp: machine.privateIp };
  }

  async execute(session: RemoteSession, command: string, opts: ExecuteOptions): Promise<number> {
    if (opts.interactive) {
      throw new RemoteExecutionError("interactive sessions require a tunnel transport");
    }

    try {
      const result = await this.client.exec(
        session.machineId,
        { command: ["sh", "-c", command], timeoutSeconds: this.options.timeoutSeconds },
        { signal: opts.signal },
      );
      if (result.stdout) this.options.stdout.write(result.stdout);
      if (result.stderr) this.options.stderr.write(result.stderr);
      return result.exitCode;
    } catch (err) {
      throw new RemoteExecutionError(`failed to run command on machine ${session.machineId}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
