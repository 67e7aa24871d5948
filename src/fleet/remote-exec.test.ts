import { beforeEach, describe, expect, it, vi } from "vitest";
import { FakePlatform, makeMachine } from "../test/fake-platform.js";
import { RemoteExecutionError } from "./errors.js";
import { MachineExecExecutor } from "./remote-exec.js";

describe("MachineExecExecutor", () => {
  let fake: FakePlatform;
  let stdout: { write: ReturnType<typeof vi.fn> };
  let stderr: { write: ReturnType<typeof vi.fn> };
  let executor: MachineExecExecutor;

  beforeEach(() => {
    fake = new FakePlatform();
    stdout = { write: vi.fn() };
    stderr = { write: vi.fn() };
    executor = new MachineExecExecutor(fake, { stdout, stderr, timeoutSeconds: 30 });
  });

  it("opens a session on a started machine", async () => {
    const session = await executor.openSession(makeMachine());

    expect(session).toEqual({ machineId: "m-1", privateIp: "fdaa:0:1::2" });
  });

  it("refuses a machine that is not started", async () => {
    await expect(executor.openSession(makeMachine({ state: "stopped" }))).rejects.toThrow(
      "machine m-1 is not started (state: stopped)",
    );
  });

  it("runs the command through a shell and copies its output", async () => {
    fake.add(makeMachine());
    fake.execResult = { stdout: "hello\n", stderr: "warn\n", exitCode: 4 };
    const exec = vi.spyOn(fake, "exec");

    const code = await executor.execute({ machineId: "m-1", privateIp: "" }, "'echo' 'hello'", {
      interactive: false,
    });

    expect(code).toBe(4);
    expect(exec).toHaveBeenCalledWith(
      "m-1",
      { command: ["sh", "-c", "'echo' 'hello'"], timeoutSeconds: 30 },
      { signal: undefined },
    );
    expect(stdout.write).toHaveBeenCalledWith("hello\n");
    expect(stderr.write).toHaveBeenCalledWith("warn\n");
  });

  it("writes nothing for empty output", async () => {
    fake.add(makeMachine());

    await executor.execute({ machineId: "m-1", privateIp: "" }, "'true'", { interactive: false });

    expect(stdout.write).not.toHaveBeenCalled();
    expect(stderr.write).not.toHaveBeenCalled();
  });

  it("rejects interactive sessions", async () => {
    await expect(
      executor.execute({ machineId: "m-1", privateIp: "" }, "'bash'", { interactive: true }),
    ).rejects.toThrow("interactive sessions require a tunnel transport");
  });

  it("wraps platform failures and keeps the cause", async () => {
    const err = await executor
      .execute({ machineId: "missing", privateIp: "" }, "'ls'", { interactive: false })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteExecutionError);
    expect(err).toMatchObject({ message: "failed to run command on machine missing: Machine not found: missing" });
    expect(err instanceof Error ? err.cause : undefined).toBeInstanceOf(Error);
  });
});
