import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { logger } from "../config/logger.js";
import { FakePlatform, makeMachine } from "../test/fake-platform.js";
import { LeaseConflictError } from "./errors.js";
import { LeaseManager } from "./lease-manager.js";

describe("LeaseManager", () => {
  let fake: FakePlatform;
  let leases: LeaseManager;

  beforeEach(() => {
    vi.clearAllMocks();
    fake = new FakePlatform();
    fake.add(makeMachine({ id: "m-1" }));
    fake.add(makeMachine({ id: "m-2" }));
    fake.add(makeMachine({ id: "m-3" }));
    leases = new LeaseManager(fake, { ttlSeconds: 30, holder: "test-holder", cleanupTimeoutMs: 1_000 });
  });

  describe("acquire", () => {
    it("returns a lease carrying the platform nonce and the configured holder", async () => {
      const acquire = vi.spyOn(fake, "acquireLease");

      const lease = await leases.acquire("m-1");

      expect(lease).toEqual({ machineId: "m-1", nonce: "nonce-1", holder: "test-holder", expiresAt: null });
      expect(acquire).toHaveBeenCalledWith("m-1", { ttlSeconds: 30, holder: "test-holder" }, {});
      expect(leases.isHeld(lease)).toBe(true);
    });

    it("rejects a second acquire for the same machine without calling the platform", async () => {
      await leases.acquire("m-1");
      const acquire = vi.spyOn(fake, "acquireLease");

      await expect(leases.acquire("m-1")).rejects.toBeInstanceOf(LeaseConflictError);
      expect(acquire).not.toHaveBeenCalled();
    });

    it("surfaces a conflict with another holder", async () => {
      fake.leases.set("m-1", "someone-else");

      await expect(leases.acquire("m-1")).rejects.toThrow("Lease conflict on machine m-1");
    });
  });

  describe("release", () => {
    it("releases a lease exactly once", async () => {
      const lease = await leases.acquire("m-1");

      expect(await leases.release(lease)).toBeNull();
      expect(await leases.release(lease)).toBeNull();

      expect(fake.released).toEqual([{ machineId: "m-1", nonce: "nonce-1" }]);
      expect(leases.isHeld(lease)).toBe(false);
      expect(fake.leases.has("m-1")).toBe(false);
    });

    it("turns a failed release into a warning instead of throwing", async () => {
      const lease = await leases.acquire("m-1");
      vi.spyOn(fake, "releaseLease").mockRejectedValue(new Error("connection reset"));

      const warning = await leases.release(lease);

      expect(warning).toEqual({
        machineId: "m-1",
        operation: "release-lease",
        message: "Failed to release lease on machine m-1: connection reset",
      });
      expect(logger.warn).toHaveBeenCalledWith("Failed to release lease on machine m-1: connection reset", {
        machineId: "m-1",
      });
      expect(leases.isHeld(lease)).toBe(false);
    });

    it("passes a cleanup deadline to the platform call", async () => {
      const lease = await leases.acquire("m-1");
      const release = vi.spyOn(fake, "releaseLease");

      await leases.release(lease);

      const opts = release.mock.calls[0]?.[2];
      expect(opts?.signal).toBeInstanceOf(AbortSignal);
    });
  });

  describe("withLease", () => {
    it("returns the result and releases the lease", async () => {
      const scoped = await leases.withLease("m-1", async (lease) => lease.nonce.toUpperCase());

      expect(scoped).toEqual({ result: "NONCE-1", warnings: [] });
      expect(fake.released).toEqual([{ machineId: "m-1", nonce: "nonce-1" }]);
    });

    it("releases the lease when the callback throws", async () => {
      await expect(
        leases.withLease("m-1", async () => {
          throw new Error("update failed");
        }),
      ).rejects.toThrow("update failed");

      expect(fake.released).toEqual([{ machineId: "m-1", nonce: "nonce-1" }]);
      expect(fake.leases.size).toBe(0);
    });

    it("collects a release failure as a warning", async () => {
      vi.spyOn(fake, "releaseLease").mockRejectedValue(new Error("timeout"));

      const scoped = await leases.withLease("m-1", async () => 42);

      expect(scoped.result).toBe(42);
      expect(scoped.warnings).toHaveLength(1);
      expect(scoped.warnings[0]?.operation).toBe("release-lease");
    });
  });

  describe("withLeases", () => {
    it("holds every lease while the callback runs and releases all of them", async () => {
      const scoped = await leases.withLeases(["m-1", "m-2", "m-3"], async (held) => {
        expect(fake.leases.size).toBe(3);
        return held.map((l) => l.machineId);
      });

      expect(scoped.result).toEqual(["m-1", "m-2", "m-3"]);
      expect(fake.released.map((r) => r.machineId)).toEqual(["m-1", "m-2", "m-3"]);
      expect(fake.leases.size).toBe(0);
    });

    it("releases the leases already taken when a later acquisition fails", async () => {
      fake.leases.set("m-3", "someone-else");
      const fn = vi.fn(async () => "never");

      await expect(leases.withLeases(["m-1", "m-2", "m-3"], fn)).rejects.toBeInstanceOf(LeaseConflictError);

      expect(fn).not.toHaveBeenCalled();
      expect(fake.released.map((r) => r.machineId)).toEqual(["m-1", "m-2"]);
      expect([...fake.leases.entries()]).toEqual([["m-3", "someone-else"]]);
    });
  });
});
