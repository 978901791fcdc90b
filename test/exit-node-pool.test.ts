import { afterEach, describe, expect, it, vi } from "vitest";
import {
  NodeCreationFailedError,
  PoolExhaustedError,
  PoolShuttingDownError,
  RuntimeUnavailableError,
} from "../src/runtime/errors";
import { ExitNodePool } from "../src/runtime/exit-node-pool";
import { DEFAULT_POOL_CONFIG, createTestPool } from "./helpers/fakes";

const fail = { ok: false, error: "HTTP 500" } as const;

describe("ExitNodePool", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("start", () => {
    it("grows to the minimum size with probed nodes", async () => {
      const { pool, containers, prober } = createTestPool({ minSize: 2, maxSize: 5 });
      await pool.start();

      const snapshot = pool.snapshot();
      expect(snapshot.size).toBe(2);
      expect(snapshot.counts.ready).toBe(2);
      expect(snapshot.created).toBe(2);
      expect(containers.started.map((handle) => handle.id)).toEqual(["exitnode_test1", "exitnode_test2"]);
      expect(prober.calls).toHaveLength(2);
      expect(snapshot.nodes[0].exitAddress).toBe("198.51.100.7");
    });

    it("discards a node whose first probe fails", async () => {
      const { pool, containers, prober } = createTestPool({ minSize: 1, maxSize: 1 });
      prober.healthy = false;
      await pool.start();

      expect(pool.snapshot().size).toBe(0);
      expect(pool.snapshot().creationFailures).toBe(1);
      expect(containers.stopped).toEqual(["exitnode_test1"]);
    });
  });

  describe("checkout", () => {
    it("lends the least recently used node", async () => {
      const { pool } = createTestPool({ minSize: 2, maxSize: 2 });
      await pool.start();

      const first = await pool.checkout();
      const second = await pool.checkout();
      expect(first.nodeId).not.toBe(second.nodeId);
      expect(first.purpose).toBe("job");

      pool.checkin(first.nodeId, { ok: true });
      pool.checkin(second.nodeId, { ok: true });

      const third = await pool.checkout();
      expect(third.nodeId).toBe(first.nodeId);
    });

    it("never lends a node twice", async () => {
      const { pool } = createTestPool({ minSize: 1, maxSize: 1, checkoutTimeoutMs: 20 });
      await pool.start();

      const held = await pool.checkout();
      await expect(pool.checkout()).rejects.toBeInstanceOf(PoolExhaustedError);
      expect(pool.view(held.nodeId)?.state).toBe("in_use");
    });

    it("rejects with PoolExhaustedError once the checkout timeout passes", async () => {
      vi.useFakeTimers();
      const { pool } = createTestPool({ minSize: 1, maxSize: 1, checkoutTimeoutMs: 500 });
      await pool.start();

      await pool.checkout();
      const pending = pool.checkout();
      const assertion = expect(pending).rejects.toBeInstanceOf(PoolExhaustedError);
      expect(pool.snapshot().waiters).toBe(1);

      await vi.advanceTimersByTimeAsync(500);
      await assertion;
      expect(pool.snapshot().waiters).toBe(0);
    });

    it("hands a returned node straight to the oldest waiter", async () => {
      const { pool } = createTestPool({ minSize: 1, maxSize: 1, checkoutTimeoutMs: 1000 });
      await pool.start();

      const held = await pool.checkout();
      const waiting = pool.checkout();
      pool.checkin(held.nodeId, { ok: true });

      const lease = await waiting;
      expect(lease.nodeId).toBe(held.nodeId);
      expect(lease.leaseId).not.toBe(held.leaseId);
      expect(pool.view(held.nodeId)?.state).toBe("in_use");
    });

    it("grows on demand without passing the maximum size", async () => {
      const { pool, containers } = createTestPool({ minSize: 0, maxSize: 3, checkoutTimeoutMs: 50 });
      await pool.start();
      expect(pool.snapshot().size).toBe(0);

      const results = await Promise.allSettled([1, 2, 3, 4, 5].map(async () => pool.checkout()));

      const lent = results.filter((result) => result.status === "fulfilled");
      const rejected = results.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));
      expect(lent).toHaveLength(3);
      expect(rejected).toHaveLength(2);
      expect(rejected.every((reason) => reason instanceof PoolExhaustedError)).toBe(true);
      expect(containers.started).toHaveLength(3);
      expect(pool.snapshot().size).toBe(3);
    });
  });

  describe("checkin", () => {
    it("returns the node to ready while failures stay under the rotation threshold", async () => {
      const { pool } = createTestPool({ minSize: 1, maxSize: 1 });
      await pool.start();

      const lease = await pool.checkout();
      pool.checkin(lease.nodeId, fail);

      const view = pool.view(lease.nodeId);
      expect(view?.state).toBe("ready");
      expect(view?.consecutiveFailures).toBe(1);
      expect(view?.failures).toBe(1);
    });

    it("quarantines a node at the failure threshold and stops lending it", async () => {
      const { pool } = createTestPool({ minSize: 1, maxSize: 1, checkoutTimeoutMs: 20 }, { failureThreshold: 3 });
      await pool.start();

      let nodeId = "";
      for (let round = 0; round < 3; round += 1) {
        const lease = await pool.checkout();
        nodeId = lease.nodeId;
        pool.checkin(lease.nodeId, fail);
      }

      expect(pool.view(nodeId)?.state).toBe("quarantined");
      expect(pool.snapshot().counts.quarantined).toBe(1);
      await expect(pool.checkout()).rejects.toBeInstanceOf(PoolExhaustedError);
    });

    it("keeps an old identity in service after a single failure", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      const { pool } = createTestPool({ minSize: 1, maxSize: 1 }, { maxAgeMs: 1000, failureThreshold: 3 });
      await pool.start();
      vi.setSystemTime(Date.now() + 5000);

      const lease = await pool.checkout();
      pool.checkin(lease.nodeId, fail);

      expect(pool.view(lease.nodeId)?.state).toBe("ready");
      expect(pool.snapshot().counts.quarantined).toBe(0);
    });

    it("returns a cancelled lease without touching the node's counters", async () => {
      const { pool } = createTestPool({ minSize: 1, maxSize: 1 }, { failureThreshold: 1, retireThreshold: 1 });
      await pool.start();

      const lease = await pool.checkout();
      pool.checkin(lease.nodeId, { ok: false, cancelled: true });
      await pool.settled();

      const view = pool.view(lease.nodeId);
      expect(view?.state).toBe("ready");
      expect(view?.failures).toBe(0);
      expect(view?.successes).toBe(0);
      expect(pool.snapshot().retired).toBe(0);
    });

    it("resets the failure streak on success", async () => {
      const { pool } = createTestPool({ minSize: 1, maxSize: 1 });
      await pool.start();

      const first = await pool.checkout();
      pool.checkin(first.nodeId, fail);
      const second = await pool.checkout();
      pool.checkin(second.nodeId, { ok: true });

      expect(pool.view(first.nodeId)?.consecutiveFailures).toBe(0);
      expect(pool.view(first.nodeId)?.successes).toBe(1);
    });

    it("ignores a checkin for a node that is not lent", async () => {
      const { pool } = createTestPool({ minSize: 1, maxSize: 1 });
      await pool.start();
      const [node] = pool.snapshot().nodes;

      pool.checkin(node.id, { ok: true });
      pool.checkin("exit_unknown", { ok: true });

      expect(pool.view(node.id)?.state).toBe("ready");
      expect(pool.view(node.id)?.successes).toBe(0);
    });

    it("retires a node that reaches the retirement threshold", async () => {
      const { pool, containers } = createTestPool(
        { minSize: 1, maxSize: 1 },
        { failureThreshold: 10, retireThreshold: 2 },
      );
      await pool.start();

      const first = await pool.checkout();
      pool.checkin(first.nodeId, fail);
      const second = await pool.checkout();
      pool.checkin(second.nodeId, fail);
      await pool.settled();

      expect(pool.view(first.nodeId)).toBeNull();
      expect(containers.stopped).toEqual(["exitnode_test1"]);
      expect(pool.snapshot().size).toBe(1);
      expect(pool.snapshot().retired).toBe(1);
    });
  });

  describe("probe leases", () => {
    it("excludes a probed node from job checkout", async () => {
      const { pool } = createTestPool({ minSize: 1, maxSize: 1, checkoutTimeoutMs: 20 });
      await pool.start();
      const [node] = pool.snapshot().nodes;

      const probe = pool.acquireProbe(node.id);
      expect(probe?.purpose).toBe("probe");
      expect(pool.acquireProbe(node.id)).toBeNull();
      await expect(pool.checkout()).rejects.toBeInstanceOf(PoolExhaustedError);

      if (probe) pool.releaseProbe(probe);
      expect(pool.view(node.id)?.state).toBe("ready");
    });

    it("does not probe a node lent to a job", async () => {
      const { pool } = createTestPool({ minSize: 1, maxSize: 1 });
      await pool.start();

      const lease = await pool.checkout();
      expect(pool.acquireProbe(lease.nodeId)).toBeNull();
      expect(pool.probeCandidates()).toEqual([]);
    });

    it("rotates identity through the node's control endpoint", async () => {
      const { pool, control } = createTestPool({ minSize: 1, maxSize: 1 });
      await pool.start();
      const [node] = pool.snapshot().nodes;

      const probe = pool.acquireProbe(node.id);
      expect(probe).not.toBeNull();
      if (!probe) return;

      await expect(pool.rotate(probe)).resolves.toBe(true);
      pool.releaseProbe(probe);

      expect(control.calls).toEqual([{ host: "127.0.0.1", port: 30001 }]);
      const view = pool.view(node.id);
      expect(view?.rotations).toBe(1);
      expect(view?.exitAddress).toBeNull();
      expect(view?.state).toBe("ready");
    });

    it("reports a failed rotation without changing the node", async () => {
      const { pool, control } = createTestPool({ minSize: 1, maxSize: 1 });
      await pool.start();
      const [node] = pool.snapshot().nodes;
      control.fail = true;

      const probe = pool.acquireProbe(node.id);
      if (!probe) throw new Error("expected a probe lease");
      await expect(pool.rotate(probe)).resolves.toBe(false);
      pool.releaseProbe(probe);

      expect(pool.view(node.id)?.rotations).toBe(0);
    });
  });

  describe("retire", () => {
    it("is a no-op the second time", async () => {
      const { pool, containers } = createTestPool({ minSize: 1, maxSize: 2 });
      await pool.start();
      const [node] = pool.snapshot().nodes;

      await pool.retire(node.id);
      await expect(pool.retire(node.id)).resolves.toBeUndefined();
      await pool.settled();

      expect(containers.stopped).toEqual(["exitnode_test1"]);
      expect(pool.view(node.id)).toBeNull();
      expect(pool.snapshot().size).toBe(1);
      expect(pool.snapshot().nodes[0].id).not.toBe(node.id);
    });

    it("tears a node down once when retired concurrently", async () => {
      const { pool, containers } = createTestPool({ minSize: 1, maxSize: 1 });
      await pool.start();
      const [node] = pool.snapshot().nodes;

      await Promise.all([pool.retire(node.id), pool.retire(node.id), pool.retire(node.id)]);

      expect(containers.stopped).toEqual(["exitnode_test1"]);
    });

    it("defers retirement of a lent node until it is checked in", async () => {
      const { pool, containers } = createTestPool({ minSize: 1, maxSize: 1 });
      await pool.start();

      const lease = await pool.checkout();
      await pool.retire(lease.nodeId);
      expect(pool.view(lease.nodeId)?.state).toBe("in_use");
      expect(containers.stopped).toEqual([]);

      pool.checkin(lease.nodeId, { ok: true });
      expect(pool.view(lease.nodeId)?.state).toBe("retiring");
      await pool.settled();

      expect(pool.view(lease.nodeId)).toBeNull();
      expect(containers.stopped).toEqual(["exitnode_test1"]);
    });

    it("releases the proxy endpoint before terminating", async () => {
      const { runtime, prober, policy } = createTestPool();
      const released: number[] = [];
      const pool = new ExitNodePool(
        { ...DEFAULT_POOL_CONFIG, minSize: 1, maxSize: 1 },
        {
          runtime,
          prober,
          policy,
          releaseProxy: async (proxy) => {
            released.push(proxy.port);
          },
        },
      );
      await pool.start();
      const [node] = pool.snapshot().nodes;
      await pool.drain(100);

      expect(node.proxy?.port).toBe(20001);
      expect(released).toEqual([20001]);
    });
  });

  describe("creation failures", () => {
    it("pauses growth for the cooldown after a failure", async () => {
      const { pool, containers } = createTestPool({ minSize: 1, maxSize: 1, creationCooldownMs: 60000 });
      containers.startFailures.push(new NodeCreationFailedError("docker run failed"));
      await pool.start();

      pool.ensureMinimum();
      await pool.settled();

      const snapshot = pool.snapshot();
      expect(snapshot.size).toBe(0);
      expect(snapshot.creationFailures).toBe(1);
      expect(snapshot.growthCooldownUntil).not.toBeNull();
      expect(containers.started).toHaveLength(0);
    });

    it("marks the runtime unreachable after consecutive unavailability and recovers", async () => {
      const { pool, containers } = createTestPool({ minSize: 1, maxSize: 1, runtimeUnreachableThreshold: 3 });
      for (let index = 0; index < 3; index += 1) {
        containers.startFailures.push(new RuntimeUnavailableError("Container runtime binary not found."));
      }

      await pool.start();
      expect(pool.isRuntimeReachable()).toBe(true);
      pool.ensureMinimum();
      await pool.settled();
      expect(pool.isRuntimeReachable()).toBe(true);
      pool.ensureMinimum();
      await pool.settled();
      expect(pool.isRuntimeReachable()).toBe(false);
      expect(pool.snapshot().runtimeReachable).toBe(false);

      pool.ensureMinimum();
      await pool.settled();
      expect(pool.isRuntimeReachable()).toBe(true);
      expect(pool.snapshot().size).toBe(1);
      expect(pool.snapshot().creationFailures).toBe(3);
    });
  });

  describe("drain", () => {
    it("rejects waiters, waits for leases, then retires every node", async () => {
      const { pool, containers } = createTestPool({ minSize: 1, maxSize: 1, checkoutTimeoutMs: 5000 });
      await pool.start();

      const held = await pool.checkout();
      const waiting = pool.checkout();
      const waitingAssertion = expect(waiting).rejects.toBeInstanceOf(PoolShuttingDownError);

      const drained = pool.drain(1000);
      await waitingAssertion;
      expect(pool.isAccepting()).toBe(false);

      pool.checkin(held.nodeId, { ok: true });
      await drained;

      expect(pool.snapshot().size).toBe(0);
      expect(containers.stopped).toEqual(["exitnode_test1"]);
      await expect(pool.checkout()).rejects.toBeInstanceOf(PoolShuttingDownError);
    });

    it("retires lent nodes anyway once the drain timeout passes", async () => {
      const { pool, containers } = createTestPool({ minSize: 1, maxSize: 1 });
      await pool.start();

      const held = await pool.checkout();
      await pool.drain(20);

      expect(pool.view(held.nodeId)).toBeNull();
      expect(containers.stopped).toEqual(["exitnode_test1"]);
    });
  });
});
