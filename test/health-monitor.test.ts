import { afterEach, describe, expect, it, vi } from "vitest";
import { HealthMonitor, type ProbeOutcome } from "../src/reliability/health-monitor";
import { NodeCreationFailedError } from "../src/runtime/errors";
import { createTestPool } from "./helpers/fakes";

const fail = { ok: false, error: "HTTP 500" } as const;

const quarantinedPool = async () => {
  const fixture = createTestPool({ minSize: 1, maxSize: 1 }, { failureThreshold: 3, retireThreshold: 6 });
  await fixture.pool.start();
  for (let round = 0; round < 3; round += 1) {
    const lease = await fixture.pool.checkout();
    fixture.pool.checkin(lease.nodeId, fail);
  }
  const [node] = fixture.pool.snapshot().nodes;
  return { ...fixture, nodeId: node.id };
};

describe("HealthMonitor", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("restores a quarantined node after a healthy probe", async () => {
    const { pool, prober, policy, nodeId } = await quarantinedPool();
    expect(pool.view(nodeId)?.state).toBe("quarantined");

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    await expect(monitor.probeNode(nodeId)).resolves.toBe("healthy");

    const view = pool.view(nodeId);
    expect(view?.state).toBe("ready");
    expect(view?.consecutiveFailures).toBe(0);
  });

  it("keeps a quarantined node out of rotation while probes fail", async () => {
    const { pool, prober, policy, nodeId } = await quarantinedPool();
    prober.healthy = false;

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    await expect(monitor.probeNode(nodeId)).resolves.toBe("rotated");

    expect(pool.view(nodeId)?.state).toBe("quarantined");
    expect(pool.view(nodeId)?.consecutiveFailures).toBe(0);
  });

  it("rotates a node whose probes keep failing, then quarantines it", async () => {
    const { pool, prober, policy, control } = createTestPool({ minSize: 1, maxSize: 1 }, { failureThreshold: 3 });
    await pool.start();
    const [node] = pool.snapshot().nodes;
    prober.healthy = false;

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    await expect(monitor.probeNode(node.id)).resolves.toBe("unhealthy");
    expect(pool.view(node.id)?.state).toBe("ready");
    await expect(monitor.probeNode(node.id)).resolves.toBe("unhealthy");
    await expect(monitor.probeNode(node.id)).resolves.toBe("rotated");

    expect(control.calls).toHaveLength(1);
    const view = pool.view(node.id);
    expect(view?.state).toBe("quarantined");
    expect(view?.rotations).toBe(1);
  });

  it("retires a node when rotation does not help", async () => {
    const { pool, prober, policy, control, containers } = createTestPool(
      { minSize: 1, maxSize: 1 },
      { failureThreshold: 3, retireThreshold: 6 },
    );
    await pool.start();
    const [node] = pool.snapshot().nodes;
    prober.failing.add(node.id);
    control.fail = true;

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    const outcomes: ProbeOutcome[] = [];
    for (let round = 0; round < 6; round += 1) {
      outcomes.push(await monitor.probeNode(node.id));
    }
    await pool.settled();

    expect(outcomes).toEqual(["unhealthy", "unhealthy", "unhealthy", "unhealthy", "unhealthy", "retired"]);
    expect(control.calls).toHaveLength(3);
    expect(pool.view(node.id)).toBeNull();
    expect(containers.stopped).toEqual(["exitnode_test1"]);
    expect(pool.snapshot().size).toBe(1);
    expect(pool.snapshot().counts.ready).toBe(1);
  });

  it("retires a node that stays quarantined past the ceiling", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    const { pool, prober, policy, nodeId } = await quarantinedPool();
    prober.healthy = false;
    vi.setSystemTime(Date.now() + 400000);

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    await expect(monitor.probeNode(nodeId)).resolves.toBe("retired");
    await pool.settled();
    expect(pool.view(nodeId)).toBeNull();
  });

  it("rotates a healthy node once its identity is older than the maximum age", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    const { pool, prober, policy, control } = createTestPool({ minSize: 1, maxSize: 1 }, { maxAgeMs: 1000 });
    await pool.start();
    const [node] = pool.snapshot().nodes;
    vi.setSystemTime(Date.now() + 5000);

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    await expect(monitor.probeNode(node.id)).resolves.toBe("rotated");

    expect(control.calls).toEqual([{ host: "127.0.0.1", port: 30001 }]);
    expect(pool.view(node.id)?.state).toBe("ready");
  });

  it("skips nodes lent to jobs during a sweep", async () => {
    const { pool, prober, policy } = createTestPool({ minSize: 2, maxSize: 2 });
    await pool.start();
    const lease = await pool.checkout();

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    await expect(monitor.tick()).resolves.toEqual(["healthy"]);
    await expect(monitor.probeNode(lease.nodeId)).resolves.toBe("skipped");

    expect(prober.calls.filter((call) => call.nodeId === lease.nodeId)).toHaveLength(1);
    expect(monitor.getStatus().ticks).toBe(1);
  });

  it("shares one probe between concurrent callers", async () => {
    const { pool, prober, policy } = createTestPool({ minSize: 1, maxSize: 1 });
    await pool.start();
    const [node] = pool.snapshot().nodes;

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    const [first, second] = await Promise.all([monitor.probeNode(node.id), monitor.probeNode(node.id)]);

    expect(first).toBe("healthy");
    expect(second).toBe("healthy");
    expect(prober.calls).toHaveLength(2);
  });

  it("counts a throwing prober as an unhealthy probe", async () => {
    const { pool, prober, policy } = createTestPool({ minSize: 1, maxSize: 1 });
    await pool.start();
    const [node] = pool.snapshot().nodes;
    vi.spyOn(prober, "probe").mockRejectedValueOnce(new Error("socket hang up"));

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    await expect(monitor.probeNode(node.id)).resolves.toBe("unhealthy");
    expect(pool.view(node.id)?.consecutiveFailures).toBe(1);
    expect(pool.view(node.id)?.state).toBe("ready");
  });

  it("restores the minimum size on each sweep", async () => {
    const { pool, prober, policy, containers } = createTestPool({ minSize: 1, maxSize: 2 });
    await pool.start();
    const [node] = pool.snapshot().nodes;
    containers.startFailures.push(new NodeCreationFailedError("docker run failed"));
    await pool.retire(node.id);
    await pool.settled();
    expect(pool.snapshot().size).toBe(0);

    const monitor = new HealthMonitor({ intervalMs: 1000 }, { pool, prober, policy });
    monitor.start();
    expect(monitor.getStatus().running).toBe(true);
    await expect(monitor.tick()).resolves.toEqual([]);
    await pool.settled();
    await monitor.stop();

    expect(pool.snapshot().size).toBe(1);
    expect(pool.snapshot().counts.ready).toBe(1);
    expect(monitor.getStatus().running).toBe(false);
  });
});
