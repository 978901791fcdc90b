import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { IncidentReporter } from "../src/reliability/incident-reporter";

const listen = async (server: Server): Promise<number> =>
  new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === "object" && address !== null ? address.port : 0);
    });
  });

describe("IncidentReporter", () => {
  const servers: Server[] = [];

  afterEach(async () => {
    await Promise.all(
      servers.splice(0).map(
        async (server) =>
          new Promise<void>((resolve) => {
            server.closeAllConnections();
            server.close(() => resolve());
          }),
      ),
    );
  });

  it("keeps the most recent events and counts every kind", async () => {
    const reporter = new IncidentReporter({ webhookUrl: null, maxRecentEvents: 2 });

    await reporter.report({ level: "warning", kind: "node_creation_failed", subject: "exit_1", message: "a" });
    await reporter.report({ level: "warning", kind: "node_creation_failed", subject: "exit_2", message: "b" });
    await reporter.report({ level: "critical", kind: "runtime_unreachable", subject: "docker", message: "c" });

    const snapshot = reporter.snapshot();
    expect(snapshot.total_events).toBe(3);
    expect(snapshot.by_kind).toEqual({ node_creation_failed: 2, runtime_unreachable: 1 });
    expect(snapshot.recent.map((event) => event.message)).toEqual(["b", "c"]);
    expect(snapshot.recent[1]?.details).toBeNull();
    expect(snapshot.recent[1]?.id).toMatch(/^inc_\d+_[a-z0-9]+$/);
    expect(snapshot.webhook_enabled).toBe(false);
  });

  it("posts each incident to the webhook", async () => {
    const received: unknown[] = [];
    const server = createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on("data", (chunk: Buffer) => chunks.push(chunk));
      req.on("end", () => {
        received.push(JSON.parse(Buffer.concat(chunks).toString("utf8")));
        res.statusCode = 204;
        res.end();
      });
    });
    servers.push(server);
    const port = await listen(server);

    const reporter = new IncidentReporter({ webhookUrl: `http://127.0.0.1:${port}/hook`, maxRecentEvents: 10 });
    await reporter.report({
      level: "critical",
      kind: "node_retired",
      subject: "exit_3",
      message: "Node retired after failed rotations.",
      details: { rotations: 2 },
    });

    expect(reporter.snapshot().webhook_enabled).toBe(true);
    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({
      level: "critical",
      kind: "node_retired",
      subject: "exit_3",
      message: "Node retired after failed rotations.",
      details: { rotations: 2 },
    });
  });

  it("records the incident even when the webhook is unreachable", async () => {
    const server = createServer();
    const port = await listen(server);
    await new Promise<void>((resolve) => server.close(() => resolve()));

    const reporter = new IncidentReporter({ webhookUrl: `http://127.0.0.1:${port}/hook`, maxRecentEvents: 10 });
    await expect(
      reporter.report({ level: "warning", kind: "job_abandoned", subject: "job_1", message: "gave up" }),
    ).resolves.toBeUndefined();

    expect(reporter.snapshot().total_events).toBe(1);
  });
});
