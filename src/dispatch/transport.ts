import { ProxyAgent, fetch as undiciFetch } from "undici";
import { RequestFailedError, RequestTimeoutError, errorMessage } from "../runtime/errors";
import { endpointUrl, type Endpoint } from "../runtime/types";
import type { ScrapeArtifact, ScrapeRequest } from "./types";

export interface ScrapeTransport {
  fetch(request: ScrapeRequest): Promise<ScrapeArtifact>;
  /** Drops any connection state kept for a proxy that left the pool. */
  release(proxy: Endpoint): Promise<void>;
  close(): Promise<void>;
}

export interface ProxyHttpTransportConfig {
  userAgent?: string;
  headers?: Record<string, string>;
}

const BLOCKED_STATUSES = new Set([403, 429]);

const describeCause = (error: unknown): string => {
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return errorMessage(error);
};

/** Routes every request through the node's HTTP tunnel port with one undici agent per proxy. */
export class ProxyHttpTransport implements ScrapeTransport {
  private readonly config: ProxyHttpTransportConfig;
  private readonly agents = new Map<string, ProxyAgent>();

  public constructor(config: ProxyHttpTransportConfig = {}) {
    this.config = config;
  }

  public async fetch(request: ScrapeRequest): Promise<ScrapeArtifact> {
    const started = Date.now();
    const dispatcher = this.agentFor(request.proxy);
    const headers: Record<string, string> = {
      accept: "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8",
      ...this.config.headers,
    };
    if (this.config.userAgent) headers["user-agent"] = this.config.userAgent;

    try {
      const response = await undiciFetch(request.url, {
        dispatcher,
        signal: request.signal,
        redirect: "follow",
        headers,
      });
      const body = await response.text();

      if (!response.ok) {
        throw new RequestFailedError(`Target answered HTTP ${response.status}.`, {
          httpStatus: response.status,
          blocked: BLOCKED_STATUSES.has(response.status),
          details: { url: request.url },
        });
      }

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      return {
        url: request.url,
        finalUrl: response.url || request.url,
        statusCode: response.status,
        headers: responseHeaders,
        body,
        bodyBytes: Buffer.byteLength(body, "utf8"),
        fetchedAt: new Date().toISOString(),
        durationMs: Date.now() - started,
      };
    } catch (error) {
      if (error instanceof RequestFailedError) throw error;
      if (request.signal.aborted) {
        throw new RequestTimeoutError(request.timeoutMs, { url: request.url });
      }
      throw new RequestFailedError(`Request through exit node failed: ${describeCause(error)}`, {
        details: { url: request.url },
      });
    }
  }

  public async release(proxy: Endpoint): Promise<void> {
    const key = endpointUrl(proxy);
    const agent = this.agents.get(key);
    if (!agent) return;
    this.agents.delete(key);
    await agent.close();
  }

  public async close(): Promise<void> {
    const agents = [...this.agents.values()];
    this.agents.clear();
    await Promise.all(agents.map(async (agent) => agent.close()));
  }

  private agentFor(proxy: Endpoint): ProxyAgent {
    const key = endpointUrl(proxy);
    const existing = this.agents.get(key);
    if (existing) return existing;
    const agent = new ProxyAgent(key);
    this.agents.set(key, agent);
    return agent;
  }
}
