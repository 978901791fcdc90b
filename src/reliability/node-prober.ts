import type { ScrapeTransport } from "../dispatch/transport";
import { errorMessage } from "../runtime/errors";
import type { Endpoint } from "../runtime/types";

export interface ProbeSubject {
  nodeId: string;
  proxy: Endpoint;
}

export interface ProbeResult {
  healthy: boolean;
  latencyMs: number;
  exitAddress: string | null;
  error: string | null;
}

export interface NodeProber {
  probe(subject: ProbeSubject): Promise<ProbeResult>;
}

export interface HttpNodeProberConfig {
  transport: ScrapeTransport;
  probeUrl: string;
  timeoutMs: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Accepts either a JSON answer (`{"IsTor":true,"IP":"…"}`) or a plain-text
 * IP echo. A JSON answer with `IsTor: false` means traffic is not leaving
 * through Tor.
 */
export const parseExitAnswer = (body: string): { exitAddress: string | null; isTor: boolean | null } => {
  const trimmed = body.trim();
  if (trimmed.startsWith("{")) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (isRecord(parsed)) {
        const ip = typeof parsed.IP === "string" ? parsed.IP.trim() : null;
        const isTor = typeof parsed.IsTor === "boolean" ? parsed.IsTor : null;
        return { exitAddress: ip || null, isTor };
      }
    } catch {
      return { exitAddress: null, isTor: null };
    }
  }
  if (trimmed.length > 0 && trimmed.length <= 64 && !/\s/.test(trimmed)) {
    return { exitAddress: trimmed, isTor: null };
  }
  return { exitAddress: null, isTor: null };
};

export class HttpNodeProber implements NodeProber {
  private readonly config: HttpNodeProberConfig;

  public constructor(config: HttpNodeProberConfig) {
    this.config = config;
  }

  public async probe(subject: ProbeSubject): Promise<ProbeResult> {
    const started = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const artifact = await this.config.transport.fetch({
        url: this.config.probeUrl,
        proxy: subject.proxy,
        signal: controller.signal,
        timeoutMs: this.config.timeoutMs,
      });
      const answer = parseExitAnswer(artifact.body);
      if (answer.isTor === false) {
        return {
          healthy: false,
          latencyMs: Date.now() - started,
          exitAddress: answer.exitAddress,
          error: "Probe target reports the exit is not a Tor exit.",
        };
      }
      return {
        healthy: true,
        latencyMs: Date.now() - started,
        exitAddress: answer.exitAddress,
        error: null,
      };
    } catch (error) {
      return {
        healthy: false,
        latencyMs: Date.now() - started,
        exitAddress: null,
        error: errorMessage(error),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
