import { log } from "apify";
import { errorMessage } from "../runtime/errors";

export type IncidentKind =
  | "node_creation_failed"
  | "runtime_unreachable"
  | "node_retired"
  | "job_abandoned";

export interface IncidentEvent {
  id: string;
  level: "warning" | "critical";
  kind: IncidentKind;
  subject: string;
  message: string;
  details: Record<string, unknown> | null;
  timestamp: string;
}

export interface IncidentReporterSnapshot {
  total_events: number;
  by_kind: Partial<Record<IncidentKind, number>>;
  recent: IncidentEvent[];
  webhook_enabled: boolean;
}

export interface IncidentReporterConfig {
  webhookUrl: string | null;
  maxRecentEvents: number;
  webhookTimeoutMs?: number;
}

const DEFAULT_WEBHOOK_TIMEOUT_MS = 5000;

export type IncidentInput = Omit<IncidentEvent, "id" | "timestamp" | "details"> & {
  details?: Record<string, unknown> | null;
};

export class IncidentReporter {
  private readonly config: IncidentReporterConfig;
  private readonly events: IncidentEvent[] = [];
  private readonly counts: Partial<Record<IncidentKind, number>> = {};
  private total = 0;

  public constructor(config: IncidentReporterConfig) {
    this.config = config;
  }

  public async report(event: IncidentInput): Promise<void> {
    const incident: IncidentEvent = {
      ...event,
      details: event.details ?? null,
      id: `inc_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`,
      timestamp: new Date().toISOString(),
    };
    this.total += 1;
    this.counts[incident.kind] = (this.counts[incident.kind] ?? 0) + 1;
    this.events.push(incident);
    if (this.events.length > this.config.maxRecentEvents) {
      this.events.splice(0, this.events.length - this.config.maxRecentEvents);
    }

    const logData = { ...incident };
    if (incident.level === "critical") log.error("Process health incident", logData);
    else log.warning("Process health incident", logData);

    await this.deliver(incident);
  }

  public snapshot(): IncidentReporterSnapshot {
    return {
      total_events: this.total,
      by_kind: { ...this.counts },
      recent: [...this.events],
      webhook_enabled: Boolean(this.config.webhookUrl),
    };
  }

  /** Webhook delivery is best effort and bounded; a failed POST is logged and dropped. */
  private async deliver(incident: IncidentEvent): Promise<void> {
    if (!this.config.webhookUrl) return;
    try {
      const response = await fetch(this.config.webhookUrl, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(incident),
        signal: AbortSignal.timeout(this.config.webhookTimeoutMs ?? DEFAULT_WEBHOOK_TIMEOUT_MS),
      });
      await response.body?.cancel();
      if (!response.ok) {
        log.warning("Incident webhook answered with an error status.", {
          incidentId: incident.id,
          status: response.status,
        });
      }
    } catch (error) {
      log.warning("Failed sending incident webhook.", {
        incidentId: incident.id,
        error: errorMessage(error),
      });
    }
  }
}
