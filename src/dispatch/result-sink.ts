import type { ScrapeArtifact, ScrapeJob } from "./types";

/** Receives terminal job outcomes. Calls are bounded by the scheduler's handoff timeout. */
export interface ResultSink {
  onSucceeded(jobId: string, artifact: ScrapeArtifact, job: ScrapeJob): Promise<void>;
  onAbandoned(jobId: string, reason: string, job: ScrapeJob): Promise<void>;
}

/** The slice of an Apify dataset this sink writes through. */
export interface DatasetWriter {
  pushData(item: Record<string, unknown>): Promise<void>;
}

export interface DatasetResultSinkConfig {
  includeBody: boolean;
}

export class DatasetResultSink implements ResultSink {
  private readonly dataset: DatasetWriter;
  private readonly config: DatasetResultSinkConfig;

  public constructor(dataset: DatasetWriter, config: DatasetResultSinkConfig = { includeBody: true }) {
    this.dataset = dataset;
    this.config = config;
  }

  public async onSucceeded(jobId: string, artifact: ScrapeArtifact, job: ScrapeJob): Promise<void> {
    await this.dataset.pushData({
      job_id: jobId,
      status: "succeeded",
      target_url: job.targetUrl,
      final_url: artifact.finalUrl,
      status_code: artifact.statusCode,
      attempts: job.attempt + 1,
      fetched_at: artifact.fetchedAt,
      duration_ms: artifact.durationMs,
      body_bytes: artifact.bodyBytes,
      headers: artifact.headers,
      body: this.config.includeBody ? artifact.body : null,
      metadata: job.metadata,
    });
  }

  public async onAbandoned(jobId: string, reason: string, job: ScrapeJob): Promise<void> {
    await this.dataset.pushData({
      job_id: jobId,
      status: "abandoned",
      target_url: job.targetUrl,
      attempts: job.attempt,
      reason,
      metadata: job.metadata,
    });
  }
}
