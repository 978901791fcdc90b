export interface RotationSubject {
  lastRotatedAt: number;
  consecutiveFailures: number;
  /** Cumulative time spent quarantined, including a quarantine still in progress. */
  quarantinedMs: number;
}

export interface RotationPolicy {
  readonly name: string;
  shouldRotate(node: RotationSubject, now?: number): boolean;
  /** Failure streak alone; an old identity keeps serving until the monitor rotates it. */
  shouldQuarantine(node: RotationSubject): boolean;
  shouldRetire(node: RotationSubject, now?: number): boolean;
}

export interface RotationThresholds {
  maxAgeMs: number;
  failureThreshold: number;
  retireThreshold: number;
  quarantineCeilingMs: number;
}

export class ThresholdRotationPolicy implements RotationPolicy {
  public readonly name: string;
  private readonly thresholds: RotationThresholds;

  public constructor(thresholds: RotationThresholds, name = "default") {
    this.thresholds = { ...thresholds };
    this.name = name;
  }

  public shouldRotate(node: RotationSubject, now = Date.now()): boolean {
    return (
      now - node.lastRotatedAt > this.thresholds.maxAgeMs ||
      node.consecutiveFailures >= this.thresholds.failureThreshold
    );
  }

  public shouldQuarantine(node: RotationSubject): boolean {
    return node.consecutiveFailures >= this.thresholds.failureThreshold;
  }

  public shouldRetire(node: RotationSubject): boolean {
    return (
      node.consecutiveFailures >= this.thresholds.retireThreshold ||
      node.quarantinedMs > this.thresholds.quarantineCeilingMs
    );
  }
}

const halve = (value: number): number => Math.max(1, Math.floor(value / 2));

/** Same shape, half the tolerance. Meant for targets that fingerprint aggressively. */
export const createStrictPolicy = (base: RotationThresholds): ThresholdRotationPolicy =>
  new ThresholdRotationPolicy(
    {
      maxAgeMs: halve(base.maxAgeMs),
      failureThreshold: halve(base.failureThreshold),
      retireThreshold: halve(base.retireThreshold),
      quarantineCeilingMs: halve(base.quarantineCeilingMs),
    },
    "strict",
  );

const hostnameOf = (targetUrl: string): string | null => {
  try {
    return new URL(targetUrl).hostname.toLowerCase();
  } catch {
    return null;
  }
};

export class PolicySelector {
  private readonly fallback: RotationPolicy;
  private readonly strict: RotationPolicy;
  private readonly strictHosts: string[];

  public constructor(fallback: RotationPolicy, strict: RotationPolicy, strictHosts: string[]) {
    this.fallback = fallback;
    this.strict = strict;
    this.strictHosts = strictHosts.map((host) => host.trim().toLowerCase()).filter(Boolean);
  }

  public forTarget(targetUrl: string): RotationPolicy {
    const hostname = hostnameOf(targetUrl);
    if (!hostname) return this.fallback;
    const matches = this.strictHosts.some(
      (host) => hostname === host || hostname.endsWith(`.${host}`),
    );
    return matches ? this.strict : this.fallback;
  }
}
