type LabelValue = string | number | boolean | null | undefined;
type Labels = Record<string, LabelValue>;

const escapeLabel = (value: string): string =>
  value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");

const normalizeLabels = (labels: Labels = {}): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const key of Object.keys(labels).sort((a, b) => a.localeCompare(b))) {
    const value = labels[key];
    if (value === undefined || value === null) continue;
    out[key] = String(value);
  }
  return out;
};

const formatLabels = (labels: Record<string, string>): string => {
  const keys = Object.keys(labels);
  if (keys.length === 0) return "";
  return `{${keys.map((key) => `${key}="${escapeLabel(labels[key])}"`).join(",")}}`;
};

interface Series<T> {
  name: string;
  labels: Record<string, string>;
  value: T;
}

interface HistogramValue {
  bucketCounts: number[];
  sum: number;
  count: number;
}

const DEFAULT_MS_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000];

const seriesKey = (name: string, labels: Record<string, string>): string =>
  `${name}${formatLabels(labels)}`;

export class MetricsRegistry {
  private readonly counters = new Map<string, Series<number>>();
  private readonly gauges = new Map<string, Series<number>>();
  private readonly histograms = new Map<string, Series<HistogramValue>>();
  private readonly buckets: number[];

  public constructor(buckets: number[] = DEFAULT_MS_BUCKETS) {
    this.buckets = [...buckets].sort((a, b) => a - b);
  }

  public inc(name: string, labels: Labels = {}, value = 1): void {
    const normalized = normalizeLabels(labels);
    const key = seriesKey(name, normalized);
    const series = this.counters.get(key);
    if (series) {
      series.value += value;
      return;
    }
    this.counters.set(key, { name, labels: normalized, value });
  }

  public set(name: string, labels: Labels, value: number): void {
    const normalized = normalizeLabels(labels);
    this.gauges.set(seriesKey(name, normalized), { name, labels: normalized, value });
  }

  public observeMs(name: string, labels: Labels, valueMs: number): void {
    const normalized = normalizeLabels(labels);
    const key = seriesKey(name, normalized);
    let series = this.histograms.get(key);
    if (!series) {
      series = {
        name,
        labels: normalized,
        value: { bucketCounts: new Array<number>(this.buckets.length + 1).fill(0), sum: 0, count: 0 },
      };
      this.histograms.set(key, series);
    }

    const v = Math.max(0, valueMs);
    series.value.sum += v;
    series.value.count += 1;
    const index = this.buckets.findIndex((bound) => v <= bound);
    series.value.bucketCounts[index < 0 ? this.buckets.length : index] += 1; // last slot is +Inf
  }

  public counterValue(name: string, labels: Labels = {}): number {
    return this.counters.get(seriesKey(name, normalizeLabels(labels)))?.value ?? 0;
  }

  public renderPrometheus(): string {
    const lines: string[] = [];
    const byName = <T>(map: Map<string, Series<T>>): Map<string, Series<T>[]> => {
      const grouped = new Map<string, Series<T>[]>();
      for (const key of [...map.keys()].sort((a, b) => a.localeCompare(b))) {
        const series = map.get(key);
        if (!series) continue;
        const list = grouped.get(series.name) ?? [];
        list.push(series);
        grouped.set(series.name, list);
      }
      return grouped;
    };

    for (const [name, list] of byName(this.counters)) {
      lines.push(`# TYPE ${name} counter`);
      for (const series of list) lines.push(`${name}${formatLabels(series.labels)} ${series.value}`);
    }

    for (const [name, list] of byName(this.gauges)) {
      lines.push(`# TYPE ${name} gauge`);
      for (const series of list) lines.push(`${name}${formatLabels(series.labels)} ${series.value}`);
    }

    for (const [name, list] of byName(this.histograms)) {
      lines.push(`# TYPE ${name} histogram`);
      for (const series of list) {
        let cumulative = 0;
        this.buckets.forEach((bound, i) => {
          cumulative += series.value.bucketCounts[i];
          lines.push(
            `${name}_bucket${formatLabels({ ...series.labels, le: String(bound) })} ${cumulative}`,
          );
        });
        cumulative += series.value.bucketCounts[this.buckets.length];
        lines.push(`${name}_bucket${formatLabels({ ...series.labels, le: "+Inf" })} ${cumulative}`);
        lines.push(`${name}_sum${formatLabels(series.labels)} ${series.value.sum}`);
        lines.push(`${name}_count${formatLabels(series.labels)} ${series.value.count}`);
      }
    }

    return `${lines.join("\n")}\n`;
  }
}
