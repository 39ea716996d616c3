type LabelValue = string | number | boolean | null | undefined;
type Labels = Record<string, LabelValue>;

const escapeLabel = (value: string): string =>
  value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");

const normalizeLabels = (labels: Labels = {}): Record<string, string> => {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(labels)) {
    if (value === undefined || value === null) continue;
    out[key] = String(value);
  }
  return out;
};

const formatLabels = (labels: Record<string, string>): string => {
  const keys = Object.keys(labels).sort((a, b) => a.localeCompare(b));
  if (keys.length === 0) return "";
  const inner = keys.map((key) => `${key}="${escapeLabel(labels[key])}"`).join(",");
  return `{${inner}}`;
};

interface Series<T> {
  name: string;
  labels: Record<string, string>;
  value: T;
}

interface HistogramState {
  bucketCounts: number[];
  sum: number;
  count: number;
}

export const DEFAULT_MS_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2000, 5000, 10000, 30000, 60000];

const seriesKey = (name: string, labels: Record<string, string>): string =>
  `${name}|${Object.keys(labels)
    .sort((a, b) => a.localeCompare(b))
    .map((key) => `${key}=${labels[key]}`)
    .join(",")}`;

const byKey = <T>(a: [string, Series<T>], b: [string, Series<T>]): number => a[0].localeCompare(b[0]);

/** In-process counters and millisecond histograms rendered as Prometheus text. */
export class MetricsRegistry {
  private readonly counters = new Map<string, Series<number>>();
  private readonly histograms = new Map<string, Series<HistogramState>>();
  private readonly help = new Map<string, string>();
  private readonly buckets: readonly number[];

  public constructor(buckets: readonly number[] = DEFAULT_MS_BUCKETS) {
    this.buckets = [...buckets].sort((a, b) => a - b);
  }

  public describe(name: string, help: string): void {
    this.help.set(name, help);
  }

  public inc(name: string, labels: Labels = {}, value = 1): void {
    const normalized = normalizeLabels(labels);
    const key = seriesKey(name, normalized);
    const series = this.counters.get(key) ?? { name, labels: normalized, value: 0 };
    series.value += value;
    this.counters.set(key, series);
  }

  public getCounter(name: string, labels: Labels = {}): number {
    return this.counters.get(seriesKey(name, normalizeLabels(labels)))?.value ?? 0;
  }

  public observeMs(name: string, labels: Labels = {}, valueMs: number): void {
    const normalized = normalizeLabels(labels);
    const key = seriesKey(name, normalized);
    const series = this.histograms.get(key) ?? {
      name,
      labels: normalized,
      value: {
        bucketCounts: Array.from({ length: this.buckets.length + 1 }, () => 0),
        sum: 0,
        count: 0,
      },
    };

    const v = Math.max(0, valueMs);
    const state = series.value;
    state.sum += v;
    state.count += 1;

    const index = this.buckets.findIndex((bound) => v <= bound);
    // last slot is +Inf
    state.bucketCounts[index === -1 ? this.buckets.length : index] += 1;
    this.histograms.set(key, series);
  }

  public renderPrometheus(extraLines: string[] = []): string {
    const lines: string[] = [];
    const header = (name: string, type: "counter" | "histogram", seen: Set<string>): void => {
      if (seen.has(name)) return;
      seen.add(name);
      const help = this.help.get(name);
      if (help) lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} ${type}`);
    };

    const seenCounters = new Set<string>();
    for (const [, series] of [...this.counters.entries()].sort(byKey)) {
      header(series.name, "counter", seenCounters);
      lines.push(`${series.name}${formatLabels(series.labels)} ${series.value}`);
    }

    const seenHistograms = new Set<string>();
    for (const [, series] of [...this.histograms.entries()].sort(byKey)) {
      header(series.name, "histogram", seenHistograms);
      const { name, labels, value: state } = series;

      let cumulative = 0;
      for (let i = 0; i < this.buckets.length; i += 1) {
        cumulative += state.bucketCounts[i];
        lines.push(`${name}_bucket${formatLabels({ ...labels, le: String(this.buckets[i]) })} ${cumulative}`);
      }
      cumulative += state.bucketCounts[this.buckets.length];
      lines.push(`${name}_bucket${formatLabels({ ...labels, le: "+Inf" })} ${cumulative}`);
      lines.push(`${name}_sum${formatLabels(labels)} ${state.sum}`);
      lines.push(`${name}_count${formatLabels(labels)} ${state.count}`);
    }

    lines.push(...extraLines);
    return `${lines.join("\n")}\n`;
  }
}
