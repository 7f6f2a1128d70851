/**
 * Lightweight Prometheus Metrics
 *
 * Counter / gauge / histogram families rendered in Prometheus text format
 * for the `/metrics` endpoint: HTTP traffic, outbound API latency, job runs,
 * anomalies and pick submissions. Values live in process memory.
 */

export type Labels = Readonly<Record<string, string>>;

type MetricType = 'counter' | 'gauge' | 'histogram';

function labelKey(labels: Labels, extra?: readonly [string, string]): string {
  const entries = Object.entries(labels);
  if (extra) entries.push([extra[0], extra[1]]);
  if (entries.length === 0) return '';
  return `{${entries.map(([k, v]) => `${k}="${v}"`).join(',')}}`;
}

abstract class MetricFamily {
  constructor(
    readonly name: string,
    private readonly help: string,
    private readonly type: MetricType,
  ) {}

  protected abstract samples(): string[];

  render(): string {
    return [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`, ...this.samples()].join('\n');
  }
}

class Counter extends MetricFamily {
  protected readonly values = new Map<string, number>();

  constructor(name: string, help: string, type: MetricType = 'counter') {
    super(name, help, type);
  }

  inc(labels: Labels = {}, amount = 1): void {
    const key = labelKey(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + amount);
  }

  protected samples(): string[] {
    return [...this.values].map(([key, value]) => `${this.name}${key} ${value}`);
  }
}

class Gauge extends Counter {
  constructor(name: string, help: string) {
    super(name, help, 'gauge');
  }

  dec(labels: Labels = {}, amount = 1): void {
    this.inc(labels, -amount);
  }
}

const DEFAULT_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

interface HistogramSeries {
  labels: Labels;
  count: number;
  sum: number;
  /** Cumulative: counts[i] observations were <= buckets[i]. */
  counts: number[];
}

class Histogram extends MetricFamily {
  private readonly series = new Map<string, HistogramSeries>();

  constructor(
    name: string,
    help: string,
    private readonly buckets: readonly number[] = DEFAULT_BUCKETS,
  ) {
    super(name, help, 'histogram');
  }

  observe(labels: Labels, value: number): void {
    const key = labelKey(labels);
    const entry = this.series.get(key) ?? { labels, count: 0, sum: 0, counts: this.buckets.map(() => 0) };
    this.series.set(key, entry);
    entry.count++;
    entry.sum += value;
    this.buckets.forEach((bound, i) => {
      if (value <= bound) entry.counts[i]++;
    });
  }

  protected samples(): string[] {
    const lines: string[] = [];
    for (const [key, entry] of this.series) {
      this.buckets.forEach((bound, i) => {
        lines.push(`${this.name}_bucket${labelKey(entry.labels, ['le', String(bound)])} ${entry.counts[i]}`);
      });
      lines.push(`${this.name}_bucket${labelKey(entry.labels, ['le', '+Inf'])} ${entry.count}`);
      lines.push(`${this.name}_sum${key} ${entry.sum}`);
      lines.push(`${this.name}_count${key} ${entry.count}`);
    }
    return lines;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

const registry: MetricFamily[] = [];

function register<T extends MetricFamily>(metric: T): T {
  registry.push(metric);
  return metric;
}

/** Render all registered metrics in Prometheus text exposition format. */
export function renderMetrics(): string {
  return registry.map((m) => m.render()).join('\n\n') + '\n';
}

// ─────────────────────────────────────────────────────────────────────────────
// Application Metrics
// ─────────────────────────────────────────────────────────────────────────────

export const httpRequestsTotal = register(new Counter('atspool_http_requests_total', 'Total HTTP requests handled'));

export const httpRequestDurationMs = register(
  new Histogram('atspool_http_request_duration_ms', 'HTTP request latency in milliseconds'),
);

/** One observation per attempt, labelled by provider and HTTP status. */
export const externalApiDurationMs = register(
  new Histogram('atspool_external_api_duration_ms', 'External API call latency in milliseconds'),
);

export const jobRunsTotal = register(new Counter('atspool_job_runs_total', 'Orchestrator job runs by job and outcome'));

export const jobDurationMs = register(
  new Histogram('atspool_job_duration_ms', 'Orchestrator job duration in milliseconds', [
    50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000,
  ]),
);

export const jobsInFlight = register(new Gauge('atspool_jobs_in_flight', 'Orchestrator jobs currently running'));

export const anomaliesTotal = register(new Counter('atspool_anomalies_total', 'Anomalies raised by orchestrator jobs'));

export const pickSubmissionsTotal = register(
  new Counter('atspool_pick_submissions_total', 'Pick submissions by kind and outcome'),
);
