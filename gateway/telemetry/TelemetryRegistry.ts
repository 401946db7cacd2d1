/**
 * Telemetria: registry in-memory com export no formato texto do Prometheus.
 * Uma instância por app do gateway.
 */

import {
  DEFAULT_LATENCY_BUCKETS,
  HistogramValue,
  METRIC_DEFINITIONS,
  METRIC_NAMES,
  MetricDefinition,
  MetricLabels,
  MetricName,
  SampleValue
} from './TelemetryTypes';
import { CycleReport } from '../../orquestrador/EpisodeEvaluator';
import { EpisodeStatus } from '../../entidades/tipos';

// ════════════════════════════════════════════════════════════════════════════
// LABELS
// ════════════════════════════════════════════════════════════════════════════

/**
 * Identidade da série: labels definidos, ordenados por nome.
 */
function labelsToKey(labels: MetricLabels): string {
  return Object.entries(labels)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(',');
}

function escapeLabel(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * `{a="1",b="2"}` na ordem dos labels recebidos; '' sem labels.
 */
function formatLabels(labels: MetricLabels, extra: string[] = []): string {
  const parts = Object.entries(labels)
    .filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== '')
    .map(([k, v]) => `${k}="${escapeLabel(v)}"`)
    .concat(extra);
  return parts.length > 0 ? `{${parts.join(',')}}` : '';
}

// ════════════════════════════════════════════════════════════════════════════
// FAMÍLIAS
// ════════════════════════════════════════════════════════════════════════════

abstract class MetricFamily<V extends { labels: MetricLabels }> {
  protected readonly series: Map<string, V> = new Map();

  constructor(readonly definition: MetricDefinition) {}

  protected seriesFor(labels: MetricLabels, create: () => V): V {
    const key = labelsToKey(labels);
    let current = this.series.get(key);
    if (!current) {
      current = create();
      this.series.set(key, current);
    }
    return current;
  }

  reset(): void {
    this.series.clear();
  }

  /** Linhas da família; vazio quando não há séries */
  render(): string[] {
    if (this.series.size === 0) return [];
    const { name, help, type } = this.definition;
    return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`, ...this.renderSeries()];
  }

  protected abstract renderSeries(): string[];
}

abstract class SampleFamily extends MetricFamily<SampleValue> {
  protected sample(labels: MetricLabels): SampleValue {
    return this.seriesFor(labels, () => ({ value: 0, labels: { ...labels } }));
  }

  protected renderSeries(): string[] {
    return [...this.series.values()].map(s => `${this.definition.name}${formatLabels(s.labels)} ${s.value}`);
  }
}

class Counter extends SampleFamily {
  inc(labels: MetricLabels = {}, by: number = 1): void {
    this.sample(labels).value += by;
  }
}

class Gauge extends SampleFamily {
  set(labels: MetricLabels, value: number): void {
    this.sample(labels).value = value;
  }
}

class Histogram extends MetricFamily<HistogramValue> {
  private readonly bounds: number[];

  constructor(definition: MetricDefinition, buckets: number[] = DEFAULT_LATENCY_BUCKETS) {
    super(definition);
    this.bounds = [...buckets].sort((a, b) => a - b);
  }

  observe(labels: MetricLabels, value: number): void {
    const h = this.seriesFor(labels, () => ({
      buckets: new Map(this.bounds.map(b => [b, 0])),
      sum: 0,
      count: 0,
      labels: { ...labels }
    }));
    h.sum += value;
    h.count += 1;
    // só o menor bucket que contém o valor; acima do último, só +Inf
    const bucket = this.bounds.find(b => value <= b);
    if (bucket !== undefined) {
      h.buckets.set(bucket, (h.buckets.get(bucket) ?? 0) + 1);
    }
  }

  protected renderSeries(): string[] {
    const name = this.definition.name;
    const lines: string[] = [];
    for (const h of this.series.values()) {
      let cumulative = 0;
      for (const le of this.bounds) {
        cumulative += h.buckets.get(le) ?? 0;
        lines.push(`${name}_bucket${formatLabels(h.labels, [`le="${le}"`])} ${cumulative}`);
      }
      lines.push(`${name}_bucket${formatLabels(h.labels, ['le="+Inf"'])} ${h.count}`);
      lines.push(`${name}_sum${formatLabels(h.labels)} ${h.sum}`);
      lines.push(`${name}_count${formatLabels(h.labels)} ${h.count}`);
    }
    return lines;
  }
}

type Family = Counter | Gauge | Histogram;

function createFamily(definition: MetricDefinition): Family {
  switch (definition.type) {
    case 'counter': return new Counter(definition);
    case 'gauge': return new Gauge(definition);
    case 'histogram': return new Histogram(definition);
  }
}

// ════════════════════════════════════════════════════════════════════════════
// REGISTRY
// ════════════════════════════════════════════════════════════════════════════

class TelemetryRegistry {
  private readonly families = new Map<MetricName, Family>(
    METRIC_DEFINITIONS.map(d => [d.name, createFamily(d)])
  );
  private startTime: number = Date.now();

  incCounter(name: MetricName, labels: MetricLabels = {}, by: number = 1): void {
    const family = this.families.get(name);
    if (family instanceof Counter) family.inc(labels, by);
  }

  setGauge(name: MetricName, labels: MetricLabels, value: number): void {
    const family = this.families.get(name);
    if (family instanceof Gauge) family.set(labels, value);
  }

  observeHistogram(name: MetricName, labels: MetricLabels, value: number): void {
    const family = this.families.get(name);
    if (family instanceof Histogram) family.observe(labels, value);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // HTTP
  // ──────────────────────────────────────────────────────────────────────────

  incHttpRequests(labels: { method: string; route: string; status_code: string }): void {
    this.incCounter(METRIC_NAMES.HTTP_REQUESTS_TOTAL, labels);
  }

  observeHttpDuration(labels: { method: string; route: string }, durationMs: number): void {
    this.observeHistogram(METRIC_NAMES.HTTP_REQUEST_DURATION_MS, labels, durationMs);
  }

  incHttpError(labels: { error_code: string }): void {
    this.incCounter(METRIC_NAMES.HTTP_ERRORS_TOTAL, labels);
  }

  incAuthFailure(labels: { reason: string }): void {
    this.incCounter(METRIC_NAMES.AUTH_FAILURES_TOTAL, labels);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // MOTOR
  // ──────────────────────────────────────────────────────────────────────────

  recordCycle(report: CycleReport): void {
    this.incCounter(METRIC_NAMES.CYCLES_TOTAL, { dry_run: String(report.dry_run) });
    this.incCounter(METRIC_NAMES.EPISODES_EVALUATED_TOTAL, {}, report.episodes_evaluated);
    this.incCounter(METRIC_NAMES.EPISODE_FAILURES_TOTAL, {}, report.episodes_failed);
    for (const d of report.evaluations.flatMap(e => e.deviations)) {
      this.incCounter(METRIC_NAMES.DEVIATIONS_TOTAL, { outcome: d.outcome });
    }
  }

  updateEpisodeCounts(counts: Record<EpisodeStatus, number>): void {
    for (const [status, value] of Object.entries(counts)) {
      this.setGauge(METRIC_NAMES.EPISODES, { status }, value);
    }
  }

  updateEventLogDegraded(degraded: boolean): void {
    this.setGauge(METRIC_NAMES.EVENT_LOG_DEGRADED, {}, degraded ? 1 : 0);
  }

  private updateProcessMetrics(): void {
    this.setGauge(METRIC_NAMES.PROCESS_UPTIME_SECONDS, {}, (Date.now() - this.startTime) / 1000);
    const mem = process.memoryUsage();
    this.setGauge(METRIC_NAMES.PROCESS_MEMORY_BYTES, { type: 'heap_used' }, mem.heapUsed);
    this.setGauge(METRIC_NAMES.PROCESS_MEMORY_BYTES, { type: 'rss' }, mem.rss);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // EXPORT
  // ──────────────────────────────────────────────────────────────────────────

  toPrometheus(): string {
    this.updateProcessMetrics();
    const blocks = [...this.families.values()]
      .map(f => f.render())
      .filter(lines => lines.length > 0)
      .map(lines => lines.join('\n'));
    return blocks.join('\n\n') + '\n';
  }

  reset(): void {
    this.families.forEach(f => f.reset());
    this.startTime = Date.now();
  }
}

export { TelemetryRegistry, labelsToKey, formatLabels };
