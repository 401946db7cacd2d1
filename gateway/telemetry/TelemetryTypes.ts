/**
 * Telemetria: nomes e definições das métricas do gateway e do motor.
 */

export type MetricType = 'counter' | 'gauge' | 'histogram';

/** Valores de label por nome; undefined e '' ficam fora da série */
export type MetricLabels = Record<string, string | undefined>;

export interface MetricDefinition {
  name: MetricName;
  help: string;
  type: MetricType;
  labels: readonly string[];
}

export interface SampleValue {
  value: number;
  labels: MetricLabels;
}

/**
 * Contagem por bucket NÃO cumulativa; o export acumula.
 */
export interface HistogramValue {
  buckets: Map<number, number>;
  sum: number;
  count: number;
  labels: MetricLabels;
}

/** Latência HTTP, em ms */
export const DEFAULT_LATENCY_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

// ════════════════════════════════════════════════════════════════════════════
// MÉTRICAS
// ════════════════════════════════════════════════════════════════════════════

export const METRIC_NAMES = {
  HTTP_REQUESTS_TOTAL: 'adherence_http_requests_total',
  HTTP_REQUEST_DURATION_MS: 'adherence_http_request_duration_ms',
  HTTP_ERRORS_TOTAL: 'adherence_http_errors_total',
  AUTH_FAILURES_TOTAL: 'adherence_auth_failures_total',

  CYCLES_TOTAL: 'adherence_cycles_total',
  EPISODES_EVALUATED_TOTAL: 'adherence_episodes_evaluated_total',
  EPISODE_FAILURES_TOTAL: 'adherence_episode_failures_total',
  DEVIATIONS_TOTAL: 'adherence_deviations_total',
  EPISODES: 'adherence_episodes',
  EVENT_LOG_DEGRADED: 'adherence_event_log_degraded',

  PROCESS_UPTIME_SECONDS: 'adherence_process_uptime_seconds',
  PROCESS_MEMORY_BYTES: 'adherence_process_memory_bytes'
} as const;

export type MetricName = typeof METRIC_NAMES[keyof typeof METRIC_NAMES];

const define = (type: MetricType) =>
  (name: MetricName, help: string, labels: readonly string[] = []): MetricDefinition => ({ name, help, type, labels });

const counter = define('counter');
const gauge = define('gauge');
const histogram = define('histogram');

/**
 * Ordem de exposição em /internal/metrics.
 */
export const METRIC_DEFINITIONS: readonly MetricDefinition[] = [
  counter(METRIC_NAMES.HTTP_REQUESTS_TOTAL, 'HTTP requests by route and status', ['method', 'route', 'status_code']),
  histogram(METRIC_NAMES.HTTP_REQUEST_DURATION_MS, 'HTTP request duration in milliseconds', ['method', 'route']),
  counter(METRIC_NAMES.HTTP_ERRORS_TOTAL, 'HTTP responses with status >= 400', ['error_code']),
  counter(METRIC_NAMES.AUTH_FAILURES_TOTAL, 'Rejected admin token checks', ['reason']),

  counter(METRIC_NAMES.CYCLES_TOTAL, 'Evaluation cycles run through the gateway', ['dry_run']),
  counter(METRIC_NAMES.EPISODES_EVALUATED_TOTAL, 'Episode evaluations'),
  counter(METRIC_NAMES.EPISODE_FAILURES_TOTAL, 'Episode evaluations that failed'),
  counter(METRIC_NAMES.DEVIATIONS_TOTAL, 'Deviation outcomes by kind', ['outcome']),
  gauge(METRIC_NAMES.EPISODES, 'Stored episodes by status', ['status']),
  gauge(METRIC_NAMES.EVENT_LOG_DEGRADED, '1 when the event log recorded failures'),

  gauge(METRIC_NAMES.PROCESS_UPTIME_SECONDS, 'Process uptime in seconds'),
  gauge(METRIC_NAMES.PROCESS_MEMORY_BYTES, 'Process memory usage in bytes', ['type'])
];
