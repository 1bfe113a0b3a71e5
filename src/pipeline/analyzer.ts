/**
 * Analyzer stage: condenses a user's recent logs into a bounded summary.
 *
 * Pure and synchronous -- no external calls, no clock reads (`now` is an
 * argument), so the same logs always produce the same summary.
 */

import { METRIC_KEYS, METRIC_LABELS, type HealthLogEntry, type MetricKey } from '../shared/types.js';
import { mean, stdDev } from '../shared/similarity.js';
import type { MetricTrend, MetricTrendOk, UserSummary } from './types.js';

export interface AnalyzerOptions {
  windowSize: number;
  digestCharCap: number;
  anomalyStdMultiplier: number;
  minTrendSamples: number;
  steadyTolerance: number;
}

const DAY_MS = 86_400_000;

// =============================================================================
// Trends
// =============================================================================

/**
 * Trend of one metric over a window ordered newest first.
 * `values` holds only entries that recorded the metric.
 */
export function computeTrend(
  metric: MetricKey,
  values: readonly number[],
  options: Pick<AnalyzerOptions, 'anomalyStdMultiplier' | 'minTrendSamples' | 'steadyTolerance'>,
): MetricTrend {
  if (values.length < Math.max(2, options.minTrendSamples)) {
    return {
      metric,
      status: 'insufficient_data',
      latest: values.length > 0 ? values[0] : null,
      samples: values.length,
    };
  }

  const [latest, ...rest] = values;
  const baselineMean = mean(rest);
  const delta = latest - baselineMean;
  const magnitude = baselineMean === 0 ? 0 : Math.abs(delta) / Math.abs(baselineMean);
  const sd = stdDev(values);

  let direction: MetricTrendOk['direction'] = 'steady';
  if (delta !== 0 && (baselineMean === 0 || magnitude > options.steadyTolerance)) {
    direction = delta > 0 ? 'up' : 'down';
  }

  return {
    metric,
    status: 'ok',
    direction,
    latest,
    baselineMean,
    delta,
    magnitude,
    stdDev: sd,
    anomaly: sd > 0 && Math.abs(delta) > options.anomalyStdMultiplier * sd,
    samples: values.length,
  };
}

// =============================================================================
// Digest
// =============================================================================

function formatNumber(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(1);
}

function describeTrend(trend: MetricTrendOk): string {
  const label = METRIC_LABELS[trend.metric];
  const latest = formatNumber(trend.latest);
  const baseline = formatNumber(trend.baselineMean);
  const flag = trend.anomaly ? ', anomaly' : '';

  if (trend.direction === 'steady') {
    return `${label} steady at ${latest}${flag}.`;
  }
  const pct = trend.baselineMean === 0 ? '' : ` ${Math.round(trend.magnitude * 100)}%`;
  return `${label} ${latest} (${trend.direction}${pct} vs avg ${baseline}${flag}).`;
}

/**
 * Joins whole segments while they fit in `cap`. If even the first
 * segment does not fit, keeps as many of its whole words as fit.
 * The result never exceeds `cap` and never ends mid-word.
 */
export function fitDigest(segments: readonly string[], cap: number): string {
  let digest = '';
  for (const segment of segments) {
    const candidate = digest.length === 0 ? segment : `${digest} ${segment}`;
    if (candidate.length > cap) break;
    digest = candidate;
  }
  if (digest.length > 0 || segments.length === 0) {
    return digest;
  }

  for (const word of segments[0].split(/\s+/)) {
    const candidate = digest.length === 0 ? word : `${digest} ${word}`;
    if (candidate.length > cap) break;
    digest = candidate;
  }
  return digest;
}

function buildSegments(
  window: readonly HealthLogEntry[],
  trends: readonly MetricTrend[],
  latestMood: string | null,
  daysSinceLastLog: number | null,
): string[] {
  if (window.length === 0) {
    return ['No recent health logs.', 'No trend yet for any metric.'];
  }

  const when =
    daysSinceLastLog === null || daysSinceLastLog === 0
      ? 'last today'
      : `last ${daysSinceLastLog}d ago`;
  const segments = [`${window.length} logs, ${when}.`];

  const ok = trends.filter((t): t is MetricTrendOk => t.status === 'ok');
  // Anomalies first: they matter most when the cap truncates the tail
  for (const t of ok.filter((t) => t.anomaly)) segments.push(describeTrend(t));
  for (const t of ok.filter((t) => !t.anomaly)) segments.push(describeTrend(t));

  if (latestMood) segments.push(`Mood ${latestMood}.`);

  const missing = trends.filter((t) => t.status === 'insufficient_data');
  if (missing.length > 0) {
    segments.push(`No trend yet for ${missing.map((t) => METRIC_LABELS[t.metric]).join(', ')}.`);
  }

  return segments;
}

// =============================================================================
// Analyze
// =============================================================================

/**
 * Summarizes the most recent `windowSize` logs at or before `now`.
 *
 * Input order does not matter; entries are sorted newest first. Logs
 * timestamped after `now` or with unparseable timestamps are ignored.
 * Fewer logs than the window (including none) is not an error.
 */
export function analyze(
  userId: string,
  logs: readonly HealthLogEntry[],
  now: Date,
  options: AnalyzerOptions,
): UserSummary {
  const nowMs = now.getTime();
  const window = logs
    .map((entry) => ({ entry, ms: Date.parse(entry.timestamp) }))
    .filter(({ ms }) => Number.isFinite(ms) && ms <= nowMs)
    .sort((a, b) => b.ms - a.ms)
    .slice(0, options.windowSize);

  const entries = window.map((w) => w.entry);

  const trends = METRIC_KEYS.map((metric) => {
    const values: number[] = [];
    for (const entry of entries) {
      const v = entry[metric];
      if (v !== null && Number.isFinite(v)) values.push(v);
    }
    return computeTrend(metric, values, options);
  });

  const moodCounts: Record<string, number> = {};
  let latestMood: string | null = null;
  for (const entry of entries) {
    if (!entry.mood) continue;
    latestMood ??= entry.mood;
    moodCounts[entry.mood] = (moodCounts[entry.mood] ?? 0) + 1;
  }

  const daysSinceLastLog =
    window.length > 0 ? Math.floor((nowMs - window[0].ms) / DAY_MS) : null;

  const digest = fitDigest(
    buildSegments(entries, trends, latestMood, daysSinceLastLog),
    options.digestCharCap,
  );

  return {
    userId,
    window: {
      count: entries.length,
      from: entries.length > 0 ? entries[entries.length - 1].timestamp : null,
      to: entries.length > 0 ? entries[0].timestamp : null,
    },
    trends,
    latestMood,
    moodCounts,
    daysSinceLastLog,
    digest,
  };
}

/**
 * Compact signal tags for reasoning traces: anomalies and non-steady
 * trends, e.g. "sleepHours:down:anomaly".
 */
export function summarySignals(summary: UserSummary): string[] {
  const signals: string[] = [];
  for (const t of summary.trends) {
    if (t.status !== 'ok') continue;
    if (t.anomaly) signals.push(`${t.metric}:${t.direction}:anomaly`);
    else if (t.direction !== 'steady') signals.push(`${t.metric}:${t.direction}`);
  }
  return signals;
}
