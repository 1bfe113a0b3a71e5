import { z } from 'zod';

// =============================================================================
// Health Metrics
// =============================================================================

export const METRIC_KEYS = [
  'activityMinutes',
  'sleepHours',
  'waterIntakeMl',
  'steps',
  'heartRate',
  'calories',
] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];

/** Human-readable metric names used in digests and prompts. */
export const METRIC_LABELS: Record<MetricKey, string> = {
  activityMinutes: 'activity minutes',
  sleepHours: 'sleep hours',
  waterIntakeMl: 'water ml',
  steps: 'steps',
  heartRate: 'heart rate',
  calories: 'calories',
};

// =============================================================================
// Database Layer Types (snake_case, matches SQL columns)
// =============================================================================

/**
 * HealthLogRow -- the raw database row shape.
 * Uses snake_case to match SQL column names directly.
 */
export interface HealthLogRow {
  id: number;
  user_id: string;
  timestamp: string;
  activity_minutes: number | null;
  sleep_hours: number | null;
  water_intake_ml: number | null;
  steps: number | null;
  heart_rate: number | null;
  calories: number | null;
  mood: string | null;
}

// =============================================================================
// Application Layer Types (camelCase)
// =============================================================================

/**
 * HealthLogEntry -- one observation for one user. Immutable once recorded.
 * Any metric may be absent from a given log.
 */
export interface HealthLogEntry {
  readonly userId: string;
  readonly timestamp: string;
  readonly activityMinutes: number | null;
  readonly sleepHours: number | null;
  readonly waterIntakeMl: number | null;
  readonly steps: number | null;
  readonly heartRate: number | null;
  readonly calories: number | null;
  readonly mood: string | null;
}

// =============================================================================
// Input Types (validated with Zod)
// =============================================================================

const metric = z.number().finite().nonnegative().nullable().default(null);

/**
 * HealthLogInsert -- input for recording a log entry.
 * Timestamps are normalized to ISO 8601 UTC.
 */
export const HealthLogInsertSchema = z.object({
  userId: z.string().min(1).max(200),
  timestamp: z
    .string()
    .datetime({ offset: true })
    .transform((s) => new Date(s).toISOString())
    .optional(),
  activityMinutes: metric,
  sleepHours: z.number().finite().min(0).max(24).nullable().default(null),
  waterIntakeMl: metric,
  steps: metric,
  heartRate: z.number().finite().positive().max(300).nullable().default(null),
  calories: metric,
  mood: z.string().trim().toLowerCase().min(1).max(50).nullable().default(null),
});

export type HealthLogInsert = z.input<typeof HealthLogInsertSchema>;

// =============================================================================
// Configuration Types
// =============================================================================

export interface DatabaseConfig {
  dbPath: string;
  busyTimeout: number;
}

// =============================================================================
// Collaborator Interfaces
// =============================================================================

/**
 * Supplies a user's recent logs, newest first.
 * Implemented by HealthLogRepository; tests pass in-memory fakes.
 *
 * With `asOf`, only logs timestamped at or before it count toward `limit`.
 */
export interface HealthLogSource {
  fetchRecentLogs(userId: string, limit: number, asOf?: Date): HealthLogEntry[] | Promise<HealthLogEntry[]>;
}

// =============================================================================
// Mapping Helpers
// =============================================================================

/**
 * Maps a snake_case HealthLogRow (from SQLite) to a camelCase HealthLogEntry.
 */
export function rowToHealthLog(row: HealthLogRow): HealthLogEntry {
  return {
    userId: row.user_id,
    timestamp: row.timestamp,
    activityMinutes: row.activity_minutes,
    sleepHours: row.sleep_hours,
    waterIntakeMl: row.water_intake_ml,
    steps: row.steps,
    heartRate: row.heart_rate,
    calories: row.calories,
    mood: row.mood,
  };
}
