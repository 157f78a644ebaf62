/**
 * Type definitions for the log monitor
 *
 * These types are the contracts between the tail source, the classifier,
 * the aggregated stats and the consumers that read them (dashboard and
 * health endpoint).
 */

/**
 * A named textual pattern from the rules file.
 *
 * `threshold` is validated and carried through, but every single match is
 * treated as immediately alert-worthy; nothing counts occurrences.
 */
export interface Rule {
  /** Rule name; names containing "error" or "panic" raise alerts */
  name: string;
  /**
   * JavaScript regular expression, optionally prefixed by an inline flag
   * group such as `(?i)` (flags i, m and s only).
   *
   * Compiled with the backtracking RegExp engine, so matching is not
   * guaranteed linear: nested quantifiers like `(a+)+$` can stall ingestion
   * on a crafted line. Inline groups anywhere but the start, and named
   * groups written `(?P<name>...)`, are not JavaScript syntax and fail
   * compilation with a ConfigError; use `(?<name>...)` instead.
   */
  pattern: string;
  /** Occurrence threshold (not enforced) */
  threshold: number;
}

/**
 * Which classification path flagged a line
 */
export type AlertSource = 'structured' | 'pattern';

/**
 * Result of classifying a single log line
 */
export interface Classification {
  /** Whether the line is alert-worthy */
  isAlert: boolean;
  /** Alert message recorded as "last alert", null for benign lines */
  message: string | null;
  /** Path that produced the alert */
  source: AlertSource | null;
  /** Name of the matched rule (pattern path only) */
  ruleName: string | null;
  /** Extracted structured message, or the raw line for pattern alerts */
  detail: string | null;
}

/**
 * Read-only view of the aggregated stats at one moment
 */
export interface StatsSnapshot {
  readonly totalLines: number;
  readonly totalAlerts: number;
  readonly lastAlert: string | null;
  readonly hasAlert: boolean;
  readonly lastNotificationAt: Date | null;
  readonly startTime: Date;
  readonly elapsedMs: number;
  /** Whole lines per elapsed second, 0 during the first second */
  readonly linesPerSecond: number;
}

/**
 * Anything that can deliver a notification text to an external endpoint
 */
export interface Notifier {
  notify(text: string): Promise<void>;
}

/**
 * A provider of log lines, in file order, across rotations.
 * Iteration ends on end-of-stream and throws on failure.
 */
export type LineSource = AsyncIterable<string>;

/**
 * Tail source settings
 */
export interface TailConfig {
  /** Path of the log file to follow */
  filePath: string;
  /** Delay between polls when no new data is available (milliseconds) */
  pollIntervalMs: number;
  /** Read existing file content before following new appends */
  fromStart: boolean;
}

/**
 * Notification settings
 */
export interface NotificationConfig {
  /** Endpoint receiving `{"text": ...}` POSTs; notifications disabled when absent */
  webhookUrl?: string;
  /** Request timeout (milliseconds) */
  timeoutMs: number;
}

/**
 * Dashboard settings
 */
export interface DashboardConfig {
  enabled: boolean;
  /** Snapshot poll interval (milliseconds) */
  pollingIntervalMs: number;
}

/**
 * Health endpoint settings
 */
export interface HealthCheckConfig {
  enabled: boolean;
  port: number;
}

/**
 * Complete monitor configuration
 */
export interface MonitorConfiguration {
  rules: Rule[];
  tail: TailConfig;
  notification: NotificationConfig;
  dashboard: DashboardConfig;
  healthCheck: HealthCheckConfig;
}
