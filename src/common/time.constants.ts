/**
 * Time constants in milliseconds for consistent usage across the application
 *
 * This file centralizes all time-related constants to avoid hardcoding values
 * and ensure consistency in validation rules and application logic.
 */

export const ONE_SECOND_IN_MILLISECONDS = 1000;
export const ONE_MINUTE_IN_MILLISECONDS = 60 * ONE_SECOND_IN_MILLISECONDS;

export const FIVE_SECONDS_IN_MILLISECONDS = 5 * ONE_SECOND_IN_MILLISECONDS;
export const TEN_SECONDS_IN_MILLISECONDS = 10 * ONE_SECOND_IN_MILLISECONDS;

// Notification cooldown (global, across all rules)
export const NOTIFICATION_COOLDOWN_MS = TEN_SECONDS_IN_MILLISECONDS;

// Webhook request timeout
export const WEBHOOK_TIMEOUT_MIN_MS = 500;
export const WEBHOOK_TIMEOUT_MAX_MS = ONE_MINUTE_IN_MILLISECONDS;
export const WEBHOOK_TIMEOUT_DEFAULT_MS = FIVE_SECONDS_IN_MILLISECONDS;

// Dashboard refresh
export const DASHBOARD_POLL_MIN_MS = 50;
export const DASHBOARD_POLL_MAX_MS = ONE_MINUTE_IN_MILLISECONDS;
export const DASHBOARD_POLL_DEFAULT_MS = 100;

// Alert history buckets shown by the dashboard sparkline
export const ALERT_HISTORY_BUCKET_MS = ONE_SECOND_IN_MILLISECONDS;
export const ALERT_HISTORY_BUCKETS = 100;

// Tail polling
export const TAIL_POLL_MIN_MS = 10;
export const TAIL_POLL_MAX_MS = 10 * ONE_SECOND_IN_MILLISECONDS;
export const TAIL_POLL_DEFAULT_MS = 250;

// Best-effort wait for in-flight notifications during shutdown
export const SHUTDOWN_DRAIN_TIMEOUT_MS = 2 * ONE_SECOND_IN_MILLISECONDS;
