import { StatsSnapshot } from '../common/interfaces/monitor.interfaces';

export type Clock = () => number;

/**
 * Aggregated monitor state, written only by the ingestion pipeline and read
 * by the dashboard and the health endpoint.
 *
 * Every method runs to completion synchronously, so on the Node.js event
 * loop each call is its own critical section and a reader never sees a
 * half-applied write. The two counters are still updated by separate calls
 * (`recordLine` then `recordAlert`), so a snapshot taken between them shows
 * the line counted but not yet the alert. That is acceptable for display.
 */
export class SharedStats {
  private totalLines = 0;
  private totalAlerts = 0;
  private lastAlert: string | null = null;
  private lastNotificationAt: Date | null = null;
  private readonly startedAtMs: number;

  constructor(private readonly clock: Clock = Date.now) {
    this.startedAtMs = clock();
  }

  recordLine(): void {
    this.totalLines++;
  }

  recordAlert(message: string): void {
    this.totalAlerts++;
    this.lastAlert = message;
  }

  recordNotification(at: Date): void {
    this.lastNotificationAt = at;
  }

  snapshot(): StatsSnapshot {
    const elapsedMs = Math.max(0, this.clock() - this.startedAtMs);
    const elapsedSeconds = Math.floor(elapsedMs / 1000);

    return Object.freeze({
      totalLines: this.totalLines,
      totalAlerts: this.totalAlerts,
      lastAlert: this.lastAlert,
      hasAlert: this.lastAlert !== null,
      lastNotificationAt: this.lastNotificationAt ? new Date(this.lastNotificationAt.getTime()) : null,
      startTime: new Date(this.startedAtMs),
      elapsedMs,
      linesPerSecond: elapsedSeconds > 0 ? Math.floor(this.totalLines / elapsedSeconds) : 0,
    });
  }
}
