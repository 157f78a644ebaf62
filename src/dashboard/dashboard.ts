import chalk from 'chalk';
import { StatsSnapshot } from '../common/interfaces/monitor.interfaces';
import {
  ALERT_HISTORY_BUCKETS,
  ALERT_HISTORY_BUCKET_MS,
  DASHBOARD_POLL_DEFAULT_MS,
} from '../common/time.constants';
import { Clock } from '../core/shared-stats';

const SPARK_LEVELS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];
const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/**
 * Anything the dashboard can read stats from
 */
export interface StatsProvider {
  getStats(): StatsSnapshot;
}

/**
 * Minimal writable surface used for output (process.stdout in production)
 */
export interface FrameWriter {
  write(chunk: string): unknown;
}

export interface DashboardOptions {
  pollingIntervalMs?: number;
  output?: FrameWriter;
  clock?: Clock;
  /** Prefix each frame with an ANSI clear-screen sequence */
  clearScreen?: boolean;
}

/**
 * Periodic reader of the monitor stats.
 *
 * Polls on its own timer, independent of ingestion speed, and only ever
 * reads a snapshot. Keeps one bucket per second with the number of alerts
 * seen during that second for the sparkline.
 */
export class DashboardConsumer {
  private readonly pollingIntervalMs: number;
  private readonly output: FrameWriter;
  private readonly clock: Clock;
  private readonly clearScreen: boolean;
  private readonly history: number[] = new Array<number>(ALERT_HISTORY_BUCKETS).fill(0);
  private lastBucketAt: number;
  private lastTotalAlerts = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly provider: StatsProvider, options: DashboardOptions = {}) {
    this.pollingIntervalMs = options.pollingIntervalMs ?? DASHBOARD_POLL_DEFAULT_MS;
    this.output = options.output ?? process.stdout;
    this.clock = options.clock ?? Date.now;
    this.clearScreen = options.clearScreen ?? true;
    this.lastBucketAt = this.clock();
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.pollingIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Read the current snapshot, roll the history if a bucket elapsed, and
   * write one frame
   */
  tick(): string {
    const snapshot = this.provider.getStats();
    this.updateHistory(snapshot.totalAlerts);

    const frame = renderDashboard(snapshot, this.history);
    this.output.write(this.clearScreen ? `${CLEAR_SCREEN}${frame}\n` : `${frame}\n`);
    return frame;
  }

  getHistory(): number[] {
    return [...this.history];
  }

  private updateHistory(totalAlerts: number): void {
    const now = this.clock();
    if (now - this.lastBucketAt < ALERT_HISTORY_BUCKET_MS) {
      return;
    }

    this.history.shift();
    this.history.push(Math.max(0, totalAlerts - this.lastTotalAlerts));
    this.lastTotalAlerts = totalAlerts;
    this.lastBucketAt = now;
  }
}

/**
 * Render one dashboard frame
 */
export function renderDashboard(snapshot: StatsSnapshot, history: number[]): string {
  const elapsedSeconds = Math.floor(snapshot.elapsedMs / 1000);

  const status = [
    chalk.bold('Log Monitor Status'),
    `Lines Processed: ${snapshot.totalLines}`,
    `Alerts Found: ${snapshot.totalAlerts}`,
    `Time Elapsed: ${elapsedSeconds}s`,
    `Rate: ${snapshot.linesPerSecond} lines/s`,
  ];

  const rate = [
    chalk.bold(`Alert Rate (Last ${history.length}s)`),
    chalk.red(renderSparkline(history)),
  ];

  const lastAlert = [
    chalk.bold('Last Alert'),
    snapshot.lastAlert !== null ? chalk.red(snapshot.lastAlert) : chalk.gray('No alerts yet.'),
  ];

  return [...status, '', ...rate, '', ...lastAlert].join('\n');
}

/**
 * One character per value, scaled against the largest value
 */
export function renderSparkline(values: number[]): string {
  const max = Math.max(0, ...values);
  if (max === 0) {
    return SPARK_LEVELS[0].repeat(values.length);
  }

  return values
    .map((value) => {
      const level = Math.round((value / max) * (SPARK_LEVELS.length - 1));
      return SPARK_LEVELS[Math.min(SPARK_LEVELS.length - 1, Math.max(0, level))];
    })
    .join('');
}
