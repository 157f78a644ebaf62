import { EventEmitter } from 'events';
import {
  LineSource,
  MonitorConfiguration,
  Notifier,
  StatsSnapshot,
} from '../common/interfaces/monitor.interfaces';
import { SHUTDOWN_DRAIN_TIMEOUT_MS } from '../common/time.constants';
import { DashboardConsumer, FrameWriter } from '../dashboard/dashboard';
import { logger } from '../utils/logger';
import { DetachedTaskRunner } from './detached-task';
import { FileTailSource } from './file-tail-source';
import { AlertEvent, IngestionPipeline, NotificationDispatchedEvent } from './ingestion-pipeline';
import { LineClassifier } from './line-classifier';
import { NotificationGate } from './notification-gate';
import { WebhookNotifier } from './notifier';
import { PatternMatcher } from './pattern-matcher';
import { Clock, SharedStats } from './shared-stats';

/**
 * A line source that can be asked to stop
 */
export interface ClosableLineSource extends LineSource {
  close(): void;
}

/**
 * Collaborator overrides, mainly for tests
 */
export interface LogMonitorDependencies {
  source?: ClosableLineSource;
  notifier?: Notifier;
  dashboardOutput?: FrameWriter;
  clock?: Clock;
}

/**
 * Log Monitor
 *
 * Wires the monitor together: compiles the rules, owns the single stats
 * aggregator and notification gate, follows the log file through the
 * ingestion pipeline and (optionally) drives the terminal dashboard.
 *
 * Construction compiles every rule pattern, so an invalid rule throws a
 * ConfigError before any line is read.
 *
 * Re-emits the pipeline's `alert`, `notificationDispatched` and
 * `sourceExhausted` events.
 */
export class LogMonitor extends EventEmitter {
  private readonly stats: SharedStats;
  private readonly gate: NotificationGate;
  private readonly tasks = new DetachedTaskRunner();
  private readonly ingestion: IngestionPipeline;
  private readonly source: ClosableLineSource;
  private readonly dashboard: DashboardConsumer | null;
  private running = false;

  constructor(configuration: MonitorConfiguration, dependencies: LogMonitorDependencies = {}) {
    super();
    const clock = dependencies.clock ?? Date.now;

    const matcher = PatternMatcher.compile(configuration.rules);
    this.stats = new SharedStats(clock);
    this.gate = new NotificationGate(undefined, clock);

    const notifier =
      dependencies.notifier ??
      (configuration.notification.webhookUrl
        ? new WebhookNotifier(configuration.notification.webhookUrl, configuration.notification.timeoutMs)
        : undefined);

    this.ingestion = new IngestionPipeline({
      classifier: new LineClassifier(matcher),
      stats: this.stats,
      gate: this.gate,
      notifier,
      tasks: this.tasks,
      clock,
    });

    this.ingestion.on('alert', (event: AlertEvent) => this.emit('alert', event));
    this.ingestion.on('notificationDispatched', (event: NotificationDispatchedEvent) =>
      this.emit('notificationDispatched', event),
    );
    this.ingestion.on('sourceExhausted', () => this.emit('sourceExhausted'));

    this.source =
      dependencies.source ??
      new FileTailSource(configuration.tail.filePath, {
        pollIntervalMs: configuration.tail.pollIntervalMs,
        fromStart: configuration.tail.fromStart,
      });

    this.dashboard = configuration.dashboard.enabled
      ? new DashboardConsumer(this.ingestion, {
          pollingIntervalMs: configuration.dashboard.pollingIntervalMs,
          output: dependencies.dashboardOutput,
          clock,
        })
      : null;
  }

  /**
   * Start the dashboard and consume the source.
   *
   * Resolves when the source ends; rejects with a TailSourceError when it
   * fails. Either way the dashboard is stopped on return.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Log monitor is already running');
    }
    this.running = true;
    this.dashboard?.start();

    try {
      await this.ingestion.run(this.source);
    } finally {
      this.running = false;
      this.dashboard?.stop();
    }
  }

  /**
   * Stop following the source and wait briefly for in-flight notifications.
   * Notifications still running after the drain timeout are abandoned.
   */
  async stop(drainTimeoutMs: number = SHUTDOWN_DRAIN_TIMEOUT_MS): Promise<void> {
    this.source.close();
    this.dashboard?.stop();

    const settled = await this.tasks.drain(drainTimeoutMs);
    if (!settled) {
      logger.warn(`⚠️ ${this.tasks.inFlight} notification(s) still in flight at shutdown`);
    }
  }

  getStats(): StatsSnapshot {
    return this.ingestion.getStats();
  }

  get isRunning(): boolean {
    return this.running;
  }
}
