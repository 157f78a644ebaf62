import { EventEmitter } from 'events';
import {
  Classification,
  LineSource,
  Notifier,
  StatsSnapshot,
} from '../common/interfaces/monitor.interfaces';
import { TailSourceError, describeError } from '../common/errors';
import { LineClassifier } from './line-classifier';
import { SharedStats, Clock } from './shared-stats';
import { NotificationGate } from './notification-gate';
import { DetachedTaskRunner } from './detached-task';
import { formatNotificationText } from './notifier';

/**
 * Collaborators wired into the pipeline. The gate and stats are created by
 * the caller and owned for the lifetime of the process.
 */
export interface IngestionPipelineOptions {
  classifier: LineClassifier;
  stats: SharedStats;
  gate: NotificationGate;
  /** Notification target; notifications are off when absent */
  notifier?: Notifier;
  tasks?: DetachedTaskRunner;
  clock?: Clock;
}

/**
 * Emitted for every alert-worthy line
 */
export interface AlertEvent {
  line: string;
  classification: Classification;
  totalAlerts: number;
}

/**
 * Emitted when a notification has been handed to the detached runner
 */
export interface NotificationDispatchedEvent {
  text: string;
  dispatchedAt: Date;
}

/**
 * Line ingestion pipeline
 *
 * Pulls lines one at a time from a line source and, for each one, counts
 * it, classifies it, records alerts and (cooldown permitting) starts a
 * notification it never waits for.
 *
 * Events:
 * - `alert` ({@link AlertEvent})
 * - `notificationDispatched` ({@link NotificationDispatchedEvent})
 * - `sourceExhausted` (no payload)
 */
export class IngestionPipeline extends EventEmitter {
  private readonly classifier: LineClassifier;
  private readonly stats: SharedStats;
  private readonly gate: NotificationGate;
  private readonly notifier?: Notifier;
  private readonly tasks: DetachedTaskRunner;
  private readonly clock: Clock;

  constructor(options: IngestionPipelineOptions) {
    super();
    this.classifier = options.classifier;
    this.stats = options.stats;
    this.gate = options.gate;
    this.notifier = options.notifier;
    this.tasks = options.tasks ?? new DetachedTaskRunner();
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Process a single line. Synchronous: the line is fully counted,
   * classified and recorded before this returns.
   */
  processLine(line: string): Classification {
    this.stats.recordLine();

    const classification = this.classifier.classify(line);
    if (!classification.isAlert || classification.message === null) {
      return classification;
    }

    this.stats.recordAlert(classification.message);
    this.emit('alert', {
      line,
      classification,
      totalAlerts: this.stats.snapshot().totalAlerts,
    } satisfies AlertEvent);

    if (this.notifier && this.gate.shouldNotify()) {
      this.dispatch(this.notifier, classification);
    }

    return classification;
  }

  /**
   * Consume a line source until it ends.
   *
   * Resolves when the source is exhausted. A failing source is fatal: the
   * returned promise rejects with a {@link TailSourceError} and nothing is
   * retried here.
   */
  async run(source: LineSource): Promise<void> {
    const iterator = source[Symbol.asyncIterator]();
    let exhausted = false;

    try {
      for (;;) {
        let next: IteratorResult<string>;
        try {
          next = await iterator.next();
        } catch (error) {
          exhausted = true;
          throw error instanceof TailSourceError
            ? error
            : new TailSourceError(`Line source failed: ${describeError(error)}`, error);
        }

        if (next.done) {
          exhausted = true;
          break;
        }
        this.processLine(next.value);
      }
    } finally {
      if (!exhausted) {
        await iterator.return?.();
      }
    }

    this.emit('sourceExhausted');
  }

  getStats(): StatsSnapshot {
    return this.stats.snapshot();
  }

  private dispatch(notifier: Notifier, classification: Classification): void {
    const text = formatNotificationText(classification);
    const dispatchedAt = new Date(this.clock());

    this.stats.recordNotification(dispatchedAt);
    this.tasks.spawn('webhook-notification', () => notifier.notify(text));

    this.emit('notificationDispatched', { text, dispatchedAt } satisfies NotificationDispatchedEvent);
  }
}
