import { ClosableLineSource, LogMonitor } from '../src/core/log-monitor';
import { AlertEvent } from '../src/core/ingestion-pipeline';
import { ConfigError, TailSourceError } from '../src/common/errors';
import { MonitorConfiguration, Notifier } from '../src/common/interfaces/monitor.interfaces';
import { DEFAULT_RULES } from '../src/config/rules-loader';
import { logger } from '../src/utils/logger';

/**
 * In-memory line source; optionally fails after its lines are consumed
 */
class ArraySource implements ClosableLineSource {
  closed = false;

  constructor(
    private readonly lines: string[],
    private readonly failure?: Error,
  ) {}

  close(): void {
    this.closed = true;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string> {
    for (const line of this.lines) {
      if (this.closed) return;
      yield line;
    }
    if (this.failure) {
      throw this.failure;
    }
  }
}

function configuration(overrides: Partial<MonitorConfiguration> = {}): MonitorConfiguration {
  return {
    rules: DEFAULT_RULES.map((rule) => ({ ...rule })),
    tail: { filePath: 'app.log', pollIntervalMs: 250, fromStart: false },
    notification: { webhookUrl: undefined, timeoutMs: 5000 },
    dashboard: { enabled: false, pollingIntervalMs: 100 },
    healthCheck: { enabled: false, port: 3000 },
    ...overrides,
  };
}

describe('LogMonitor', () => {
  let now: number;
  const clock = () => now;
  let notify: jest.Mock<Promise<void>, [string]>;
  let notifier: Notifier;

  beforeEach(() => {
    now = 1_700_000_000_000;
    notify = jest.fn<Promise<void>, [string]>().mockResolvedValue(undefined);
    notifier = { notify };
  });

  describe('Construction', () => {
    it('should reject invalid rule patterns before reading any line', () => {
      const source = new ArraySource(['ERROR: never read']);

      expect(
        () =>
          new LogMonitor(configuration({ rules: [{ name: 'Broken', pattern: '[unclosed', threshold: 1 }] }), {
            source,
          }),
      ).toThrow(ConfigError);
    });
  });

  describe('run', () => {
    it('should process every line from the source and resolve when it ends', async () => {
      const source = new ArraySource(['boot', 'ERROR: disk full', '{"level":"fatal","msg":"oom"}', 'ok']);
      const monitor = new LogMonitor(configuration(), { source, notifier, clock });
      const alerts: AlertEvent[] = [];
      monitor.on('alert', (event: AlertEvent) => alerts.push(event));
      const exhausted = jest.fn();
      monitor.on('sourceExhausted', exhausted);

      await monitor.run();

      const stats = monitor.getStats();
      expect(stats.totalLines).toBe(4);
      expect(stats.totalAlerts).toBe(2);
      expect(stats.lastAlert).toBe('structured: oom');
      expect(alerts.map((event) => event.classification.source)).toEqual(['pattern', 'structured']);
      expect(exhausted).toHaveBeenCalledTimes(1);
      expect(monitor.isRunning).toBe(false);
    });

    it('should notify only once inside the cooldown window', async () => {
      const source = new ArraySource(['ERROR: one', 'ERROR: two', 'PANIC: three']);
      const monitor = new LogMonitor(configuration(), { source, notifier, clock });

      await monitor.run();
      await monitor.stop();

      expect(notify).toHaveBeenCalledTimes(1);
      expect(notify).toHaveBeenCalledWith('🚨 Log Alert: Pattern Match (Error)!\nLog: ERROR: one');
    });

    it('should not notify without a webhook URL or notifier', async () => {
      const source = new ArraySource(['ERROR: one']);
      const monitor = new LogMonitor(configuration(), { source, clock });

      await monitor.run();

      expect(monitor.getStats().totalAlerts).toBe(1);
      expect(monitor.getStats().lastNotificationAt).toBeNull();
    });

    it('should reject with TailSourceError when the source fails', async () => {
      const source = new ArraySource(['ERROR: one'], new Error('EIO: i/o error, read'));
      const monitor = new LogMonitor(configuration(), { source, clock });

      await expect(monitor.run()).rejects.toBeInstanceOf(TailSourceError);
      expect(monitor.getStats().totalLines).toBe(1);
      expect(monitor.isRunning).toBe(false);
    });

    it('should refuse to run twice at the same time', async () => {
      const source = new ArraySource(['a', 'b']);
      const monitor = new LogMonitor(configuration(), { source, clock });

      const first = monitor.run();

      await expect(monitor.run()).rejects.toThrow('Log monitor is already running');
      await first;
    });

    describe('Dashboard', () => {
      beforeEach(() => {
        jest.useFakeTimers();
      });

      afterEach(() => {
        jest.useRealTimers();
      });

      it('should stop refreshing the dashboard once the source ends', async () => {
        const frames: string[] = [];
        const source = new ArraySource(['ERROR: one']);
        const monitor = new LogMonitor(configuration({ dashboard: { enabled: true, pollingIntervalMs: 100 } }), {
          source,
          clock,
          dashboardOutput: { write: (chunk: string) => frames.push(chunk) },
        });

        await monitor.run();
        jest.advanceTimersByTime(1_000);

        expect(monitor.isRunning).toBe(false);
        expect(frames).toEqual([]);
      });
    });
  });

  describe('stop', () => {
    it('should close the source', async () => {
      const source = new ArraySource([]);
      const monitor = new LogMonitor(configuration(), { source, clock });

      await monitor.stop();

      expect(source.closed).toBe(true);
    });

    it('should warn when notifications are still in flight after the drain timeout', async () => {
      notify.mockReturnValue(new Promise<void>(() => undefined));
      const warn = jest.spyOn(logger, 'warn').mockImplementation(() => {});
      const source = new ArraySource(['ERROR: slow webhook']);
      const monitor = new LogMonitor(configuration(), { source, notifier, clock });

      await monitor.run();
      await monitor.stop(20);

      expect(warn).toHaveBeenCalledWith('⚠️ 1 notification(s) still in flight at shutdown');
      warn.mockRestore();
    });
  });
});
