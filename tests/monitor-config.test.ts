import fs from 'fs';
import os from 'os';
import path from 'path';
import { MonitorConfig } from '../src/config/monitor-config';
import { ConfigError } from '../src/common/errors';
import * as timeConstants from '../src/common/time.constants';

describe('MonitorConfig', () => {
  let dir: string;
  let rulesFile: string;
  let consoleSpy: jest.SpyInstance;

  function envWith(overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
    return { RULES_FILE: rulesFile, ...overrides };
  }

  function validationErrors(env: NodeJS.ProcessEnv): string[] {
    try {
      MonitorConfig.fromEnvironment(env);
    } catch (error) {
      if (error instanceof ConfigError) {
        return error.details;
      }
      throw error;
    }
    return [];
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tailguard-config-'));
    rulesFile = path.join(dir, 'rules.json');
    consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('Defaults', () => {
    it('should use time constants as default values', () => {
      const configuration = MonitorConfig.fromEnvironment(envWith()).toMonitorConfiguration();

      expect(configuration.tail).toEqual({
        filePath: 'app.log',
        pollIntervalMs: timeConstants.TAIL_POLL_DEFAULT_MS,
        fromStart: false,
      });
      expect(configuration.notification).toEqual({
        webhookUrl: undefined,
        timeoutMs: timeConstants.WEBHOOK_TIMEOUT_DEFAULT_MS,
      });
      expect(configuration.dashboard).toEqual({
        enabled: true,
        pollingIntervalMs: timeConstants.DASHBOARD_POLL_DEFAULT_MS,
      });
      expect(configuration.healthCheck).toEqual({ enabled: false, port: 3000 });
    });

    it('should fall back to the built-in rules when the rules file is missing', () => {
      const configuration = MonitorConfig.fromEnvironment(envWith()).toMonitorConfiguration();

      expect(configuration.rules.map((rule) => rule.name)).toEqual(['Error', 'Panic']);
    });

    it('should default the application settings', () => {
      expect(MonitorConfig.fromEnvironment(envWith()).getAppConfig()).toEqual({
        nodeEnv: 'development',
        logLevel: 'info',
      });
    });
  });

  describe('Conversion', () => {
    it('should convert string variables to their typed values', () => {
      const configuration = MonitorConfig.fromEnvironment(
        envWith({
          LOG_FILE_PATH: '/var/log/service.log',
          TAIL_FROM_START: 'true',
          TAIL_POLL_INTERVAL_MS: '50',
          WEBHOOK_URL: 'https://hooks.example.test/services/test-secret',
          WEBHOOK_TIMEOUT_MS: '2500',
          DASHBOARD_ENABLED: 'false',
          POLLING_INTERVAL_MS: '500',
          ENABLE_HEALTH_CHECK: 'true',
          HEALTH_CHECK_PORT: '8080',
        }),
      ).toMonitorConfiguration();

      expect(configuration.tail).toEqual({ filePath: '/var/log/service.log', pollIntervalMs: 50, fromStart: true });
      expect(configuration.notification).toEqual({
        webhookUrl: 'https://hooks.example.test/services/test-secret',
        timeoutMs: 2500,
      });
      expect(configuration.dashboard).toEqual({ enabled: false, pollingIntervalMs: 500 });
      expect(configuration.healthCheck).toEqual({ enabled: true, port: 8080 });
    });

    it('should treat an empty webhook URL as no notifier', () => {
      const configuration = MonitorConfig.fromEnvironment(envWith({ WEBHOOK_URL: '' })).toMonitorConfiguration();

      expect(configuration.notification.webhookUrl).toBeUndefined();
    });

    it('should load rules from the configured file', () => {
      fs.writeFileSync(rulesFile, JSON.stringify([{ name: 'Fatal Error', pattern: 'FATAL' }]));

      const configuration = MonitorConfig.fromEnvironment(envWith()).toMonitorConfiguration();

      expect(configuration.rules).toEqual([{ name: 'Fatal Error', pattern: 'FATAL', threshold: 1 }]);
    });

    it('should ignore unrelated variables', () => {
      expect(() => MonitorConfig.fromEnvironment(envWith({ HOME: '/root', PATH: '/usr/bin' }))).not.toThrow();
    });
  });

  describe('Validation', () => {
    it('should reject a webhook URL that is not http or https', () => {
      const errors = validationErrors(envWith({ WEBHOOK_URL: 'not-a-url' }));

      expect(errors).toHaveLength(1);
      expect(errors[0].startsWith('WEBHOOK_URL: ')).toBe(true);
    });

    it('should reject values outside time constant limits', () => {
      const errors = validationErrors(
        envWith({
          POLLING_INTERVAL_MS: (timeConstants.DASHBOARD_POLL_MIN_MS - 1).toString(),
          WEBHOOK_TIMEOUT_MS: (timeConstants.WEBHOOK_TIMEOUT_MAX_MS + 1).toString(),
        }),
      );

      expect(errors).toHaveLength(2);
      expect(errors.some((error) => error.startsWith('POLLING_INTERVAL_MS: '))).toBe(true);
      expect(errors.some((error) => error.startsWith('WEBHOOK_TIMEOUT_MS: '))).toBe(true);
    });

    it('should accept values at the limits', () => {
      expect(() =>
        MonitorConfig.fromEnvironment(
          envWith({
            POLLING_INTERVAL_MS: timeConstants.DASHBOARD_POLL_MIN_MS.toString(),
            TAIL_POLL_INTERVAL_MS: timeConstants.TAIL_POLL_MAX_MS.toString(),
          }),
        ),
      ).not.toThrow();
    });

    it('should reject an unknown log level', () => {
      const errors = validationErrors(envWith({ LOG_LEVEL: 'verbose' }));

      expect(errors).toHaveLength(1);
      expect(errors[0].startsWith('LOG_LEVEL: ')).toBe(true);
    });

    it('should reject a privileged health check port', () => {
      expect(validationErrors(envWith({ HEALTH_CHECK_PORT: '80' }))[0].startsWith('HEALTH_CHECK_PORT: ')).toBe(true);
    });

    it('should format a readable error message', () => {
      expect(() => MonitorConfig.fromEnvironment(envWith({ TAIL_FROM_START: 'sometimes' }))).toThrow(
        '❌ Environment variable validation failed:',
      );
    });

    it('should surface rules file errors as ConfigError', () => {
      fs.writeFileSync(rulesFile, 'not json');

      expect(() => MonitorConfig.fromEnvironment(envWith())).toThrow(ConfigError);
    });
  });

  describe('Warnings', () => {
    it('should warn when no webhook URL is configured', () => {
      MonitorConfig.fromEnvironment(envWith());

      expect(consoleSpy).toHaveBeenCalledWith('  • No WEBHOOK_URL provided - alerts will be counted but not delivered');
    });

    it('should not warn about the webhook when one is configured', () => {
      MonitorConfig.fromEnvironment(envWith({ WEBHOOK_URL: 'http://localhost:9000/hook' }));

      expect(consoleSpy).not.toHaveBeenCalledWith(
        '  • No WEBHOOK_URL provided - alerts will be counted but not delivered',
      );
    });
  });
});
