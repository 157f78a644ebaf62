import Joi from 'joi';
import { MonitorConfiguration, Rule } from '../common/interfaces/monitor.interfaces';
import { ConfigError } from '../common/errors';
import {
  DASHBOARD_POLL_MIN_MS,
  DASHBOARD_POLL_MAX_MS,
  DASHBOARD_POLL_DEFAULT_MS,
  TAIL_POLL_MIN_MS,
  TAIL_POLL_MAX_MS,
  TAIL_POLL_DEFAULT_MS,
  WEBHOOK_TIMEOUT_MIN_MS,
  WEBHOOK_TIMEOUT_MAX_MS,
  WEBHOOK_TIMEOUT_DEFAULT_MS,
} from '../common/time.constants';
import { LogLevel } from '../utils/logger';
import { loadRules } from './rules-loader';

/**
 * Environment variables read by the monitor, after validation and conversion
 */
interface MonitorEnvironment {
  NODE_ENV: string;
  LOG_LEVEL: LogLevel;
  LOG_FILE_PATH: string;
  RULES_FILE: string;
  POLLING_INTERVAL_MS: number;
  TAIL_POLL_INTERVAL_MS: number;
  TAIL_FROM_START: boolean;
  WEBHOOK_URL?: string;
  WEBHOOK_TIMEOUT_MS: number;
  DASHBOARD_ENABLED: boolean;
  ENABLE_HEALTH_CHECK: boolean;
  HEALTH_CHECK_PORT: number;
}

/**
 * Environment variable validation schema
 * Defines validation rules, default values and error messages for every
 * variable the monitor reads
 */
const environmentSchema = Joi.object<MonitorEnvironment>({
  // ====================================
  // APPLICATION CONFIGURATION
  // ====================================
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'staging', 'test')
    .default('development')
    .description('Node.js environment mode'),

  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'info', 'debug', 'trace')
    .default('info')
    .description('Logging verbosity level'),

  // ====================================
  // INGESTION CONFIGURATION
  // ====================================
  LOG_FILE_PATH: Joi.string()
    .default('app.log')
    .description('Log file to follow; created when missing'),

  RULES_FILE: Joi.string()
    .default('rules.json')
    .description('JSON rules file; built-in Error/Panic rules are used when it does not exist'),

  TAIL_POLL_INTERVAL_MS: Joi.number()
    .integer()
    .min(TAIL_POLL_MIN_MS)
    .max(TAIL_POLL_MAX_MS)
    .default(TAIL_POLL_DEFAULT_MS)
    .description('Delay between polls of the log file when idle (milliseconds)'),

  TAIL_FROM_START: Joi.boolean()
    .default(false)
    .description('Process existing file content before following new lines'),

  // ====================================
  // NOTIFICATION CONFIGURATION
  // ====================================
  WEBHOOK_URL: Joi.string()
    .allow('')
    .uri({ scheme: ['http', 'https'] })
    .optional()
    .description('Endpoint receiving alert notifications (optional)'),

  WEBHOOK_TIMEOUT_MS: Joi.number()
    .integer()
    .min(WEBHOOK_TIMEOUT_MIN_MS)
    .max(WEBHOOK_TIMEOUT_MAX_MS)
    .default(WEBHOOK_TIMEOUT_DEFAULT_MS)
    .description('Timeout for a single notification request (milliseconds)'),

  // ====================================
  // DASHBOARD CONFIGURATION
  // ====================================
  DASHBOARD_ENABLED: Joi.boolean()
    .default(true)
    .description('Render the live terminal dashboard'),

  POLLING_INTERVAL_MS: Joi.number()
    .integer()
    .min(DASHBOARD_POLL_MIN_MS)
    .max(DASHBOARD_POLL_MAX_MS)
    .default(DASHBOARD_POLL_DEFAULT_MS)
    .description('Dashboard refresh interval (milliseconds)'),

  // ====================================
  // HEALTH CHECK CONFIGURATION
  // ====================================
  ENABLE_HEALTH_CHECK: Joi.boolean()
    .default(false)
    .description('Enable HTTP health check server'),

  HEALTH_CHECK_PORT: Joi.number()
    .integer()
    .min(1024)
    .max(65535)
    .default(3000)
    .description('Port for health check server'),
}).required();

/**
 * Environment variable validation result
 */
type ValidationResult =
  | { isValid: true; environment: MonitorEnvironment; warnings: string[] }
  | { isValid: false; errors: string[] };

/**
 * Validated monitor configuration
 */
export class MonitorConfig {
  private constructor(
    private readonly environment: MonitorEnvironment,
    private readonly rules: Rule[],
  ) {}

  /**
   * Validates environment variables, loads the rules file and creates a
   * MonitorConfig instance
   *
   * @param env - Variables to read, `process.env` by default
   * @throws {ConfigError} When validation fails, with one detail per problem
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): MonitorConfig {
    const result = this.validateEnvironment(env);

    if (!result.isValid) {
      const errorMessage = [
        '❌ Environment variable validation failed:',
        '',
        ...result.errors.map((error) => `  • ${error}`),
        '',
        '💡 Check your .env file and ensure all variables are properly set.',
        '📖 See .env.example for valid configuration examples.',
      ].join('\n');

      throw new ConfigError(errorMessage, result.errors);
    }

    const rules = loadRules(result.environment.RULES_FILE);
    const config = new MonitorConfig(result.environment, rules);

    if (result.warnings.length > 0) {
      console.log('⚠️  Configuration warnings:');
      result.warnings.forEach((warning) => console.log(`  • ${warning}`));
      console.log('');
    }

    console.log('✅ Environment configuration validated successfully');
    console.log(`📋 Tailing: ${result.environment.LOG_FILE_PATH} with ${rules.length} rule(s)`);
    console.log(`🔧 Notifications: ${config.toMonitorConfiguration().notification.webhookUrl ? 'enabled' : 'disabled'}`);
    console.log('');

    return config;
  }

  /**
   * Validates environment variables using the Joi schema
   *
   * @private
   */
  private static validateEnvironment(env: NodeJS.ProcessEnv): ValidationResult {
    const result = environmentSchema.validate(env, {
      allowUnknown: true,
      stripUnknown: false,
      abortEarly: false,
      convert: true,
    });

    if (result.error) {
      return {
        isValid: false,
        errors: result.error.details.map((detail) => `${detail.path.join('.')}: ${detail.message}`),
      };
    }

    const environment = result.value;
    const warnings: string[] = [];

    if (!environment.WEBHOOK_URL) {
      warnings.push('No WEBHOOK_URL provided - alerts will be counted but not delivered');
    }

    if (!environment.DASHBOARD_ENABLED && !environment.ENABLE_HEALTH_CHECK) {
      warnings.push('Dashboard and health check are both disabled - stats are only visible in the console log');
    }

    return { isValid: true, environment, warnings };
  }

  /**
   * Converts validated settings to the shape used by the monitor
   */
  toMonitorConfiguration(): MonitorConfiguration {
    const env = this.environment;
    return {
      rules: this.rules.map((rule) => ({ ...rule })),
      tail: {
        filePath: env.LOG_FILE_PATH,
        pollIntervalMs: env.TAIL_POLL_INTERVAL_MS,
        fromStart: env.TAIL_FROM_START,
      },
      notification: {
        webhookUrl: env.WEBHOOK_URL || undefined,
        timeoutMs: env.WEBHOOK_TIMEOUT_MS,
      },
      dashboard: {
        enabled: env.DASHBOARD_ENABLED,
        pollingIntervalMs: env.POLLING_INTERVAL_MS,
      },
      healthCheck: {
        enabled: env.ENABLE_HEALTH_CHECK,
        port: env.HEALTH_CHECK_PORT,
      },
    };
  }

  /**
   * Get application configuration
   */
  getAppConfig(): { nodeEnv: string; logLevel: LogLevel } {
    return {
      nodeEnv: this.environment.NODE_ENV,
      logLevel: this.environment.LOG_LEVEL,
    };
  }
}
