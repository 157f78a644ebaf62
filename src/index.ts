#!/usr/bin/env node


import * as dotenv from 'dotenv';
import * as path from 'path';

import { LogMonitor } from './core/log-monitor';
import { MonitorConfig } from './config/monitor-config';
import { ConfigError } from './common/errors';
import { logger, setLogLevel } from './utils/logger';
import { gracefulShutdown, printErrorAndExit, runHttpBasedHealthCheck } from './utils/utils';
import { AlertEvent, NotificationDispatchedEvent } from './core/ingestion-pipeline';



const envFiles = [
  '.env.local',
  `.env.${process.env.NODE_ENV}`,
  '.env'
];

envFiles.forEach(file => {
  const envPath = path.resolve(process.cwd(), file);
  dotenv.config({ path: envPath });
});


async function main(): Promise<void> {
  console.log('🚀 Starting tailguard...');
  console.log(`📦 Version: ${process.env.npm_package_version || 'unknown'}`);
  console.log(`🌍 Environment: ${process.env.NODE_ENV || 'development'}`);

  let monitor: LogMonitor;

  try {
    const config = MonitorConfig.fromEnvironment();
    setLogLevel(config.getAppConfig().logLevel);

    const monitorConfig = config.toMonitorConfiguration();

    // Compiles every rule; an invalid pattern stops us here
    monitor = new LogMonitor(monitorConfig);

    // The dashboard owns the terminal; only log alerts when it is off
    if (!monitorConfig.dashboard.enabled) {
      monitor.on('alert', (event: AlertEvent) => {
        logger.warn(`🚨 Alert #${event.totalAlerts}: ${event.classification.message}`);
      });
    }

    monitor.on('notificationDispatched', (event: NotificationDispatchedEvent) => {
      logger.debug(`📤 Notification dispatched at ${event.dispatchedAt.toISOString()}`);
    });

    if (monitorConfig.healthCheck.enabled) {
      runHttpBasedHealthCheck(monitorConfig.healthCheck, monitor);
    }

    process.on('SIGTERM', async () => await gracefulShutdown('SIGTERM', monitor));
    process.on('SIGINT', async () => await gracefulShutdown('SIGINT', monitor));

    console.log(`🔄 tailguard is following ${monitorConfig.tail.filePath}. Press Ctrl+C to stop.`);
  } catch (error) {
    if (error instanceof ConfigError) {
      printErrorAndExit(`💥 Invalid configuration: ${error.message}`, 1);
    }
    printErrorAndExit(`💥 Failed to start tailguard: ${error}`, 1);
  }

  await monitor.run();

  console.log('🛑 Log source ended, shutting down.');
  await monitor.stop();
  process.exit(0);
}

// Start the application
main().catch((error) => {
  printErrorAndExit(`💥 Log ingestion stopped: ${error}`, 1);
});
