import http from 'http';
import chalk from 'chalk';
import { HealthCheckConfig } from '../common/interfaces/monitor.interfaces';
import { StatsProvider } from '../dashboard/dashboard';

/**
 * Delays execution for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 * @returns Promise that resolves after delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function printErrorAndExit(message: string, exitCode = 1): never {
  console.error(`\n ${chalk.red('❌ Error:')} ${message}`);
  process.exit(exitCode);
}

/**
 * Request handler answering `GET /health` with the current stats snapshot
 */
export function createHealthCheckHandler(provider: StatsProvider): http.RequestListener {
  return (req, res) => {
    if (req.method === 'GET' && req.url === '/health') {
      const stats = provider.getStats();
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok', stats }));
    } else {
      res.writeHead(404);
      res.end('Not Found');
    }
  };
}

export function runHttpBasedHealthCheck(healthConfig: HealthCheckConfig, provider: StatsProvider): http.Server {
  const server = http.createServer(createHealthCheckHandler(provider));

  server.listen(healthConfig.port, () => {
    console.log(`🏥 Health check server listening on port ${healthConfig.port}`);
  });

  return server;
}

/**
 * Anything that must be stopped before the process exits
 */
export interface Stoppable {
  stop(): Promise<void>;
}

export async function gracefulShutdown(signal: string, monitor: Stoppable): Promise<void> {
  console.log(`📡 Received ${signal}, initiating graceful shutdown...`);
  try {
    await monitor.stop();
    process.exit(0);
  } catch (error) {
    printErrorAndExit(`❌ Error during shutdown: ${error}`, 1);
  }
}
