#!/usr/bin/env node
/**
 * Robot Link Entry Point
 */

import { ENV, validateConfig } from './config/env.js';
import { logger } from './utils/logger.js';
import { RobotClient } from './robot/RobotClient.js';
import { MonitorServer } from './monitor/server.js';

async function main(): Promise<void> {
  console.log(`
  ╔══════════════════════════════════════╗
  ║           🤖 Robot Link              ║
  ║     status · image · cmd · audio     ║
  ╚══════════════════════════════════════╝
  `);

  validateConfig();

  const host = process.argv[2] || ENV.ROBOT_HOST;
  const robot = await RobotClient.connect({ host });
  logger.info('Main', `Robot connected at ${host}, battery ${robot.getBatteryCapacity()}%`);

  let monitor: MonitorServer | null = null;
  if (ENV.MONITOR_PORT > 0) {
    monitor = new MonitorServer(robot);
    await monitor.start(ENV.MONITOR_PORT);
  }

  const stopMonitor = async (): Promise<void> => {
    if (!monitor) return;
    await monitor.stop();
    monitor = null;
  };

  robot.on('terminated', (reason) => {
    if (reason === 'shutdown') return;
    logger.info('Main', `Robot ended the program (${reason})`);
    monitor?.announceTermination(reason);
    stopMonitor()
      .catch((err: unknown) => logger.error('Main', 'Monitor shutdown failed', err))
      .finally(() => process.exit(0));
  });

  // Graceful shutdown
  const shutdown = (): void => {
    logger.info('Main', 'Shutting down...');
    Promise.all([robot.shutdown(), stopMonitor()])
      .catch((err: unknown) => logger.error('Main', 'Shutdown failed', err))
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  logger.error('Main', 'Failed to start robot link', err);
  process.exit(1);
});
