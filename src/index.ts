import 'module-alias/register';
import { config, validateConfig } from '@/config';
import logger from '@/utils/logger';
import { getErrorMessage } from '@/utils/error-handler';
import { DatabasePool } from '@/services/database/connection-pool';
import { PostgresMonitorStorage } from '@/services/storage/postgres-storage';
import { WalletRegistry } from '@/services/monitor/wallet-registry';
import { SubscriberStore } from '@/services/monitor/subscriber-store';
import { MonitoringCycle } from '@/services/monitor/monitoring-cycle';
import { MonitorScheduler } from '@/services/monitor/monitor-scheduler';
import { HyperliquidPositionFetcher } from '@/services/hyperliquid/position-fetcher';
import { AlertDispatcher, TelegramTransport } from '@/services/notifications/alert-dispatcher';
import { BotService } from '@/bot';

// Validate configuration on startup
try {
  validateConfig();
  logger.info('Configuration validation successful');
} catch (error) {
  logger.error('Configuration validation failed:', { error: getErrorMessage(error) });
  process.exit(1);
}

async function main(): Promise<void> {
  const pool = new DatabasePool(config.database.url);
  await pool.connect();

  const health = await pool.healthCheck();
  if (health.status === 'unhealthy') {
    logger.warn('Database health check reported problems', { ...health });
  }

  const storage = new PostgresMonitorStorage(pool);
  const registry = new WalletRegistry(storage, {
    maxWalletsPerSubscriber: config.monitor.maxWalletsPerUser,
  });
  const subscribers = new SubscriberStore(storage, registry);

  const bot = new BotService(
    { token: config.telegram.botToken, environment: config.server.nodeEnv },
    {
      subscribers,
      registry,
      defaultWalletAddress: config.monitor.defaultWalletAddress,
      thresholdPct: config.monitor.changeThresholdPct,
    }
  );

  const cycle = new MonitoringCycle(
    {
      registry,
      storage,
      fetcher: new HyperliquidPositionFetcher(config.hyperliquid),
      dispatcher: new AlertDispatcher(new TelegramTransport(bot.telegram)),
    },
    {
      detection: {
        thresholdPct: config.monitor.changeThresholdPct,
        compareAbsolute: config.monitor.compareAbsolute,
        minNotionalUsd: config.monitor.minNotionalUsd,
      },
      walletDelayMs: config.monitor.walletDelayMs,
      timeZone: config.monitor.displayTimeZone,
    }
  );

  const scheduler = new MonitorScheduler(cycle, {
    intervalMs: config.monitor.pollIntervalMin * 60 * 1000,
    maxJitterMs: config.monitor.maxJitterSec * 1000,
  });

  logger.info('Monitor settings', {
    defaultWallet: config.monitor.defaultWalletAddress || 'none',
    pollIntervalMin: config.monitor.pollIntervalMin,
    changeThresholdPct: config.monitor.changeThresholdPct,
    minNotionalUsd: config.monitor.minNotionalUsd,
    maxWalletsPerUser: config.monitor.maxWalletsPerUser,
  });

  await bot.start();
  scheduler.start();
  logger.info('🤖 PerpWatch bot started successfully');

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received. Shutting down gracefully...`);

    try {
      await bot.stop(signal);
      await scheduler.stop();
      await storage.close();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: getErrorMessage(error) });
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start PerpWatch bot', { error: getErrorMessage(error) });
  process.exit(1);
});
