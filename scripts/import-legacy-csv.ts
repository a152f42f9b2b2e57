import 'module-alias/register';
import fs from 'fs';
import path from 'path';
import { config } from '../src/config';
import { DatabasePool } from '../src/services/database/connection-pool';
import { PostgresMonitorStorage } from '../src/services/storage/postgres-storage';
import { WalletRegistry } from '../src/services/monitor/wallet-registry';
import {
  CsvRow,
  importLegacyData,
  parseCsv,
  parseSnapshots,
  parseSubscribers,
  parseWalletLinks,
  requireColumns,
} from '../src/services/storage/legacy-csv';
import { getErrorMessage } from '../src/utils/error-handler';
import logger from '../src/utils/logger';

function readRows(dir: string, file: string): CsvRow[] {
  const fullPath = path.join(dir, file);
  if (!fs.existsSync(fullPath)) {
    logger.warn(`${fullPath} not found, skipping`);
    return [];
  }
  return parseCsv(fs.readFileSync(fullPath, 'utf8'));
}

async function importLegacy(dataDir: string): Promise<void> {
  const subscriberRows = readRows(dataDir, 'subscribers.csv');
  const walletRows = readRows(dataDir, 'wallets.csv');
  const snapshotRows = readRows(dataDir, 'snapshots.csv');

  requireColumns(subscriberRows, ['user_id', 'active'], 'subscribers.csv');
  requireColumns(walletRows, ['user_id', 'address', 'added_at', 'active'], 'wallets.csv');
  requireColumns(snapshotRows, ['address', 'timestamp', 'token', 'amount'], 'snapshots.csv');

  const subscribers = parseSubscribers(subscriberRows);
  const links = parseWalletLinks(walletRows);
  const snapshots = parseSnapshots(snapshotRows);

  logger.info('Parsed legacy files', {
    subscribers: subscribers.records.length,
    links: links.records.length,
    snapshots: snapshots.records.length,
    invalidRows: subscribers.skipped + links.skipped + snapshots.skipped,
  });

  const pool = new DatabasePool(config.database.url);
  const storage = new PostgresMonitorStorage(pool);

  try {
    await pool.connect();
    const registry = new WalletRegistry(storage, {
      maxWalletsPerSubscriber: config.monitor.maxWalletsPerUser,
    });

    const summary = await importLegacyData(storage, registry, {
      subscribers: subscribers.records,
      links: links.records,
      snapshots: snapshots.records,
    });

    logger.info('Legacy import completed', { ...summary });
  } finally {
    await storage.close();
  }
}

importLegacy(process.argv[2] ?? 'data').catch((error: unknown) => {
  logger.error('Legacy import failed:', { error: getErrorMessage(error) });
  process.exitCode = 1;
});
