import 'module-alias/register';
import fs from 'fs';
import path from 'path';
import { config } from '../src/config';
import { DatabasePool } from '../src/services/database/connection-pool';
import { getErrorMessage } from '../src/utils/error-handler';
import logger from '../src/utils/logger';

const MIGRATIONS_DIR = path.resolve(process.cwd(), 'src/services/database/migrations');

async function initDb(): Promise<void> {
  const pool = new DatabasePool(config.database.url);

  try {
    logger.info('Starting database initialization...');
    await pool.connect();

    const migrations = fs
      .readdirSync(MIGRATIONS_DIR)
      .filter(file => file.endsWith('.sql'))
      .sort();

    for (const file of migrations) {
      const sql = fs.readFileSync(path.join(MIGRATIONS_DIR, file), 'utf8');
      logger.info(`Executing migration ${file}...`);
      // Each file runs as one multi-statement query.
      await pool.query(sql);
    }

    logger.info('Database initialization completed successfully.');
  } catch (error) {
    logger.error('Database initialization failed:', { error: getErrorMessage(error) });
    process.exitCode = 1;
  } finally {
    await pool.close();
  }
}

initDb().catch((error: unknown) => {
  logger.error('Database initialization aborted:', { error: getErrorMessage(error) });
  process.exitCode = 1;
});
