import { Pool, PoolClient, QueryResultRow } from 'pg';
import logger from '../../utils/logger';
import { DatabaseError, getErrorMessage, isOperationalError } from '../../utils/error-handler';

interface PoolConfig {
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  maxUses: number;
  statementTimeoutMillis: number;
}

interface ConnectionStats {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
  activeCount: number;
  averageResponseTime: number;
}

interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  responseTime: number;
  pool: ConnectionStats;
  error?: string;
}

const RETRYABLE_CODES = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  '08006', // connection_failure
  '08001', // sqlclient_unable_to_establish_sqlconnection
  '08004', // server_rejected_connection
  '57P03', // cannot_connect_now
];

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return String(error.code);
  }
  return undefined;
}

function maskUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ':***@');
}

class DatabasePool {
  private pool: Pool | null = null;
  private config: PoolConfig;
  private readonly connectionString: string;
  private maxRetryAttempts = 3;
  private baseRetryDelay = 500;
  private responseTimes: number[] = [];
  private maxResponseTimeHistory = 100;

  constructor(connectionString: string, poolConfig?: Partial<PoolConfig>) {
    this.connectionString = connectionString;
    this.config = {
      max: poolConfig?.max || 10,
      idleTimeoutMillis: poolConfig?.idleTimeoutMillis || 30000,
      connectionTimeoutMillis: poolConfig?.connectionTimeoutMillis || 5000,
      maxUses: poolConfig?.maxUses || 7500,
      statementTimeoutMillis: poolConfig?.statementTimeoutMillis || 15000,
    };
  }

  async connect(): Promise<void> {
    if (this.pool) {
      return;
    }

    try {
      this.pool = new Pool({
        connectionString: this.connectionString,
        max: this.config.max,
        idleTimeoutMillis: this.config.idleTimeoutMillis,
        connectionTimeoutMillis: this.config.connectionTimeoutMillis,
        maxUses: this.config.maxUses,
        statement_timeout: this.config.statementTimeoutMillis,
        application_name: 'perp-watch-bot',
      });

      this.pool.on('error', (error: Error) => {
        // Idle client errors are reported here; the pool replaces the client.
        logger.error('Database pool error:', {
          error: error.message,
          stack: error.stack,
        });
      });

      await this.testConnection();

      logger.info('Database pool initialized successfully', {
        url: maskUrl(this.connectionString),
        max: this.config.max,
      });
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('Failed to initialize database pool:', {
        url: maskUrl(this.connectionString),
        error: message,
      });
      const failedPool = this.pool;
      this.pool = null;
      await failedPool?.end().catch((endError: unknown) => {
        logger.warn('Failed to end database pool after init failure', {
          error: getErrorMessage(endError),
        });
      });
      throw new DatabaseError(`Pool initialization failed: ${message}`);
    }
  }

  private getPool(): Pool {
    if (!this.pool) {
      throw new DatabaseError('Database pool not initialized');
    }
    return this.pool;
  }

  private async testConnection(): Promise<void> {
    const result = await this.getPool().query<{ current_time: Date }>('SELECT NOW() AS current_time');
    logger.info('Database connection test successful', {
      currentTime: result.rows[0]?.current_time,
    });
  }

  private calculateExponentialBackoff(attempt: number): number {
    return Math.min(this.baseRetryDelay * Math.pow(2, attempt), 10000);
  }

  private updateResponseTime(duration: number): void {
    this.responseTimes.push(duration);
    if (this.responseTimes.length > this.maxResponseTimeHistory) {
      this.responseTimes.shift();
    }
  }

  private getAverageResponseTime(): number {
    if (this.responseTimes.length === 0) return 0;
    return Math.round(
      this.responseTimes.reduce((sum, time) => sum + time, 0) / this.responseTimes.length
    );
  }

  private shouldRetry(error: unknown): boolean {
    const code = errorCode(error);
    if (code && RETRYABLE_CODES.includes(code)) {
      return true;
    }
    const message = getErrorMessage(error);
    return message.includes('Connection terminated') || message.includes('ECONNRESET');
  }

  async query<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
    for (let attempt = 0; ; attempt++) {
      const start = Date.now();
      try {
        const result = await this.getPool().query<T>(text, params);
        const duration = Date.now() - start;
        this.updateResponseTime(duration);

        logger.debug(`Database query completed in ${duration}ms`, {
          query: text.substring(0, 100),
          rowCount: result.rowCount,
        });

        return result.rows;
      } catch (error) {
        logger.error('Database query failed:', {
          query: text.substring(0, 100) + (text.length > 100 ? '...' : ''),
          paramCount: params.length,
          duration: Date.now() - start,
          error: getErrorMessage(error),
          code: errorCode(error),
        });

        if (this.shouldRetry(error) && attempt < this.maxRetryAttempts) {
          const delay = this.calculateExponentialBackoff(attempt);
          logger.warn(`Retrying database query in ${delay}ms`, {
            attempt: attempt + 1,
            maxAttempts: this.maxRetryAttempts,
          });
          await new Promise(resolve => setTimeout(resolve, delay));
          continue;
        }

        if (isOperationalError(error)) {
          throw error;
        }
        throw new DatabaseError(`Query failed: ${getErrorMessage(error)}`);
      }
    }
  }

  async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const start = Date.now();
    const client = await this.getPool().connect();

    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');

      logger.debug('Database transaction committed', { duration: Date.now() - start });
      return result;
    } catch (error) {
      const message = getErrorMessage(error);
      try {
        await client.query('ROLLBACK');
        logger.warn('Database transaction rolled back', {
          duration: Date.now() - start,
          error: message,
        });
      } catch (rollbackError) {
        logger.error('Failed to rollback transaction:', {
          rollbackError: getErrorMessage(rollbackError),
          originalError: message,
        });
      }

      if (isOperationalError(error)) {
        throw error;
      }
      throw new DatabaseError(`Transaction failed: ${message}`);
    } finally {
      client.release();
    }
  }

  getStats(): ConnectionStats {
    if (!this.pool) {
      return {
        totalCount: 0,
        idleCount: 0,
        waitingCount: 0,
        activeCount: 0,
        averageResponseTime: 0,
      };
    }

    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
      activeCount: this.pool.totalCount - this.pool.idleCount,
      averageResponseTime: this.getAverageResponseTime(),
    };
  }

  async healthCheck(): Promise<HealthStatus> {
    const startTime = Date.now();

    try {
      await this.query('SELECT 1 AS test_value');
      const responseTime = Date.now() - startTime;
      const pool = this.getStats();

      return {
        status: pool.waitingCount > 0 || responseTime > 1000 ? 'unhealthy' : 'healthy',
        responseTime,
        pool,
      };
    } catch (error) {
      logger.error('Database health check failed:', { error: getErrorMessage(error) });
      return {
        status: 'unhealthy',
        responseTime: Date.now() - startTime,
        pool: this.getStats(),
        error: getErrorMessage(error),
      };
    }
  }

  async close(): Promise<void> {
    if (!this.pool) {
      return;
    }

    try {
      logger.info('Closing database pool...', { stats: this.getStats() });
      await this.pool.end();
      logger.info('Database pool closed successfully');
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('Error closing database pool:', { error: message });
      throw new DatabaseError(`Pool close failed: ${message}`);
    } finally {
      this.pool = null;
      this.responseTimes = [];
    }
  }
}

export { DatabasePool, type PoolConfig, type ConnectionStats, type HealthStatus };
