import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

interface Config {
  telegram: {
    botToken: string;
  };
  hyperliquid: {
    infoUrl: string;
    timeoutMs: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
  };
  database: {
    url: string;
  };
  server: {
    nodeEnv: string;
    logLevel: string;
  };
  monitor: {
    pollIntervalMin: number;
    maxJitterSec: number;
    walletDelayMs: number;
    changeThresholdPct: number;
    compareAbsolute: boolean;
    minNotionalUsd: number;
    maxWalletsPerUser: number;
    defaultWalletAddress: string;
    displayTimeZone: string;
  };
}

const config: Config = {
  telegram: {
    botToken: process.env['TELEGRAM_BOT_TOKEN'] || '',
  },
  hyperliquid: {
    infoUrl: process.env['HYPERLIQUID_INFO_URL'] || 'https://api.hyperliquid.xyz/info',
    timeoutMs: parseInt(process.env['HYPERLIQUID_TIMEOUT_MS'] || '30000', 10),
    maxAttempts: parseInt(process.env['HYPERLIQUID_MAX_ATTEMPTS'] || '3', 10),
    retryBaseDelayMs: parseInt(process.env['HYPERLIQUID_RETRY_BASE_DELAY_MS'] || '1000', 10),
  },
  database: {
    url: process.env['DATABASE_URL'] || 'postgresql://localhost:5432/perp_watch',
  },
  server: {
    nodeEnv: process.env['NODE_ENV'] || 'development',
    logLevel: process.env['LOG_LEVEL'] || 'info',
  },
  monitor: {
    pollIntervalMin: parseFloat(process.env['POLL_INTERVAL_MIN'] || '20'),
    maxJitterSec: parseInt(process.env['POLL_JITTER_MAX_SEC'] || '60', 10),
    walletDelayMs: parseInt(process.env['WALLET_DELAY_MS'] || '1000', 10),
    changeThresholdPct: parseFloat(process.env['CHANGE_THRESHOLD_PCT'] || '5'),
    compareAbsolute: (process.env['COMPARE_ABS'] || 'true').toLowerCase() === 'true',
    minNotionalUsd: parseFloat(process.env['MIN_NOTIONAL_USD'] || '10000'),
    maxWalletsPerUser: parseInt(process.env['MAX_WALLETS_PER_USER'] || '5', 10),
    defaultWalletAddress: (process.env['DEFAULT_WALLET_ADDRESS'] || '').trim().toLowerCase(),
    displayTimeZone: process.env['DISPLAY_TIMEZONE'] || 'UTC',
  },
};

const NUMERIC_SETTINGS: Array<[string, number]> = [
  ['HYPERLIQUID_TIMEOUT_MS', config.hyperliquid.timeoutMs],
  ['HYPERLIQUID_MAX_ATTEMPTS', config.hyperliquid.maxAttempts],
  ['HYPERLIQUID_RETRY_BASE_DELAY_MS', config.hyperliquid.retryBaseDelayMs],
  ['POLL_INTERVAL_MIN', config.monitor.pollIntervalMin],
  ['POLL_JITTER_MAX_SEC', config.monitor.maxJitterSec],
  ['WALLET_DELAY_MS', config.monitor.walletDelayMs],
  ['CHANGE_THRESHOLD_PCT', config.monitor.changeThresholdPct],
  ['MIN_NOTIONAL_USD', config.monitor.minNotionalUsd],
  ['MAX_WALLETS_PER_USER', config.monitor.maxWalletsPerUser],
];

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

// Validate required environment variables
function validateConfig(): void {
  const requiredVars = ['TELEGRAM_BOT_TOKEN', 'DATABASE_URL'];

  const missingVars = requiredVars.filter(varName => !process.env[varName]);

  if (missingVars.length > 0) {
    throw new Error(`Missing required environment variables: ${missingVars.join(', ')}`);
  }

  const invalidVars = NUMERIC_SETTINGS
    .filter(([, value]) => !Number.isFinite(value) || value < 0)
    .map(([name]) => name);

  if (invalidVars.length > 0) {
    throw new Error(`Invalid numeric environment variables: ${invalidVars.join(', ')}`);
  }

  if (config.monitor.maxWalletsPerUser < 1) {
    throw new Error('MAX_WALLETS_PER_USER must be at least 1');
  }

  if (!isValidTimeZone(config.monitor.displayTimeZone)) {
    throw new Error(`Invalid DISPLAY_TIMEZONE: ${config.monitor.displayTimeZone}`);
  }
}

export { config, validateConfig };
export type { Config };
