import type { Config } from '@/config';

type ConfigModule = { config: Config; validateConfig: () => void };

describe('config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  const loadConfig = (): ConfigModule => {
    let loaded: ConfigModule | undefined;
    jest.isolateModules(() => {
      loaded = jest.requireActual<ConfigModule>('@/config');
    });
    if (!loaded) {
      throw new Error('config module did not load');
    }
    return loaded;
  };

  it('applies defaults for monitor settings', () => {
    delete process.env['POLL_INTERVAL_MIN'];
    delete process.env['CHANGE_THRESHOLD_PCT'];
    delete process.env['COMPARE_ABS'];
    delete process.env['MAX_WALLETS_PER_USER'];

    const { config } = loadConfig();

    expect(config.monitor.pollIntervalMin).toBe(20);
    expect(config.monitor.changeThresholdPct).toBe(5);
    expect(config.monitor.compareAbsolute).toBe(true);
    expect(config.monitor.maxWalletsPerUser).toBe(5);
    expect(config.hyperliquid.maxAttempts).toBe(3);
  });

  it('reads overrides and normalizes the default wallet', () => {
    process.env['COMPARE_ABS'] = 'FALSE';
    process.env['MIN_NOTIONAL_USD'] = '2500.5';
    process.env['DEFAULT_WALLET_ADDRESS'] = '  0xABCDEF0000000000000000000000000000000001 ';

    const { config } = loadConfig();

    expect(config.monitor.compareAbsolute).toBe(false);
    expect(config.monitor.minNotionalUsd).toBe(2500.5);
    expect(config.monitor.defaultWalletAddress).toBe('0xabcdef0000000000000000000000000000000001');
  });

  it('requires the bot token and database url', () => {
    delete process.env['TELEGRAM_BOT_TOKEN'];
    delete process.env['DATABASE_URL'];

    const { validateConfig } = loadConfig();

    expect(() => validateConfig()).toThrow(
      'Missing required environment variables: TELEGRAM_BOT_TOKEN, DATABASE_URL'
    );
  });

  it('rejects malformed numeric settings', () => {
    process.env['POLL_INTERVAL_MIN'] = 'soon';
    process.env['WALLET_DELAY_MS'] = '-5';
    process.env['HYPERLIQUID_RETRY_BASE_DELAY_MS'] = 'fast';

    const { validateConfig } = loadConfig();

    expect(() => validateConfig()).toThrow(
      'Invalid numeric environment variables: HYPERLIQUID_RETRY_BASE_DELAY_MS, POLL_INTERVAL_MIN, WALLET_DELAY_MS'
    );
  });

  it('rejects an unknown display time zone', () => {
    process.env['DISPLAY_TIMEZONE'] = 'Asia/Seol';

    const { validateConfig } = loadConfig();

    expect(() => validateConfig()).toThrow('Invalid DISPLAY_TIMEZONE: Asia/Seol');
  });

  it('accepts an IANA display time zone', () => {
    process.env['DISPLAY_TIMEZONE'] = 'Asia/Seoul';

    const { config, validateConfig } = loadConfig();

    expect(() => validateConfig()).not.toThrow();
    expect(config.monitor.displayTimeZone).toBe('Asia/Seoul');
  });

  it('needs room for at least one wallet per subscriber', () => {
    process.env['MAX_WALLETS_PER_USER'] = '0';

    const { validateConfig } = loadConfig();

    expect(() => validateConfig()).toThrow('MAX_WALLETS_PER_USER must be at least 1');
  });
});
