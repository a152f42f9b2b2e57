import { PositionChange } from '@/types/monitoring';
import { MonitorStorage } from '@/services/storage/types';
import { PositionFetcher } from '@/services/hyperliquid/position-fetcher';
import { AlertDispatcher } from '@/services/notifications/alert-dispatcher';
import { getErrorMessage, handleError } from '@/utils/error-handler';
import { logger } from '@/utils/logger';
import { ChangeDetectionOptions, detectChanges } from './change-detector';
import { renderAlert } from './alert-renderer';
import { WalletRegistry } from './wallet-registry';

export interface MonitoringCycleOptions {
  detection: ChangeDetectionOptions;
  /** Pause between two wallets, in milliseconds. */
  walletDelayMs: number;
  timeZone: string;
}

export interface WalletOutcome {
  address: string;
  changes: PositionChange[];
  notified: number[];
  failedRecipients: number[];
  error?: string;
}

export interface CycleReport {
  startedAt: Date;
  finishedAt: Date;
  wallets: WalletOutcome[];
}

export interface MonitoringCycleDeps {
  registry: WalletRegistry;
  storage: MonitorStorage;
  fetcher: PositionFetcher;
  dispatcher: AlertDispatcher;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * One pass over every wallet with at least one follower: fetch, diff
 * against the stored snapshot, and on change persist and alert. Wallets
 * are handled one at a time; a failing wallet is logged and skipped.
 */
export class MonitoringCycle {
  private readonly registry: WalletRegistry;
  private readonly storage: MonitorStorage;
  private readonly fetcher: PositionFetcher;
  private readonly dispatcher: AlertDispatcher;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    deps: MonitoringCycleDeps,
    private readonly options: MonitoringCycleOptions
  ) {
    this.registry = deps.registry;
    this.storage = deps.storage;
    this.fetcher = deps.fetcher;
    this.dispatcher = deps.dispatcher;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  async runOnce(): Promise<CycleReport> {
    const startedAt = this.now();
    const wallets: WalletOutcome[] = [];

    let addresses: string[];
    try {
      addresses = await this.registry.listMonitoredAddresses();
    } catch (error) {
      logger.error('Could not list monitored wallets', { error: getErrorMessage(error) });
      return { startedAt, finishedAt: this.now(), wallets };
    }

    logger.info(`Monitoring cycle started for ${addresses.length} wallets`);

    for (const [index, address] of addresses.entries()) {
      if (index > 0 && this.options.walletDelayMs > 0) {
        await this.sleep(this.options.walletDelayMs);
      }

      try {
        wallets.push(await this.processWallet(address));
      } catch (error) {
        handleError(error, { address, stage: 'monitor_wallet' });
        wallets.push({ address, changes: [], notified: [], failedRecipients: [], error: getErrorMessage(error) });
      }
    }

    const finishedAt = this.now();
    logger.info('Monitoring cycle finished', {
      wallets: wallets.length,
      changed: wallets.filter(w => w.changes.length > 0).length,
      errors: wallets.filter(w => w.error !== undefined).length,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    });

    return { startedAt, finishedAt, wallets };
  }

  private async processWallet(address: string): Promise<WalletOutcome> {
    const current = await this.fetcher.fetchPositions(address);
    const previous = await this.storage.snapshots.load(address);

    const changes = detectChanges(previous?.positions ?? new Map(), current, this.options.detection)
      .sort((a, b) => a.token.localeCompare(b.token));

    if (changes.length === 0) {
      return { address, changes, notified: [], failedRecipients: [] };
    }

    const timestamp = this.now();
    await this.storage.transaction(session => session.snapshots.save(address, current, timestamp));

    const followers = await this.registry.listActiveFollowers(address);
    const message = renderAlert({
      address,
      changes,
      previousTimestamp: previous?.timestamp ?? null,
      currentTimestamp: timestamp,
      timeZone: this.options.timeZone,
    });

    const { delivered, failed } = await this.dispatcher.dispatch(followers, message);
    logger.info(`Alert sent for ${changes.length} changes`, {
      address,
      delivered: delivered.length,
      failed: failed.length,
    });

    return { address, changes, notified: delivered, failedRecipients: failed };
  }
}
