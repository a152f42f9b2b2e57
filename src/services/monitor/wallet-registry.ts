import { AddWalletResult, WalletLink, WalletListing } from '@/types/monitoring';
import { MonitorStorage, StorageSession } from '@/services/storage/types';
import { isValidWalletAddress, normalizeAddress } from '@/utils/address';
import { logger } from '@/utils/logger';

/**
 * Refcount transitions that follow a subscription being switched on or off.
 * Implemented by the registry so it stays the only writer of followers_count.
 */
export interface FollowerSync {
  restoreFollowers(session: StorageSession, subscriberId: number): Promise<string[]>;
  releaseFollowers(session: StorageSession, subscriberId: number): Promise<string[]>;
}

export interface WalletRegistryOptions {
  maxWalletsPerSubscriber: number;
}

export class WalletRegistry implements FollowerSync {
  private readonly maxWallets: number;

  constructor(
    private readonly storage: MonitorStorage,
    options: WalletRegistryOptions
  ) {
    if (options.maxWalletsPerSubscriber < 1) {
      throw new RangeError('maxWalletsPerSubscriber must be at least 1');
    }
    this.maxWallets = options.maxWalletsPerSubscriber;
  }

  get capacity(): number {
    return this.maxWallets;
  }

  /**
   * Links a wallet to an active subscriber. At capacity the oldest links
   * are evicted first so the new one always survives.
   */
  async addWallet(subscriberId: number, rawAddress: string, addedAt = new Date()): Promise<AddWalletResult> {
    if (!isValidWalletAddress(rawAddress)) {
      return { added: false, reason: 'invalid_address' };
    }
    const address = normalizeAddress(rawAddress);

    const result = await this.storage.transaction<AddWalletResult>(async session => {
      const subscriber = await session.subscribers.lock(subscriberId);
      if (!subscriber || !subscriber.active) {
        return { added: false, reason: 'not_subscribed' };
      }

      const links = await session.wallets.listActive(subscriberId);
      if (links.some(link => link.address === address)) {
        return { added: false, reason: 'duplicate' };
      }

      const evicted: string[] = [];
      const surplus = links.length - this.maxWallets + 1;
      for (const link of links.slice(0, Math.max(0, surplus))) {
        await session.wallets.deactivate(subscriberId, link.address);
        await session.snapshots.decrementFollowers(link.address);
        evicted.push(link.address);
      }

      await session.wallets.insert({ subscriberId, address, addedAt, active: true });
      await session.snapshots.incrementFollowers(address);

      return { added: true, address, evicted };
    });

    if (result.added) {
      logger.info('Wallet added', { subscriberId, address, evicted: result.evicted });
    }
    return result;
  }

  async removeWallet(subscriberId: number, rawAddress: string): Promise<boolean> {
    const address = normalizeAddress(rawAddress);

    const removed = await this.storage.transaction(async session => {
      const subscriber = await session.subscribers.lock(subscriberId);
      const deactivated = await session.wallets.deactivate(subscriberId, address);

      // Inactive subscribers were already released from the refcount.
      if (deactivated && subscriber?.active) {
        await session.snapshots.decrementFollowers(address);
      }
      return deactivated;
    });

    if (removed) {
      logger.info('Wallet removed', { subscriberId, address });
    }
    return removed;
  }

  /**
   * Removes the wallet at a 1-based position of `listWallets`.
   * Returns the removed address, or null for an out-of-range index.
   */
  async removeWalletAt(subscriberId: number, position: number): Promise<string | null> {
    const wallets = await this.listWallets(subscriberId);
    if (!Number.isInteger(position) || position < 1 || position > wallets.length) {
      return null;
    }

    const target = wallets[position - 1];
    if (!target) {
      return null;
    }

    const removed = await this.removeWallet(subscriberId, target.address);
    return removed ? target.address : null;
  }

  /** Active wallets, oldest first. */
  async listWallets(subscriberId: number): Promise<WalletListing[]> {
    const links = await this.storage.wallets.listActive(subscriberId);
    return links.map(link => ({ address: link.address, addedAt: link.addedAt }));
  }

  listActiveFollowers(address: string): Promise<number[]> {
    return this.storage.wallets.listActiveFollowers(normalizeAddress(address));
  }

  listMonitoredAddresses(): Promise<string[]> {
    return this.storage.snapshots.listMonitoredAddresses();
  }

  async restoreFollowers(session: StorageSession, subscriberId: number): Promise<string[]> {
    const links = await session.wallets.listActive(subscriberId);
    for (const link of links) {
      await session.snapshots.incrementFollowers(link.address);
    }
    return links.map(link => link.address);
  }

  async releaseFollowers(session: StorageSession, subscriberId: number): Promise<string[]> {
    const links = await session.wallets.listActive(subscriberId);
    for (const link of links) {
      await session.snapshots.decrementFollowers(link.address);
    }
    return links.map(link => link.address);
  }

  /**
   * Inserts a link carried over from another store, keeping the refcount
   * in step when both the link and its subscriber are active.
   */
  async adoptLink(session: StorageSession, link: WalletLink, subscriberActive: boolean): Promise<void> {
    const address = normalizeAddress(link.address);
    await session.wallets.insert({ ...link, address });
    if (link.active && subscriberActive) {
      await session.snapshots.incrementFollowers(address);
    }
  }
}
