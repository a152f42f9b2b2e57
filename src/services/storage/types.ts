import { PositionMap, Subscriber, WalletLink, WalletSnapshot } from '@/types/monitoring';

export interface SubscriberRepository {
  find(id: number): Promise<Subscriber | null>;
  /**
   * Same as find, but holds a row lock until the surrounding transaction ends
   * so concurrent command handlers for one subscriber are serialized.
   */
  lock(id: number): Promise<Subscriber | null>;
  insert(subscriber: Subscriber): Promise<void>;
  setActive(id: number, active: boolean, displayName?: string): Promise<void>;
}

export interface WalletLinkRepository {
  /** Active links of a subscriber, oldest first. */
  listActive(subscriberId: number): Promise<WalletLink[]>;
  insert(link: WalletLink): Promise<void>;
  /** Returns false when no active link matched. */
  deactivate(subscriberId: number, address: string): Promise<boolean>;
  /** Subscriber ids with an active link to the address and an active subscription. */
  listActiveFollowers(address: string): Promise<number[]>;
}

/**
 * Last known positions per unique wallet address, with the follower refcount
 * that decides whether the address is polled.
 */
export interface SnapshotStore {
  load(address: string): Promise<WalletSnapshot | null>;
  /** Replaces positions and timestamp; followers_count is preserved. */
  save(address: string, positions: PositionMap, timestamp: Date): Promise<void>;
  /** Creates an empty record with a count of 1 for an unseen address. */
  incrementFollowers(address: string): Promise<void>;
  /** Floors at zero; no-op for an unseen address. */
  decrementFollowers(address: string): Promise<void>;
  /** Addresses whose followers_count is above zero. */
  listMonitoredAddresses(): Promise<string[]>;
}

export interface StorageSession {
  subscribers: SubscriberRepository;
  wallets: WalletLinkRepository;
  snapshots: SnapshotStore;
}

export interface MonitorStorage extends StorageSession {
  /**
   * Runs the work against a session whose writes commit together or not at all.
   */
  transaction<T>(work: (session: StorageSession) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
