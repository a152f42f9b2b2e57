import { PositionMap, Subscriber, WalletLink, WalletSnapshot } from '@/types/monitoring';
import {
  MonitorStorage,
  SnapshotStore,
  StorageSession,
  SubscriberRepository,
  WalletLinkRepository,
} from '@/services/storage/types';

interface StoredLink extends WalletLink {
  id: number;
}

interface StoredSnapshot {
  followersCount: number;
  timestamp: Date | null;
  positions: PositionMap;
}

interface State {
  subscribers: Map<number, Subscriber>;
  links: StoredLink[];
  snapshots: Map<string, StoredSnapshot>;
  nextLinkId: number;
}

type StateRef = () => State;

class MemorySubscribers implements SubscriberRepository {
  constructor(private readonly state: StateRef) {}

  async find(id: number): Promise<Subscriber | null> {
    const found = this.state().subscribers.get(id);
    return found ? { ...found } : null;
  }

  lock(id: number): Promise<Subscriber | null> {
    return this.find(id);
  }

  async insert(subscriber: Subscriber): Promise<void> {
    if (this.state().subscribers.has(subscriber.id)) {
      throw new Error(`duplicate subscriber ${subscriber.id}`);
    }
    this.state().subscribers.set(subscriber.id, { ...subscriber });
  }

  async setActive(id: number, active: boolean, displayName?: string): Promise<void> {
    const found = this.state().subscribers.get(id);
    if (found) {
      found.active = active;
      found.displayName = displayName ?? found.displayName;
    }
  }
}

class MemoryWalletLinks implements WalletLinkRepository {
  constructor(private readonly state: StateRef) {}

  async listActive(subscriberId: number): Promise<WalletLink[]> {
    return this.state()
      .links.filter(link => link.subscriberId === subscriberId && link.active)
      .sort((a, b) => a.addedAt.getTime() - b.addedAt.getTime() || a.id - b.id)
      .map(({ id: _id, ...link }) => link);
  }

  async insert(link: WalletLink): Promise<void> {
    const state = this.state();
    if (link.active && state.links.some(l => l.active && l.subscriberId === link.subscriberId && l.address === link.address)) {
      throw new Error('duplicate active link');
    }
    state.links.push({ ...link, id: state.nextLinkId++ });
  }

  async deactivate(subscriberId: number, address: string): Promise<boolean> {
    const link = this.state().links.find(l => l.active && l.subscriberId === subscriberId && l.address === address);
    if (!link) {
      return false;
    }
    link.active = false;
    return true;
  }

  async listActiveFollowers(address: string): Promise<number[]> {
    const state = this.state();
    const ids = state.links
      .filter(link => link.active && link.address === address && state.subscribers.get(link.subscriberId)?.active)
      .map(link => link.subscriberId);
    return [...new Set(ids)].sort((a, b) => a - b);
  }
}

class MemorySnapshots implements SnapshotStore {
  constructor(private readonly state: StateRef) {}

  async load(address: string): Promise<WalletSnapshot | null> {
    const stored = this.state().snapshots.get(address);
    if (!stored) {
      return null;
    }
    return {
      address,
      followersCount: stored.followersCount,
      timestamp: stored.timestamp,
      positions: new Map(stored.positions),
    };
  }

  async save(address: string, positions: PositionMap, timestamp: Date): Promise<void> {
    const snapshots = this.state().snapshots;
    const followersCount = snapshots.get(address)?.followersCount ?? 0;
    snapshots.set(address, { followersCount, timestamp, positions: new Map(positions) });
  }

  async incrementFollowers(address: string): Promise<void> {
    const snapshots = this.state().snapshots;
    const stored = snapshots.get(address);
    if (stored) {
      stored.followersCount += 1;
    } else {
      snapshots.set(address, { followersCount: 1, timestamp: null, positions: new Map() });
    }
  }

  async decrementFollowers(address: string): Promise<void> {
    const stored = this.state().snapshots.get(address);
    if (stored) {
      stored.followersCount = Math.max(0, stored.followersCount - 1);
    }
  }

  async listMonitoredAddresses(): Promise<string[]> {
    return [...this.state().snapshots.entries()]
      .filter(([, snapshot]) => snapshot.followersCount > 0)
      .map(([address]) => address)
      .sort();
  }
}

function createSession(state: StateRef): StorageSession {
  return {
    subscribers: new MemorySubscribers(state),
    wallets: new MemoryWalletLinks(state),
    snapshots: new MemorySnapshots(state),
  };
}

/**
 * MonitorStorage kept in memory. A transaction works on a copy that
 * replaces the live state only when the work resolves.
 */
export class InMemoryStorage implements MonitorStorage {
  private state: State = {
    subscribers: new Map(),
    links: [],
    snapshots: new Map(),
    nextLinkId: 1,
  };

  readonly subscribers: SubscriberRepository;
  readonly wallets: WalletLinkRepository;
  readonly snapshots: SnapshotStore;

  constructor() {
    const session = createSession(() => this.state);
    this.subscribers = session.subscribers;
    this.wallets = session.wallets;
    this.snapshots = session.snapshots;
  }

  async transaction<T>(work: (session: StorageSession) => Promise<T>): Promise<T> {
    const draft = structuredClone(this.state);
    const result = await work(createSession(() => draft));
    this.state = draft;
    return result;
  }

  async close(): Promise<void> {}

  followersOf(address: string): number {
    return this.state.snapshots.get(address)?.followersCount ?? 0;
  }

  allLinks(): WalletLink[] {
    return this.state.links.map(({ id: _id, ...link }) => ({ ...link }));
  }
}

export function positions(entries: Record<string, [number, number]>): PositionMap {
  return new Map(Object.entries(entries).map(([token, [size, usdValue]]) => [token, { size, usdValue }]));
}

export function walletAddress(n: number): string {
  return `0x${n.toString(16).padStart(40, '0')}`;
}
