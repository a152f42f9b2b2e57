/**
 * PostgreSQL persistence for subscribers, wallet links and wallet snapshots.
 * Every mutation is a keyed single-row statement, or runs inside a
 * transaction, so command handlers and the monitoring cycle never
 * rewrite each other's records.
 */

import { PoolClient, QueryResultRow } from 'pg';
import { DatabasePool } from '@/services/database/connection-pool';
import { PositionMap, Subscriber, WalletLink, WalletSnapshot } from '@/types/monitoring';
import {
  MonitorStorage,
  SnapshotStore,
  StorageSession,
  SubscriberRepository,
  WalletLinkRepository,
} from './types';

export type SqlExecutor = <T extends QueryResultRow>(text: string, params?: unknown[]) => Promise<T[]>;

interface SubscriberRow {
  id: string;
  display_name: string;
  subscribed_at: Date;
  is_active: boolean;
}

interface WalletLinkRow {
  subscriber_id: string;
  address: string;
  added_at: Date;
  is_active: boolean;
}

interface SnapshotRow {
  address: string;
  followers_count: number;
  snapshot_at: Date | null;
}

interface PositionRow {
  token: string;
  size: string;
  usd_value: string;
}

const SUBSCRIBER_COLUMNS = 'id, display_name, subscribed_at, is_active';

function toSubscriber(row: SubscriberRow): Subscriber {
  return {
    id: Number(row.id),
    displayName: row.display_name,
    subscribedAt: row.subscribed_at,
    active: row.is_active,
  };
}

export class PgSubscriberRepository implements SubscriberRepository {
  constructor(private readonly execute: SqlExecutor) {}

  async find(id: number): Promise<Subscriber | null> {
    const rows = await this.execute<SubscriberRow>(
      `SELECT ${SUBSCRIBER_COLUMNS} FROM subscribers WHERE id = $1`,
      [id]
    );
    return rows[0] ? toSubscriber(rows[0]) : null;
  }

  async lock(id: number): Promise<Subscriber | null> {
    const rows = await this.execute<SubscriberRow>(
      `SELECT ${SUBSCRIBER_COLUMNS} FROM subscribers WHERE id = $1 FOR UPDATE`,
      [id]
    );
    return rows[0] ? toSubscriber(rows[0]) : null;
  }

  async insert(subscriber: Subscriber): Promise<void> {
    await this.execute(
      `INSERT INTO subscribers (id, display_name, subscribed_at, is_active)
       VALUES ($1, $2, $3, $4)`,
      [subscriber.id, subscriber.displayName, subscriber.subscribedAt, subscriber.active]
    );
  }

  async setActive(id: number, active: boolean, displayName?: string): Promise<void> {
    await this.execute(
      `UPDATE subscribers
       SET is_active = $2, display_name = COALESCE($3, display_name), updated_at = NOW()
       WHERE id = $1`,
      [id, active, displayName ?? null]
    );
  }
}

export class PgWalletLinkRepository implements WalletLinkRepository {
  constructor(private readonly execute: SqlExecutor) {}

  async listActive(subscriberId: number): Promise<WalletLink[]> {
    const rows = await this.execute<WalletLinkRow>(
      `SELECT subscriber_id, address, added_at, is_active
       FROM wallet_links
       WHERE subscriber_id = $1 AND is_active
       ORDER BY added_at ASC, id ASC`,
      [subscriberId]
    );

    return rows.map(row => ({
      subscriberId: Number(row.subscriber_id),
      address: row.address,
      addedAt: row.added_at,
      active: row.is_active,
    }));
  }

  async insert(link: WalletLink): Promise<void> {
    await this.execute(
      `INSERT INTO wallet_links (subscriber_id, address, added_at, is_active)
       VALUES ($1, $2, $3, $4)`,
      [link.subscriberId, link.address, link.addedAt, link.active]
    );
  }

  async deactivate(subscriberId: number, address: string): Promise<boolean> {
    const rows = await this.execute<{ id: string }>(
      `UPDATE wallet_links
       SET is_active = FALSE
       WHERE subscriber_id = $1 AND address = $2 AND is_active
       RETURNING id`,
      [subscriberId, address]
    );
    return rows.length > 0;
  }

  async listActiveFollowers(address: string): Promise<number[]> {
    const rows = await this.execute<{ subscriber_id: string }>(
      `SELECT DISTINCT wl.subscriber_id
       FROM wallet_links wl
       JOIN subscribers s ON s.id = wl.subscriber_id
       WHERE wl.address = $1 AND wl.is_active AND s.is_active
       ORDER BY wl.subscriber_id`,
      [address]
    );
    return rows.map(row => Number(row.subscriber_id));
  }
}

export class PgSnapshotStore implements SnapshotStore {
  constructor(private readonly execute: SqlExecutor) {}

  async load(address: string): Promise<WalletSnapshot | null> {
    const snapshots = await this.execute<SnapshotRow>(
      `SELECT address, followers_count, snapshot_at
       FROM wallet_snapshots
       WHERE address = $1`,
      [address]
    );

    const snapshot = snapshots[0];
    if (!snapshot) {
      return null;
    }

    const positionRows = await this.execute<PositionRow>(
      `SELECT token, size, usd_value
       FROM wallet_positions
       WHERE address = $1
       ORDER BY token`,
      [address]
    );

    const positions: PositionMap = new Map();
    for (const row of positionRows) {
      positions.set(row.token, { size: Number(row.size), usdValue: Number(row.usd_value) });
    }

    return {
      address: snapshot.address,
      followersCount: Number(snapshot.followers_count),
      timestamp: snapshot.snapshot_at,
      positions,
    };
  }

  /**
   * Three statements; callers run this inside a transaction.
   */
  async save(address: string, positions: PositionMap, timestamp: Date): Promise<void> {
    await this.execute(
      `INSERT INTO wallet_snapshots (address, followers_count, snapshot_at)
       VALUES ($1, 0, $2)
       ON CONFLICT (address) DO UPDATE SET snapshot_at = EXCLUDED.snapshot_at`,
      [address, timestamp]
    );

    await this.execute('DELETE FROM wallet_positions WHERE address = $1', [address]);

    if (positions.size === 0) {
      return;
    }

    const tokens: string[] = [];
    const sizes: number[] = [];
    const usdValues: number[] = [];
    for (const [token, entry] of positions) {
      tokens.push(token);
      sizes.push(entry.size);
      usdValues.push(entry.usdValue);
    }

    await this.execute(
      `INSERT INTO wallet_positions (address, token, size, usd_value)
       SELECT $1, t.token, t.size, t.usd_value
       FROM UNNEST($2::text[], $3::numeric[], $4::numeric[]) AS t(token, size, usd_value)`,
      [address, tokens, sizes, usdValues]
    );
  }

  async incrementFollowers(address: string): Promise<void> {
    await this.execute(
      `INSERT INTO wallet_snapshots (address, followers_count)
       VALUES ($1, 1)
       ON CONFLICT (address) DO UPDATE SET followers_count = wallet_snapshots.followers_count + 1`,
      [address]
    );
  }

  async decrementFollowers(address: string): Promise<void> {
    await this.execute(
      `UPDATE wallet_snapshots
       SET followers_count = GREATEST(followers_count - 1, 0)
       WHERE address = $1`,
      [address]
    );
  }

  async listMonitoredAddresses(): Promise<string[]> {
    const rows = await this.execute<{ address: string }>(
      `SELECT address
       FROM wallet_snapshots
       WHERE followers_count > 0
       ORDER BY address`
    );
    return rows.map(row => row.address);
  }
}

function createSession(execute: SqlExecutor): StorageSession {
  return {
    subscribers: new PgSubscriberRepository(execute),
    wallets: new PgWalletLinkRepository(execute),
    snapshots: new PgSnapshotStore(execute),
  };
}

export function clientExecutor(client: Pick<PoolClient, 'query'>): SqlExecutor {
  return async <T extends QueryResultRow>(text: string, params: unknown[] = []) => {
    const result = await client.query<T>(text, params);
    return result.rows;
  };
}

export class PostgresMonitorStorage implements MonitorStorage {
  readonly subscribers: SubscriberRepository;
  readonly wallets: WalletLinkRepository;
  readonly snapshots: SnapshotStore;

  constructor(private readonly pool: DatabasePool) {
    const session = createSession(
      <T extends QueryResultRow>(text: string, params?: unknown[]) => pool.query<T>(text, params)
    );
    this.subscribers = session.subscribers;
    this.wallets = session.wallets;
    this.snapshots = session.snapshots;
  }

  transaction<T>(work: (session: StorageSession) => Promise<T>): Promise<T> {
    return this.pool.transaction(client => work(createSession(clientExecutor(client))));
  }

  close(): Promise<void> {
    return this.pool.close();
  }
}
