/**
 * Import of the flat CSV files written by earlier releases:
 * subscribers.csv, wallets.csv and snapshots.csv.
 *
 * snapshots.csv exists in three layouts:
 *   timestamp,user_id,address,token,amount            (per-subscriber history)
 *   address,followers_count,timestamp,token,amount     (shared per wallet)
 *   address,followers_count,timestamp,token,amount,usd_value
 * Only the latest timestamp of each wallet is kept. A missing usd_value
 * reads as 0. Stored follower counts are ignored and rebuilt from the links.
 */

import { PositionMap, Subscriber, WalletLink } from '@/types/monitoring';
import { MonitorStorage } from './types';
import { WalletRegistry } from '@/services/monitor/wallet-registry';
import { isValidWalletAddress, normalizeAddress } from '@/utils/address';
import { ValidationError } from '@/utils/error-handler';
import { logger } from '@/utils/logger';

export type CsvRow = Record<string, string>;

export interface LegacySnapshot {
  address: string;
  timestamp: Date;
  positions: PositionMap;
}

export interface LegacyData {
  subscribers: Subscriber[];
  links: WalletLink[];
  snapshots: LegacySnapshot[];
}

export interface ParseResult<T> {
  records: T[];
  skipped: number;
}

export interface ImportSummary {
  subscribers: number;
  links: number;
  snapshots: number;
  skipped: number;
}

/**
 * Splits CSV text into rows keyed by the header line. Handles quoted
 * fields with embedded commas, quotes and newlines.
 */
export function parseCsv(text: string): CsvRow[] {
  const table: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') {
        i++;
      }
      row.push(field);
      table.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    table.push(row);
  }

  const [header, ...body] = table.filter(cells => cells.some(cell => cell.trim() !== ''));
  if (!header) {
    return [];
  }

  const columns = header.map(column => column.trim());
  return body.map(cells => {
    const record: CsvRow = {};
    columns.forEach((column, index) => {
      record[column] = (cells[index] ?? '').trim();
    });
    return record;
  });
}

function parseFlag(value: string | undefined): boolean {
  return (value ?? '').toLowerCase() === 'true';
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseId(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const id = Number(value);
  return Number.isSafeInteger(id) ? id : null;
}

function parseNumber(value: string | undefined): number | null {
  if (value === undefined || value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Later rows for the same user win, matching append-only history. */
export function parseSubscribers(rows: CsvRow[]): ParseResult<Subscriber> {
  const byId = new Map<number, Subscriber>();
  let skipped = 0;

  for (const row of rows) {
    const id = parseId(row['user_id']);
    if (id === null) {
      skipped++;
      continue;
    }

    byId.set(id, {
      id,
      displayName: row['username'] ?? '',
      subscribedAt: parseDate(row['subscribed_at']) ?? new Date(0),
      active: parseFlag(row['active']),
    });
  }

  return { records: [...byId.values()], skipped };
}

export function parseWalletLinks(rows: CsvRow[]): ParseResult<WalletLink> {
  const records: WalletLink[] = [];
  let skipped = 0;

  for (const row of rows) {
    const subscriberId = parseId(row['user_id']);
    const address = row['address'] ?? '';
    const addedAt = parseDate(row['added_at']);

    if (subscriberId === null || !isValidWalletAddress(address) || !addedAt) {
      skipped++;
      continue;
    }

    records.push({
      subscriberId,
      address: normalizeAddress(address),
      addedAt,
      active: parseFlag(row['active']),
    });
  }

  return { records, skipped };
}

export function parseSnapshots(rows: CsvRow[]): ParseResult<LegacySnapshot> {
  const latest = new Map<string, { raw: string; snapshot: LegacySnapshot }>();
  let skipped = 0;

  for (const row of rows) {
    const address = row['address'] ?? '';
    const rawTimestamp = row['timestamp'] ?? '';
    const timestamp = parseDate(rawTimestamp);
    const token = row['token'] ?? '';
    const size = parseNumber(row['amount']);
    const usdValue = parseNumber(row['usd_value']) ?? 0;

    if (!isValidWalletAddress(address) || !timestamp || !token || size === null) {
      skipped++;
      continue;
    }

    const key = normalizeAddress(address);
    const current = latest.get(key);

    if (!current || rawTimestamp > current.raw) {
      latest.set(key, {
        raw: rawTimestamp,
        snapshot: { address: key, timestamp, positions: new Map([[token, { size, usdValue }]]) },
      });
    } else if (rawTimestamp === current.raw) {
      current.snapshot.positions.set(token, { size, usdValue });
    }
  }

  return { records: [...latest.values()].map(entry => entry.snapshot), skipped };
}

/**
 * Writes parsed legacy records in one transaction. Subscribers already
 * present in storage are left alone together with their links.
 */
export async function importLegacyData(
  storage: MonitorStorage,
  registry: WalletRegistry,
  data: LegacyData
): Promise<ImportSummary> {
  return storage.transaction(async session => {
    const summary: ImportSummary = { subscribers: 0, links: 0, snapshots: 0, skipped: 0 };
    const imported = new Map<number, Subscriber>();

    for (const subscriber of data.subscribers) {
      if (await session.subscribers.find(subscriber.id)) {
        logger.warn('Subscriber already exists, skipping', { subscriberId: subscriber.id });
        summary.skipped++;
        continue;
      }
      await session.subscribers.insert(subscriber);
      imported.set(subscriber.id, subscriber);
      summary.subscribers++;
    }

    const activePairs = new Set<string>();
    const links = [...data.links].sort((a, b) => a.addedAt.getTime() - b.addedAt.getTime());

    for (const link of links) {
      const owner = imported.get(link.subscriberId);
      const pair = `${link.subscriberId}:${link.address}`;

      if (!owner || (link.active && activePairs.has(pair))) {
        summary.skipped++;
        continue;
      }
      if (link.active) {
        activePairs.add(pair);
      }

      await registry.adoptLink(session, link, owner.active);
      summary.links++;
    }

    for (const snapshot of data.snapshots) {
      await session.snapshots.save(snapshot.address, snapshot.positions, snapshot.timestamp);
      summary.snapshots++;
    }

    return summary;
  });
}

export function requireColumns(rows: CsvRow[], columns: string[], file: string): void {
  const first = rows[0];
  if (!first) return;

  const missing = columns.filter(column => !(column in first));
  if (missing.length > 0) {
    throw new ValidationError(`${file} is missing columns: ${missing.join(', ')}`);
  }
}
