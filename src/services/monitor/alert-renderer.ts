import { PositionChange } from '@/types/monitoring';
import { formatShortAddress } from '@/utils/address';

export interface AlertContent {
  address: string;
  changes: PositionChange[];
  /** Timestamp of the snapshot the changes are measured against. */
  previousTimestamp: Date | null;
  currentTimestamp: Date;
  /** IANA zone used for the printed timestamps. */
  timeZone: string;
}

export const ALERT_HEADER = '[PerpWatch] Position update';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export function formatElapsed(elapsedMs: number): string {
  const ms = Math.max(0, elapsedMs);

  if (ms < MINUTE_MS) {
    return `${Math.floor(ms / 1000)}s`;
  }
  if (ms < HOUR_MS) {
    return `${Math.floor(ms / MINUTE_MS)}m`;
  }
  if (ms < DAY_MS) {
    return `${Math.floor(ms / HOUR_MS)}h ${Math.floor((ms % HOUR_MS) / MINUTE_MS)}m`;
  }
  return `${Math.floor(ms / DAY_MS)}d ${Math.floor((ms % DAY_MS) / HOUR_MS)}h`;
}

/**
 * "YYYY-MM-DD HH:mm <zone>" in the given time zone.
 */
export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')} ${timeZone}`;
}

export function formatSize(size: number): string {
  return size.toLocaleString('en-US', { maximumFractionDigits: 8 });
}

export function formatUsd(value: number): string {
  return `$${Math.abs(value).toLocaleString('en-US', { maximumFractionDigits: 0 })}`;
}

export function formatPct(pct: number): string {
  const sign = pct >= 0 ? '+' : '';
  return `${sign}${pct.toFixed(1)}%`;
}

/**
 * Plain-text alert for one wallet. Deterministic for a given input.
 */
export function renderAlert(content: AlertContent): string {
  const { address, changes, previousTimestamp, currentTimestamp, timeZone } = content;

  const elapsed = previousTimestamp
    ? formatElapsed(currentTimestamp.getTime() - previousTimestamp.getTime())
    : 'first snapshot';

  const lines = [
    ALERT_HEADER,
    `Wallet: ${formatShortAddress(address)}`,
    `Since last snapshot: ${elapsed}`,
    '',
  ];

  for (const change of changes) {
    lines.push(
      `${change.token}: ${formatSize(change.previousSize)} → ${formatSize(change.currentSize)} (${formatPct(change.pctChange)})`
    );
    lines.push(`   ${formatUsd(change.previousUsd)} → ${formatUsd(change.currentUsd)}`);
  }

  lines.push('');
  lines.push(`Previous: ${previousTimestamp ? formatTimestamp(previousTimestamp, timeZone) : 'n/a'}`);
  lines.push(`Current: ${formatTimestamp(currentTimestamp, timeZone)}`);

  return lines.join('\n');
}
