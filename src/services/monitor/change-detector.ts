import { PositionChange, PositionEntry, PositionMap } from '@/types/monitoring';

export interface ChangeDetectionOptions {
  /** Minimum absolute percentage move, exclusive. */
  thresholdPct: number;
  /** Compare |size| so a long flipping to an equal short is not a change. */
  compareAbsolute: boolean;
  /** Positions below this USD value on both sides are ignored. */
  minNotionalUsd: number;
}

export const DEFAULT_DETECTION_OPTIONS: ChangeDetectionOptions = {
  thresholdPct: 5,
  compareAbsolute: true,
  minNotionalUsd: 10000,
};

const EMPTY_ENTRY: PositionEntry = { size: 0, usdValue: 0 };

/**
 * Per-token size changes between two snapshots.
 *
 * A token is reported when its size moved by more than `thresholdPct`
 * and at least one side is worth `minNotionalUsd` or more. A position
 * opened from nothing counts as a 100% move. Percentages come from
 * sizes, never from USD values.
 */
export function detectChanges(
  previous: PositionMap,
  current: PositionMap,
  options: Partial<ChangeDetectionOptions> = {}
): PositionChange[] {
  const { thresholdPct, compareAbsolute, minNotionalUsd } = {
    ...DEFAULT_DETECTION_OPTIONS,
    ...options,
  };

  const tokens = new Set<string>([...previous.keys(), ...current.keys()]);
  const changes: PositionChange[] = [];

  for (const token of tokens) {
    const prev = previous.get(token) ?? EMPTY_ENTRY;
    const curr = current.get(token) ?? EMPTY_ENTRY;

    if (prev.size === curr.size) {
      continue;
    }

    if (Math.abs(prev.usdValue) < minNotionalUsd && Math.abs(curr.usdValue) < minNotionalUsd) {
      continue;
    }

    const prevValue = compareAbsolute ? Math.abs(prev.size) : prev.size;
    const currValue = compareAbsolute ? Math.abs(curr.size) : curr.size;

    let pctChange: number;
    if (prevValue === 0) {
      if (currValue === 0) {
        continue;
      }
      pctChange = 100;
    } else {
      pctChange = ((currValue - prevValue) / prevValue) * 100;
    }

    if (Math.abs(pctChange) > thresholdPct) {
      changes.push({
        token,
        previousSize: prev.size,
        currentSize: curr.size,
        previousUsd: prev.usdValue,
        currentUsd: curr.usdValue,
        pctChange,
      });
    }
  }

  return changes;
}
