import { detectChanges } from '@/services/monitor/change-detector';
import { positions } from '../../../helpers/in-memory-storage';

describe('detectChanges', () => {
  const options = { thresholdPct: 5, compareAbsolute: true, minNotionalUsd: 10000 };

  it('returns nothing for identical snapshots', () => {
    const snapshot = positions({ BTC: [1, 60000], ETH: [-10, 30000] });
    expect(detectChanges(snapshot, new Map(snapshot), options)).toEqual([]);
  });

  it('returns nothing for two empty snapshots', () => {
    expect(detectChanges(new Map(), new Map(), options)).toEqual([]);
  });

  it('reports a 6% move when both sides are above the floor', () => {
    const changes = detectChanges(positions({ BTC: [1.0, 12000] }), positions({ BTC: [1.06, 12720] }), options);

    expect(changes).toHaveLength(1);
    expect(changes[0]).toMatchObject({
      token: 'BTC',
      previousSize: 1.0,
      currentSize: 1.06,
      previousUsd: 12000,
      currentUsd: 12720,
    });
    expect(changes[0]?.pctChange).toBeCloseTo(6.0, 6);
  });

  it('ignores moves when both sides are below the floor', () => {
    const changes = detectChanges(positions({ ETH: [0.5, 800] }), positions({ ETH: [0.6, 960] }), options);
    expect(changes).toEqual([]);
  });

  it('reports a position growing across the floor, measured on size', () => {
    const changes = detectChanges(positions({ ETH: [0.1, 5000] }), positions({ ETH: [5.0, 95000] }), options);

    expect(changes).toHaveLength(1);
    expect(changes[0]?.pctChange).toBeCloseTo(4900, 6);
  });

  it('reports a large position shrinking below the floor', () => {
    const changes = detectChanges(positions({ SOL: [100, 20000] }), positions({ SOL: [10, 2000] }), options);

    expect(changes).toHaveLength(1);
    expect(changes[0]?.pctChange).toBeCloseTo(-90, 6);
  });

  it('treats a newly opened position as a 100% move', () => {
    const changes = detectChanges(new Map(), positions({ HYPE: [500, 15000] }), options);

    expect(changes).toEqual([
      { token: 'HYPE', previousSize: 0, currentSize: 500, previousUsd: 0, currentUsd: 15000, pctChange: 100 },
    ]);
  });

  it('reports a closed position as a -100% move', () => {
    const changes = detectChanges(positions({ BTC: [2, 120000] }), new Map(), options);

    expect(changes).toEqual([
      { token: 'BTC', previousSize: 2, currentSize: 0, previousUsd: 120000, currentUsd: 0, pctChange: -100 },
    ]);
  });

  it('does not report a move exactly at the threshold', () => {
    const changes = detectChanges(positions({ BTC: [100, 50000] }), positions({ BTC: [105, 52500] }), options);
    expect(changes).toEqual([]);
  });

  it('ignores unchanged sizes even when the USD value moved', () => {
    const changes = detectChanges(positions({ BTC: [1, 50000] }), positions({ BTC: [1, 70000] }), options);
    expect(changes).toEqual([]);
  });

  it('ignores a flip to an equal short when comparing absolute sizes', () => {
    const changes = detectChanges(positions({ ETH: [10, 30000] }), positions({ ETH: [-10, 30000] }), options);
    expect(changes).toEqual([]);
  });

  it('reports the same flip when comparing signed sizes', () => {
    const changes = detectChanges(
      positions({ ETH: [10, 30000] }),
      positions({ ETH: [-10, 30000] }),
      { ...options, compareAbsolute: false }
    );

    expect(changes).toHaveLength(1);
    expect(changes[0]?.pctChange).toBe(-200);
  });

  it('uses the absolute USD value against the floor', () => {
    const changes = detectChanges(positions({ ETH: [-4, -12000] }), positions({ ETH: [-5, -15000] }), options);

    expect(changes).toHaveLength(1);
    expect(changes[0]?.pctChange).toBeCloseTo(25, 6);
  });

  it('applies default options when none are given', () => {
    expect(detectChanges(positions({ BTC: [1, 9000] }), positions({ BTC: [2, 9999] }))).toEqual([]);
    expect(detectChanges(positions({ BTC: [1, 9000] }), positions({ BTC: [2, 18000] }))).toHaveLength(1);
  });
});
