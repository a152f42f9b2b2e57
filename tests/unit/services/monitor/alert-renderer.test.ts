import {
  formatElapsed,
  formatPct,
  formatSize,
  formatTimestamp,
  formatUsd,
  renderAlert,
} from '@/services/monitor/alert-renderer';

describe('alert renderer', () => {
  const address = '0xb317d2bc2d3d2df5fa441b5bae0ab9d8d07283ae';

  describe('formatElapsed', () => {
    it.each([
      [0, '0s'],
      [45 * 1000, '45s'],
      [5 * 60 * 1000, '5m'],
      [80 * 60 * 1000, '1h 20m'],
      [26 * 60 * 60 * 1000 + 59 * 60 * 1000, '1d 2h'],
      [-1000, '0s'],
    ])('formats %d ms as %s', (ms, expected) => {
      expect(formatElapsed(ms)).toBe(expected);
    });
  });

  it('formats timestamps in the requested zone', () => {
    const date = new Date('2026-10-19T15:05:00Z');
    expect(formatTimestamp(date, 'UTC')).toBe('2026-10-19 15:05 UTC');
    expect(formatTimestamp(date, 'Asia/Seoul')).toBe('2026-10-20 00:05 Asia/Seoul');
  });

  it('formats sizes, USD values and percentages', () => {
    expect(formatSize(1234.5)).toBe('1,234.5');
    expect(formatSize(-0.00012345)).toBe('-0.00012345');
    expect(formatUsd(-12720.4)).toBe('$12,720');
    expect(formatPct(6.0000001)).toBe('+6.0%');
    expect(formatPct(-12.34)).toBe('-12.3%');
  });

  it('renders every changed token with sizes and notional values', () => {
    const message = renderAlert({
      address,
      changes: [
        { token: 'BTC', previousSize: 1, currentSize: 1.06, previousUsd: 12000, currentUsd: 12720, pctChange: 6 },
        { token: 'ETH', previousSize: -20, currentSize: -10, previousUsd: -60000, currentUsd: -30000, pctChange: -50 },
      ],
      previousTimestamp: new Date('2026-10-19T10:00:00Z'),
      currentTimestamp: new Date('2026-10-19T11:20:00Z'),
      timeZone: 'UTC',
    });

    expect(message).toBe(
      [
        '[PerpWatch] Position update',
        'Wallet: 0xb317...83ae',
        'Since last snapshot: 1h 20m',
        '',
        'BTC: 1 → 1.06 (+6.0%)',
        '   $12,000 → $12,720',
        'ETH: -20 → -10 (-50.0%)',
        '   $60,000 → $30,000',
        '',
        'Previous: 2026-10-19 10:00 UTC',
        'Current: 2026-10-19 11:20 UTC',
      ].join('\n')
    );
  });

  it('marks the first snapshot when there is no previous timestamp', () => {
    const message = renderAlert({
      address,
      changes: [
        { token: 'HYPE', previousSize: 0, currentSize: 500, previousUsd: 0, currentUsd: 15000, pctChange: 100 },
      ],
      previousTimestamp: null,
      currentTimestamp: new Date('2026-10-19T11:20:00Z'),
      timeZone: 'UTC',
    });

    const lines = message.split('\n');
    expect(lines[2]).toBe('Since last snapshot: first snapshot');
    expect(lines[4]).toBe('HYPE: 0 → 500 (+100.0%)');
    expect(lines[5]).toBe('   $0 → $15,000');
    expect(lines[7]).toBe('Previous: n/a');
  });
});
