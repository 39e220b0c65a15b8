import { describe, it, expect, vi } from 'vitest';

const publish = vi.hoisted(() => vi.fn(async (_channel: string, _message: string) => 1));
vi.mock('../../src/redis/index.js', () => ({
  getPublisher: () => ({ publish }),
}));

import { validateBar } from '@pricebase/core';
import { publishFinalizedBar, toBarMessage } from '../../src/redis/pub.js';

const bar = validateBar(
  {
    marketId: 'bitstamp:BTC/USD',
    intervalMinutes: 5,
    periodStart: 1_704_067_200,
    open: '42000.1',
    high: 42100,
    low: '41950.123456789',
    close: 42050,
    volume: '0.5',
  },
  1_704_067_200,
);

describe('finalized bar fan-out', () => {
  it('renders prices as 8-place decimal strings', () => {
    expect(toBarMessage(bar)).toEqual({
      kind: 'bar',
      marketId: 'bitstamp:BTC/USD',
      intervalMinutes: 5,
      ts: 1_704_067_200,
      open: '42000.10000000',
      high: '42100.00000000',
      low: '41950.12345679',
      close: '42050.00000000',
      volume: '0.50000000',
    });
  });

  it('publishes the message as JSON on the bars channel', async () => {
    await publishFinalizedBar(bar);

    expect(publish).toHaveBeenCalledTimes(1);
    const [channel, payload] = publish.mock.calls[0];
    expect(channel).toBe('ch:bars');
    expect(JSON.parse(payload)).toMatchObject({ marketId: 'bitstamp:BTC/USD', close: '42050.00000000' });
  });
});
