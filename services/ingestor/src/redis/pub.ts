import { formatFixed, type OhlcvBar } from '@pricebase/core';
import { getPublisher } from './index.js';
import { cfg } from '../config/index.js';

export type BarMessage = {
  kind: 'bar';
  marketId: string;
  intervalMinutes: number;
  ts: number;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: string;
};

export function toBarMessage(bar: OhlcvBar): BarMessage {
  return {
    kind: 'bar',
    marketId: bar.marketId,
    intervalMinutes: bar.intervalMinutes,
    ts: bar.periodStart,
    open: formatFixed(bar.open),
    high: formatFixed(bar.high),
    low: formatFixed(bar.low),
    close: formatFixed(bar.close),
    volume: formatFixed(bar.volume),
  };
}

export async function publishFinalizedBar(bar: OhlcvBar): Promise<void> {
  await getPublisher().publish(cfg.pubsubChannel, JSON.stringify(toBarMessage(bar)));
}
