/**
 * ZoneScanService Unit Tests
 *
 * Uses an in-memory candle provider; nothing leaves the process.
 */

import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { Candle } from '@confluence/shared-types';
import { ConfluencePipeline } from '../../src/pipeline/ConfluencePipeline';
import { CandleProvider, ZoneScanService } from '../../src/pipeline/ZoneScanService';
import { consolidationThenImpulse } from '../helpers/candles';

type Behaviour =
  | { kind: 'candles'; candles: unknown }
  | { kind: 'fail'; message: string }
  | { kind: 'hang' };

class InMemoryCandleProvider implements CandleProvider {
  readonly calls: Array<{ symbol: string; timeframe: string; limit: number }> = [];

  constructor(private readonly behaviours: Record<string, Behaviour>) {}

  async fetch(symbol: string, timeframe: string, limit: number): Promise<unknown> {
    this.calls.push({ symbol, timeframe, limit });
    const behaviour = this.behaviours[symbol];
    if (!behaviour) {
      throw new Error(`Unknown symbol ${symbol}`);
    }
    switch (behaviour.kind) {
      case 'candles':
        return behaviour.candles;
      case 'fail':
        throw new Error(behaviour.message);
      case 'hang':
        return new Promise<unknown>(() => undefined);
    }
  }
}

function asKlineRows(candles: Candle[]): Array<[number, string, string, string, string, string]> {
  return candles.map(c => [c.timestamp, String(c.open), String(c.high), String(c.low), String(c.close), String(c.volume)]);
}

describe('ZoneScanService', () => {
  const candles = consolidationThenImpulse();

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('requests the configured timeframe and limit for every symbol', async () => {
    const provider = new InMemoryCandleProvider({
      AAAUSD: { kind: 'candles', candles },
      BBBUSD: { kind: 'candles', candles: asKlineRows(candles) },
    });
    const service = new ZoneScanService(provider, new ConfluencePipeline(), {
      symbols: ['AAAUSD', 'BBBUSD'],
      timeframe: '4h',
      candleLimit: 100,
    });

    const result = await service.scan();

    expect(provider.calls).toEqual([
      { symbol: 'AAAUSD', timeframe: '4h', limit: 100 },
      { symbol: 'BBBUSD', timeframe: '4h', limit: 100 },
    ]);
    expect(result.skipped).toEqual([]);
    expect(result.snapshots.map(s => s.symbol)).toEqual(['AAAUSD', 'BBBUSD']);
    expect(result.snapshots[1].lastClose).toBe(result.snapshots[0].lastClose);
  });

  it('skips failing, empty and invalid symbols without dropping the rest', async () => {
    const provider = new InMemoryCandleProvider({
      GOOD: { kind: 'candles', candles },
      DOWN: { kind: 'fail', message: 'exchange unavailable' },
      EMPTY: { kind: 'candles', candles: [] },
      BROKEN: { kind: 'candles', candles: [{ timestamp: 1, open: 10, high: 9, low: 8, close: 10, volume: 1 }] },
    });
    const service = new ZoneScanService(provider, new ConfluencePipeline(), { timeframe: '1h' });

    const result = await service.scan(['GOOD', 'DOWN', 'EMPTY', 'BROKEN']);

    expect(result.snapshots.map(s => s.symbol)).toEqual(['GOOD']);
    expect(result.skipped.map(s => s.symbol)).toEqual(['DOWN', 'EMPTY', 'BROKEN']);
    expect(result.skipped[0].reason).toBe('exchange unavailable');
    expect(result.skipped[1].reason).toBe('Candles for EMPTY 1h not found');
    expect(result.skipped[2].reason).toBe('Invalid candle series at 0.high: high must not be below open or close');
  });

  it('skips a symbol whose fetch misses the deadline', async () => {
    const provider = new InMemoryCandleProvider({
      GOOD: { kind: 'candles', candles },
      SLOW: { kind: 'hang' },
    });
    const service = new ZoneScanService(provider, new ConfluencePipeline(), { deadlineMs: 20 });

    const result = await service.scan(['SLOW', 'GOOD']);

    expect(result.snapshots.map(s => s.symbol)).toEqual(['GOOD']);
    expect(result.skipped).toEqual([{ symbol: 'SLOW', reason: 'SLOW fetch exceeded deadline of 20ms' }]);
  });

  it('discards an analysis that finishes after the deadline', async () => {
    const provider = new InMemoryCandleProvider({ GOOD: { kind: 'candles', candles } });
    const service = new ZoneScanService(provider, new ConfluencePipeline(), { deadlineMs: 5000 });
    jest.spyOn(Date, 'now').mockReturnValueOnce(0).mockReturnValue(10_000);

    const result = await service.scan(['GOOD']);

    expect(result.snapshots).toEqual([]);
    expect(result.skipped).toEqual([{ symbol: 'GOOD', reason: 'GOOD analysis exceeded deadline of 5000ms' }]);
  });

  it('passes the configured balance to the pipeline', async () => {
    const pipeline = new ConfluencePipeline();
    const run = jest.spyOn(pipeline, 'run');
    const provider = new InMemoryCandleProvider({ GOOD: { kind: 'candles', candles } });
    const service = new ZoneScanService(provider, pipeline, { accountBalance: 2500 });

    await service.scan(['GOOD']);

    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toBe('GOOD');
    expect(run.mock.calls[0][2]).toEqual({ balance: 2500 });
  });
});
