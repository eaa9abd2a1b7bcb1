/**
 * ZoneScanService - Multi-symbol scan over an injected candle source
 *
 * Symbols are independent, so they run concurrently. Each symbol gets a deadline; a symbol
 * that fails, times out or returns no candles is reported in `skipped` and its result dropped.
 */

import { AccountState, EngineSnapshot, ScanResult, ScanSkip } from '@confluence/shared-types';
import { DEFAULT_SCAN_CONFIG, ScanConfig } from '@confluence/shared-config';
import { DeadlineExceededError, Logger, NotFoundError, describeError } from '@confluence/shared-utils';
import { parseCandleSeries } from '../marketData/CandleSeries';
import { ConfluencePipeline } from './ConfluencePipeline';

const logger = new Logger('ZoneScanService');

/**
 * Candle source (exchange client, cache, file replay). Retries, caching and rate limits are its concern.
 */
export interface CandleProvider {
  fetch(symbol: string, timeframe: string, limit: number): Promise<unknown>;
}

type SymbolOutcome =
  | { ok: true; snapshot: EngineSnapshot }
  | { ok: false; skip: ScanSkip };

export class ZoneScanService {
  private config: ScanConfig;

  constructor(
    private readonly provider: CandleProvider,
    private readonly pipeline: ConfluencePipeline = new ConfluencePipeline(),
    config: Partial<ScanConfig> = {}
  ) {
    const d = DEFAULT_SCAN_CONFIG;
    this.config = {
      symbols: config.symbols ?? d.symbols,
      timeframe: config.timeframe ?? d.timeframe,
      candleLimit: config.candleLimit ?? d.candleLimit,
      deadlineMs: config.deadlineMs ?? d.deadlineMs,
      accountBalance: config.accountBalance ?? d.accountBalance,
    };
  }

  async scan(
    symbols: readonly string[] = this.config.symbols,
    account: AccountState = { balance: this.config.accountBalance }
  ): Promise<ScanResult> {
    const outcomes = await Promise.all(symbols.map(symbol => this.scanSymbol(symbol, account)));

    const result: ScanResult = { snapshots: [], skipped: [] };
    for (const outcome of outcomes) {
      if (outcome.ok) {
        result.snapshots.push(outcome.snapshot);
      } else {
        result.skipped.push(outcome.skip);
      }
    }

    logger.info(`Scan complete: ${result.snapshots.length} symbols analyzed, ${result.skipped.length} skipped`);
    return result;
  }

  private async scanSymbol(symbol: string, account: AccountState): Promise<SymbolOutcome> {
    const { timeframe, candleLimit, deadlineMs } = this.config;
    const startedAt = Date.now();

    try {
      const raw = await this.withDeadline(
        this.provider.fetch(symbol, timeframe, candleLimit),
        deadlineMs,
        `${symbol} fetch`
      );
      const candles = parseCandleSeries(raw);
      if (candles.length === 0) {
        throw new NotFoundError(`Candles for ${symbol} ${timeframe}`);
      }

      const snapshot = this.pipeline.run(symbol, candles, account);
      if (!snapshot) {
        throw new NotFoundError(`Snapshot for ${symbol}`);
      }

      // The pipeline is synchronous; a late result is discarded rather than interrupted
      const elapsed = Date.now() - startedAt;
      if (elapsed > deadlineMs) {
        throw new DeadlineExceededError(`${symbol} analysis`, deadlineMs);
      }

      return { ok: true, snapshot };
    } catch (error) {
      const reason = describeError(error);
      logger.warn(`[${symbol}] Skipped: ${reason}`);
      return { ok: false, skip: { symbol, reason } };
    }
  }

  private withDeadline<T>(promise: Promise<T>, deadlineMs: number, operation: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new DeadlineExceededError(operation, deadlineMs)), deadlineMs);
    });
    return Promise.race([promise, timeout]).finally(() => {
      if (timer) clearTimeout(timer);
    });
  }
}
