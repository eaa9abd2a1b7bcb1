/**
 * Scan Configuration
 *
 * Symbols and limits for a multi-symbol zone scan
 */

import { envInt, envList, envNumber } from './env';

export interface ScanConfig {
  /**
   * Symbols to scan (e.g. ["BTCUSDT", "ETHUSDT"])
   */
  symbols: string[];
  timeframe: string;
  candleLimit: number;
  /**
   * Per-symbol deadline; late results are discarded
   * Default: 5000ms
   */
  deadlineMs: number;
  accountBalance: number;
}

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  symbols: ['BTCUSDT', 'ETHUSDT'],
  timeframe: '1h',
  candleLimit: 500,
  deadlineMs: 5000,
  accountBalance: 10000,
};

export function getScanConfig(): ScanConfig {
  const d = DEFAULT_SCAN_CONFIG;
  return {
    symbols: envList('SCAN_SYMBOLS', d.symbols),
    timeframe: process.env.SCAN_TIMEFRAME || d.timeframe,
    candleLimit: envInt('SCAN_CANDLE_LIMIT', d.candleLimit),
    deadlineMs: envInt('SCAN_DEADLINE_MS', d.deadlineMs),
    accountBalance: envNumber('SCAN_ACCOUNT_BALANCE', d.accountBalance),
  };
}
