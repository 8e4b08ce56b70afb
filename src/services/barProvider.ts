/**
 * Bar Provider
 * Source of OHLC history for the structure agent. Implementations return
 * bars oldest first, or null when nothing is available. Timeouts and
 * retries belong to the implementation or its caller.
 */

import type { RawRates } from '../engine/barNormalizer.js';
import { createLogger } from './logger.js';

const logger = createLogger('BarProvider');

export interface BarProvider {
  getRates(symbol: string, timeframe: string, count: number): Promise<RawRates | null>;
}

function seriesKey(symbol: string, timeframe: string): string {
  return `${symbol.toUpperCase()}:${timeframe.toUpperCase()}`;
}

/**
 * Serves fixed series registered per symbol and timeframe; returns the
 * trailing `count` rows.
 */
export class InMemoryBarProvider implements BarProvider {
  private readonly series = new Map<string, readonly object[]>();

  set(symbol: string, timeframe: string, rows: readonly object[]): this {
    this.series.set(seriesKey(symbol, timeframe), rows);
    return this;
  }

  async getRates(symbol: string, timeframe: string, count: number): Promise<RawRates | null> {
    const rows = this.series.get(seriesKey(symbol, timeframe));
    if (!rows || rows.length === 0) {
      logger.debug(`No series for ${seriesKey(symbol, timeframe)}`);
      return null;
    }
    return rows.slice(Math.max(0, rows.length - count));
  }
}
