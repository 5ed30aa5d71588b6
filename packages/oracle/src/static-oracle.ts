/**
 * Static Price Oracle
 *
 * Serves a fixed rate set by configuration. Every reading is stamped
 * with the current time, so it never goes stale.
 *
 * Suitable for development, demos and tests. Not a price source.
 */

import type { OracleReading, PriceOracle } from "@custody/types";

export class StaticPriceOracle implements PriceOracle {
  private _rate: bigint;
  private _precision: number;
  private readonly clock: () => number;

  /**
   * @param rate - Fixed-point rate, `precision` fractional digits
   * @param clock - Millisecond clock used to stamp readings
   */
  constructor(rate: bigint, precision: number, clock: () => number = Date.now) {
    if (!Number.isInteger(precision) || precision < 0) {
      throw new Error(`StaticPriceOracle: precision must be a non-negative integer, got ${String(precision)}`);
    }
    this._rate = rate;
    this._precision = precision;
    this.clock = clock;
  }

  async latestRate(): Promise<OracleReading> {
    return {
      rate: this._rate,
      precision: this._precision,
      updatedAt: Math.floor(this.clock() / 1000),
    };
  }

  /**
   * Replace the served rate. Readings taken afterwards use the new rate.
   */
  setRate(rate: bigint, precision: number = this._precision): void {
    if (!Number.isInteger(precision) || precision < 0) {
      throw new Error(`StaticPriceOracle: precision must be a non-negative integer, got ${String(precision)}`);
    }
    this._rate = rate;
    this._precision = precision;
  }
}
