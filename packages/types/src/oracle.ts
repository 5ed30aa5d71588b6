/**
 * Price Oracle Types
 *
 * The oracle is an external collaborator: the core only consumes it.
 * A reading prices one unit of native currency in the accounting unit.
 */

/**
 * A single oracle reading.
 *
 * `rate` is a fixed-point integer with `precision` fractional digits:
 * rate = 200000000000n, precision = 8 → 2000.00000000 accounting units
 * per whole native unit.
 */
export interface OracleReading {
  readonly rate: bigint;
  readonly precision: number;

  /** Unix seconds when the source last updated the rate */
  readonly updatedAt?: number;
}

export interface PriceOracle {
  latestRate(): Promise<OracleReading>;
}
