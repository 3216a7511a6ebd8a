/**
 * Transaction cost models for equity trading
 *
 * Both models are element-wise over a list of trades. No netting or
 * portfolio-level aggregation happens here.
 */

import { assertFiniteSeries, assertNonNegative, assertPositive } from '@/analytics/numeric';

export interface SquareRootImpactParams {
  /** Calibration constant. Default 0.1 */
  k?: number;
  /** Realized daily volatility of the asset. Default 0.02 */
  dailyVol?: number;
}

export interface AlmgrenChrissParams {
  /** Linear permanent-impact cost per share. */
  permanentCostPerShare: number;
  /** Temporary-impact coefficient. */
  eta: number;
  /** Execution horizon, must be > 0. */
  timeHorizon: number;
}

/**
 * Square-root market impact: k * dailyVol * sqrt(|v|) * sign(v), where v is
 * the signed trade size as a fraction of average daily volume. The sign
 * follows the trade direction.
 */
export function squareRootImpact(
  tradeSizes: readonly number[],
  params: SquareRootImpactParams = {}
): number[] {
  const { k = 0.1, dailyVol = 0.02 } = params;
  assertNonNegative(k, 'k');
  assertNonNegative(dailyVol, 'dailyVol');
  assertFiniteSeries(tradeSizes, 'tradeSizes');

  const scale = k * dailyVol;
  return tradeSizes.map((v) => (v === 0 ? 0 : scale * Math.sqrt(Math.abs(v)) * Math.sign(v)));
}

/**
 * Almgren-Chriss cost in dollars: a permanent term linear in shares plus a
 * temporary term that grows as the horizon shrinks.
 */
export function almgrenChrissCost(
  shares: readonly number[],
  params: AlmgrenChrissParams
): number[] {
  const { permanentCostPerShare, eta, timeHorizon } = params;
  assertPositive(timeHorizon, 'timeHorizon');
  assertNonNegative(permanentCostPerShare, 'permanentCostPerShare');
  assertNonNegative(eta, 'eta');
  assertFiniteSeries(shares, 'shares');

  return shares.map((s) => (s === 0 ? 0 : permanentCostPerShare * s + (eta * s) / timeHorizon));
}
