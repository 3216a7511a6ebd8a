/**
 * Performance Statistics
 *
 * Five-figure summary of one return series:
 * - Total Return
 * - Annualized Return (geometric)
 * - Annualized Volatility (population std)
 * - Sharpe Ratio
 * - Max Drawdown (on the cumulative series, in return units)
 */

import { ContractViolationError } from '@/core/errors';
import { assertFiniteSeries, assertPositive, cumulativeMax, stdDev } from '@/analytics/numeric';
import { linkReturns } from '@/backtesting/linking';
import type { PerformanceStatistics } from '@/types/analytics';

export interface StatisticsOptions {
  /** e.g. 12 for monthly returns, 252 for daily */
  periodsPerYear: number;
  /** Per-period risk-free rate, same periodicity as the returns. */
  riskFreeRate?: number;
}

export function annualizeReturn(
  totalReturn: number,
  periods: number,
  periodsPerYear: number
): number {
  return Math.pow(1 + totalReturn, periodsPerYear / periods) - 1;
}

export function annualizeVolatility(periodReturns: readonly number[], periodsPerYear: number): number {
  return stdDev(periodReturns, 0) * Math.sqrt(periodsPerYear);
}

/**
 * Worst peak-to-trough decline of the cumulative series. Always >= 0.
 */
export function maxDrawdown(cumulative: readonly number[]): number {
  const peaks = cumulativeMax(cumulative);
  let worst = 0;
  cumulative.forEach((value, t) => {
    worst = Math.max(worst, peaks[t] - value);
  });
  return worst;
}

/**
 * Period returns recovered from a cumulative series by differencing. The
 * first period's return equals the first cumulative value.
 */
export function differenceCumulative(cumulative: readonly number[]): number[] {
  return cumulative.map((value, t) => (t === 0 ? value : value - cumulative[t - 1]));
}

function checkInputs(series: readonly number[], label: string, options: StatisticsOptions): void {
  if (series.length === 0) {
    throw new ContractViolationError(`${label} must contain at least one observation`);
  }
  assertFiniteSeries(series, label);
  assertPositive(options.periodsPerYear, 'periodsPerYear');
  if (options.riskFreeRate !== undefined && !Number.isFinite(options.riskFreeRate)) {
    throw new ContractViolationError(`riskFreeRate must be finite, got ${options.riskFreeRate}`);
  }
}

function buildStatistics(
  totalReturn: number,
  periodReturns: readonly number[],
  cumulative: readonly number[],
  options: StatisticsOptions
): PerformanceStatistics {
  const { periodsPerYear, riskFreeRate = 0 } = options;
  const annualizedReturn = annualizeReturn(totalReturn, periodReturns.length, periodsPerYear);
  const annualizedVolatility = annualizeVolatility(periodReturns, periodsPerYear);
  const annualizedRiskFree = Math.pow(1 + riskFreeRate, periodsPerYear) - 1;

  return Object.freeze({
    totalReturn,
    annualizedReturn,
    annualizedVolatility,
    sharpeRatio:
      annualizedVolatility === 0
        ? NaN
        : (annualizedReturn - annualizedRiskFree) / annualizedVolatility,
    maxDrawdown: maxDrawdown(cumulative),
  });
}

export function computePerformanceStatistics(
  periodReturns: readonly number[],
  options: StatisticsOptions
): PerformanceStatistics {
  checkInputs(periodReturns, 'periodReturns', options);
  const cumulative = linkReturns(periodReturns);
  return buildStatistics(cumulative[cumulative.length - 1], periodReturns, cumulative, options);
}

export function computePerformanceStatisticsFromCumulative(
  cumulative: readonly number[],
  options: StatisticsOptions
): PerformanceStatistics {
  checkInputs(cumulative, 'cumulative', options);
  return buildStatistics(
    cumulative[cumulative.length - 1],
    differenceCumulative(cumulative),
    cumulative,
    options
  );
}
