/**
 * Tail and downside risk measures over period returns.
 */

import { ContractViolationError } from '@/core/errors';
import { assertFiniteSeries, assertPositive, mean, percentile, stdDev } from '@/analytics/numeric';
import { linkReturns } from '@/backtesting/linking';
import { annualizeReturn, maxDrawdown, type StatisticsOptions } from './statistics';

export interface RiskOptions extends StatisticsOptions {
  /** Default 0.95 */
  confidenceLevel?: number;
}

export interface RiskMetrics {
  valueAtRisk: number;
  expectedShortfall: number;
  downsideDeviation: number;
  sortinoRatio: number;
  calmarRatio: number;
}

export interface RelativeStatistics {
  activeReturn: number;
  trackingError: number;
  informationRatio: number;
}

function checkConfidence(confidenceLevel: number): void {
  if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
    throw new ContractViolationError(
      `confidenceLevel must lie strictly between 0 and 1, got ${confidenceLevel}`
    );
  }
}

/**
 * Historical VaR: the (1 - confidence) percentile of period returns, reported
 * as a return (negative for a loss). Empty input gives 0.
 */
export function historicalVaR(returns: readonly number[], confidenceLevel: number = 0.95): number {
  checkConfidence(confidenceLevel);
  if (returns.length === 0) return 0;
  return percentile(returns, (1 - confidenceLevel) * 100);
}

/**
 * Mean of the returns at or below the VaR.
 */
export function expectedShortfall(
  returns: readonly number[],
  confidenceLevel: number = 0.95
): number {
  if (returns.length === 0) return 0;
  const threshold = historicalVaR(returns, confidenceLevel);
  return mean(returns.filter((r) => r <= threshold));
}

/**
 * Annualized root-mean-square of the below-zero part of each return.
 */
export function downsideDeviation(returns: readonly number[], periodsPerYear: number): number {
  if (returns.length === 0) return NaN;
  const squared = returns.map((r) => Math.min(r, 0) ** 2);
  return Math.sqrt(mean(squared)) * Math.sqrt(periodsPerYear);
}

export function computeRiskMetrics(returns: readonly number[], options: RiskOptions): RiskMetrics {
  if (returns.length === 0) {
    throw new ContractViolationError('returns must contain at least one observation');
  }
  assertFiniteSeries(returns, 'returns');
  assertPositive(options.periodsPerYear, 'periodsPerYear');

  const { periodsPerYear, riskFreeRate = 0, confidenceLevel = 0.95 } = options;
  const cumulative = linkReturns(returns);
  const annualizedReturn = annualizeReturn(
    cumulative[cumulative.length - 1],
    returns.length,
    periodsPerYear
  );
  const annualizedRiskFree = Math.pow(1 + riskFreeRate, periodsPerYear) - 1;
  const downside = downsideDeviation(returns, periodsPerYear);
  const drawdown = maxDrawdown(cumulative);

  return {
    valueAtRisk: historicalVaR(returns, confidenceLevel),
    expectedShortfall: expectedShortfall(returns, confidenceLevel),
    downsideDeviation: downside,
    sortinoRatio: downside === 0 ? NaN : (annualizedReturn - annualizedRiskFree) / downside,
    calmarRatio: drawdown === 0 ? NaN : annualizedReturn / drawdown,
  };
}

/**
 * Active-risk figures of a portfolio against a benchmark over the same periods.
 */
export function computeRelativeStatistics(
  portfolio: readonly number[],
  benchmark: readonly number[],
  options: StatisticsOptions
): RelativeStatistics {
  if (portfolio.length === 0 || portfolio.length !== benchmark.length) {
    throw new ContractViolationError(
      `portfolio and benchmark must be non-empty and aligned, got ${portfolio.length} and ${benchmark.length}`
    );
  }
  assertFiniteSeries(portfolio, 'portfolio');
  assertFiniteSeries(benchmark, 'benchmark');
  assertPositive(options.periodsPerYear, 'periodsPerYear');

  const { periodsPerYear } = options;
  const active = portfolio.map((r, t) => r - benchmark[t]);
  const trackingError = stdDev(active, 0) * Math.sqrt(periodsPerYear);
  const portfolioTotal = linkReturns(portfolio)[portfolio.length - 1];
  const benchmarkTotal = linkReturns(benchmark)[benchmark.length - 1];

  return {
    activeReturn:
      annualizeReturn(portfolioTotal, portfolio.length, periodsPerYear) -
      annualizeReturn(benchmarkTotal, benchmark.length, periodsPerYear),
    trackingError,
    informationRatio:
      trackingError === 0 ? NaN : (mean(active) * periodsPerYear) / trackingError,
  };
}
