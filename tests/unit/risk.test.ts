import { describe, expect, it } from 'vitest';
import {
  computeRelativeStatistics,
  computeRiskMetrics,
  downsideDeviation,
  expectedShortfall,
  historicalVaR,
} from '@/performance/risk';
import { ContractViolationError } from '@/core/errors';

const returns = [0.03, -0.05, 0.04, -0.02, 0.01];

describe('historicalVaR', () => {
  it('interpolates the lower percentile', () => {
    expect(historicalVaR(returns, 0.8)).toBeCloseTo(-0.026, 10);
  });

  it('returns 0 for an empty series', () => {
    expect(historicalVaR([], 0.95)).toBe(0);
  });

  it('rejects a confidence level outside (0, 1)', () => {
    expect(() => historicalVaR(returns, 1)).toThrow(ContractViolationError);
  });
});

describe('expectedShortfall', () => {
  it('averages the returns at or below the VaR', () => {
    expect(expectedShortfall(returns, 0.8)).toBe(-0.05);
    expect(expectedShortfall(returns, 0.5)).toBeCloseTo(-0.02, 12);
  });
});

describe('downsideDeviation', () => {
  it('annualizes the root mean square of losses', () => {
    expect(downsideDeviation([0.02, -0.03, 0.01, -0.04], 12)).toBeCloseTo(
      0.025 * Math.sqrt(12),
      12
    );
  });
});

describe('computeRiskMetrics', () => {
  it('leaves Sortino and Calmar undefined without losses', () => {
    const metrics = computeRiskMetrics([0.01, 0.02, 0.03], { periodsPerYear: 12 });
    expect(metrics.downsideDeviation).toBe(0);
    expect(metrics.sortinoRatio).toBeNaN();
    expect(metrics.calmarRatio).toBeNaN();
  });

  it('divides the annualized return by the drawdown for Calmar', () => {
    const metrics = computeRiskMetrics([0.1, -0.2, 0.05], { periodsPerYear: 12 });
    expect(metrics.calmarRatio).toBeCloseTo(-0.2710665418239995 / 0.22, 9);
    expect(metrics.sortinoRatio).toBeLessThan(0);
  });
});

describe('computeRelativeStatistics', () => {
  it('reports zero tracking error for a constant active return', () => {
    const benchmark = [0.01, -0.02, 0.03];
    const portfolio = benchmark.map((r) => r + 0.005);
    const stats = computeRelativeStatistics(portfolio, benchmark, { periodsPerYear: 12 });
    expect(stats.trackingError).toBeLessThan(1e-12);
    expect(stats.activeReturn).toBeGreaterThan(0);
  });

  it('reports the information ratio against a varying active return', () => {
    const stats = computeRelativeStatistics([0.02, 0.0], [0.0, 0.0], { periodsPerYear: 12 });
    expect(stats.trackingError).toBeCloseTo(0.01 * Math.sqrt(12), 12);
    expect(stats.informationRatio).toBeCloseTo((0.01 * 12) / (0.01 * Math.sqrt(12)), 10);
  });

  it('rejects misaligned series', () => {
    expect(() => computeRelativeStatistics([0.01], [0.01, 0.02], { periodsPerYear: 12 })).toThrow(
      ContractViolationError
    );
  });
});
