export * from './types/analytics';
export * from './core/errors';
export { getConfig, loadConfig, resetConfig, type AppConfig } from './core/config';
export { assignQuantiles, bucketSizes, rankByFactor, type QuantileOptions } from './backtesting/quantiles';
export { buildBucketReturnMatrix, bucketColumn, compositeReturns } from './backtesting/aggregate';
export { linkReturns, extendCumulative, linkColumns } from './backtesting/linking';
export {
  runFactorBacktest,
  bucketLabel,
  type BacktestOptions,
  type BacktestResult,
  type BucketSeries,
  type SpreadSeries,
} from './backtesting/engine';
export {
  computePerformanceStatistics,
  computePerformanceStatisticsFromCumulative,
  annualizeReturn,
  maxDrawdown,
  type StatisticsOptions,
} from './performance/statistics';
export {
  computeRiskMetrics,
  computeRelativeStatistics,
  historicalVaR,
  expectedShortfall,
  type RiskMetrics,
  type RelativeStatistics,
} from './performance/risk';
export {
  squareRootImpact,
  almgrenChrissCost,
  type SquareRootImpactParams,
  type AlmgrenChrissParams,
} from './execution/transaction_cost';
export { meanVarianceWeights, clipAndNormalize, type MeanVarianceOptions } from './portfolio/mean_variance';
export { symmetricPseudoInverse } from './analytics/matrix';
