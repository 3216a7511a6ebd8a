/**
 * Cross-sectional factor backtest
 *
 * Buckets the panel per date, averages realized returns per (date, bucket)
 * and compounds each bucket's series. The spread leg is long the highest
 * factor bucket and short the lowest.
 */

import { createChildLogger } from '@/utils/logger';
import { assignQuantiles, type QuantileOptions } from './quantiles';
import { bucketColumn, buildBucketReturnMatrix } from './aggregate';
import { linkReturns } from './linking';
import type {
  BucketAssignment,
  BucketReturnMatrix,
  Observation,
  PanelDate,
} from '@/types/analytics';

const logger = createChildLogger('backtest_engine');

export interface BacktestOptions extends QuantileOptions {
  bucketCount: number;
}

export interface BucketSeries {
  bucket: number;
  label: string;
  periodReturns: number[];
  cumulative: number[];
}

export interface SpreadSeries {
  longBucket: number;
  shortBucket: number;
  periodReturns: number[];
  cumulative: number[];
}

export interface BacktestResult {
  dates: PanelDate[];
  assignments: BucketAssignment[];
  skippedDates: PanelDate[];
  bucketReturns: BucketReturnMatrix;
  buckets: BucketSeries[];
  spread: SpreadSeries;
}

export function bucketLabel(bucket: number): string {
  return `Q${bucket}`;
}

export function runFactorBacktest(
  panel: readonly Observation[],
  options: BacktestOptions
): BacktestResult {
  const { bucketCount } = options;
  const { assignments, skippedDates } = assignQuantiles(panel, bucketCount, options);
  const bucketReturns = buildBucketReturnMatrix(panel, assignments, bucketCount);

  const buckets: BucketSeries[] = Array.from({ length: bucketCount }, (_, i) => {
    const bucket = i + 1;
    const periodReturns = bucketColumn(bucketReturns, bucket);
    return {
      bucket,
      label: bucketLabel(bucket),
      periodReturns,
      cumulative: linkReturns(periodReturns),
    };
  });

  const longLeg = buckets[bucketCount - 1].periodReturns;
  const shortLeg = buckets[0].periodReturns;
  const spreadReturns = longLeg.map((r, t) => r - shortLeg[t]);

  logger.debug(
    {
      dates: bucketReturns.dates.length,
      skippedDates: skippedDates.length,
      bucketCount,
    },
    'Factor backtest complete'
  );

  return {
    dates: bucketReturns.dates,
    assignments,
    skippedDates,
    bucketReturns,
    buckets,
    spread: {
      longBucket: bucketCount,
      shortBucket: 1,
      periodReturns: spreadReturns,
      cumulative: linkReturns(spreadReturns),
    },
  };
}
