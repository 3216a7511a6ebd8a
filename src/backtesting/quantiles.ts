/**
 * Cross-sectional quantile bucketing.
 *
 * Bucket 1 holds the LOWEST factor values and bucket N the highest. A
 * strategy that treats low values as favorable must negate its factor before
 * calling in.
 */

import { ContractViolationError, InsufficientCardinalityError } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { assertObservationPanel, groupByDate, hasFactorValue } from './panel';
import type {
  BucketAssignment,
  InsufficientDatePolicy,
  Observation,
  PanelDate,
} from '@/types/analytics';

const logger = createChildLogger('quantiles');

export interface QuantileOptions {
  /** What to do with a date that has fewer ranked rows than buckets. Default `throw`. */
  onInsufficientDate?: InsufficientDatePolicy;
}

export interface QuantileResult {
  /** Ascending by date, then by rank within the date. */
  assignments: BucketAssignment[];
  skippedDates: PanelDate[];
}

/**
 * Group sizes for `count` ranked rows split into `bucketCount` contiguous
 * groups. The first `count % bucketCount` groups take one extra row.
 */
export function bucketSizes(count: number, bucketCount: number): number[] {
  const base = Math.floor(count / bucketCount);
  const remainder = count % bucketCount;
  return Array.from({ length: bucketCount }, (_, i) => base + (i < remainder ? 1 : 0));
}

/**
 * Stable ascending rank: equal factor values keep first-seen order.
 */
export function rankByFactor(
  rows: readonly Observation[]
): Array<Observation & { factorValue: number }> {
  return rows.filter(hasFactorValue).sort((a, b) => a.factorValue - b.factorValue);
}

export function assignQuantiles(
  panel: readonly Observation[],
  bucketCount: number,
  options: QuantileOptions = {}
): QuantileResult {
  if (!Number.isInteger(bucketCount) || bucketCount < 2) {
    throw new ContractViolationError(`bucketCount must be an integer >= 2, got ${bucketCount}`);
  }
  assertObservationPanel(panel);

  const policy = options.onInsufficientDate ?? 'throw';
  const assignments: BucketAssignment[] = [];
  const skippedDates: PanelDate[] = [];

  for (const group of groupByDate(panel)) {
    const ranked = rankByFactor(group.rows);

    if (ranked.length < bucketCount) {
      if (policy === 'throw') {
        throw new InsufficientCardinalityError(group.date, bucketCount, ranked.length);
      }
      logger.warn(
        { date: group.date, available: ranked.length, required: bucketCount },
        'Skipping date with too few ranked observations'
      );
      skippedDates.push(group.date);
      continue;
    }

    let offset = 0;
    bucketSizes(ranked.length, bucketCount).forEach((size, i) => {
      for (const row of ranked.slice(offset, offset + size)) {
        assignments.push({ date: group.date, entityId: row.entityId, bucket: i + 1 });
      }
      offset += size;
    });
  }

  logger.debug(
    { assignments: assignments.length, skipped: skippedDates.length, bucketCount },
    'Quantile assignment complete'
  );

  return { assignments, skippedDates };
}
