/**
 * Geometric return linking.
 *
 * Input order is compounding order; callers pass returns in ascending date
 * order.
 */

import type { BucketReturnMatrix } from '@/types/analytics';

/**
 * Continue compounding from an existing cumulative return `base`.
 */
export function extendCumulative(base: number, returns: readonly number[]): number[] {
  const cumulative: number[] = [];
  let wealth = 1 + base;
  for (const r of returns) {
    wealth *= 1 + r;
    cumulative.push(wealth - 1);
  }
  return cumulative;
}

/**
 * cumulative(t) = prod(1 + r_i, i <= t) - 1. A -100% period pins every later
 * value at -1.
 */
export function linkReturns(returns: readonly number[]): number[] {
  return extendCumulative(0, returns);
}

/**
 * Link each bucket column of the matrix independently. Result is indexed by
 * bucket - 1.
 */
export function linkColumns(matrix: BucketReturnMatrix): number[][] {
  return Array.from({ length: matrix.bucketCount }, (_, b) =>
    linkReturns(matrix.rows.map((row) => row[b]))
  );
}
