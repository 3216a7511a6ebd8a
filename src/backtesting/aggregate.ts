/**
 * Per-date aggregation of realized returns.
 */

import { compareDateKeys, toDateKey } from '@/core/dates';
import { mean } from '@/analytics/numeric';
import { assertObservationPanel, groupByDate } from './panel';
import type {
  BucketAssignment,
  BucketReturnMatrix,
  DatedSeries,
  Observation,
  PanelDate,
} from '@/types/analytics';

interface DateBuckets {
  date: PanelDate;
  members: number[][];
}

/**
 * Mean realized return per (date, bucket), dates ascending. A bucket with no
 * members on a date yields NaN.
 */
export function buildBucketReturnMatrix(
  panel: readonly Observation[],
  assignments: readonly BucketAssignment[],
  bucketCount: number
): BucketReturnMatrix {
  const returnsByDate = new Map<number, Map<string, number>>();
  for (const row of panel) {
    const key = toDateKey(row.date);
    let byEntity = returnsByDate.get(key);
    if (!byEntity) {
      byEntity = new Map<string, number>();
      returnsByDate.set(key, byEntity);
    }
    byEntity.set(row.entityId, row.realizedReturn);
  }

  const byDate = new Map<number, DateBuckets>();
  for (const assignment of assignments) {
    const key = toDateKey(assignment.date);
    const realized = returnsByDate.get(key)?.get(assignment.entityId);
    if (realized === undefined) continue;

    let entry = byDate.get(key);
    if (!entry) {
      entry = {
        date: assignment.date,
        members: Array.from({ length: bucketCount }, () => []),
      };
      byDate.set(key, entry);
    }
    entry.members[assignment.bucket - 1]?.push(realized);
  }

  const keys = [...byDate.keys()].sort(compareDateKeys);
  const dates: PanelDate[] = [];
  const rows: number[][] = [];
  for (const key of keys) {
    const entry = byDate.get(key);
    if (!entry) continue;
    dates.push(entry.date);
    rows.push(entry.members.map((returns) => mean(returns)));
  }

  return { dates, bucketCount, rows };
}

export function bucketColumn(matrix: BucketReturnMatrix, bucket: number): number[] {
  return matrix.rows.map((row) => row[bucket - 1]);
}

/**
 * Equal-weighted mean return across every row of each date, ascending.
 * Rows with a missing factor still count.
 */
export function compositeReturns(panel: readonly Observation[]): DatedSeries {
  assertObservationPanel(panel);
  const groups = groupByDate(panel);
  return {
    dates: groups.map((group) => group.date),
    values: groups.map((group) => mean(group.rows.map((row) => row.realizedReturn))),
  };
}
