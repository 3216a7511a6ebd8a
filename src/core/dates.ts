/**
 * Date keys for ordering panel rows
 */

import { parseISO } from 'date-fns';
import { SchemaError } from './errors';
import type { PanelDate } from '@/types/analytics';

/**
 * Numeric sort key for a panel date. Numbers are ordinals and pass through;
 * strings are parsed as ISO-8601.
 */
export function toDateKey(date: PanelDate): number {
  if (typeof date === 'number') {
    if (!Number.isFinite(date)) {
      throw new SchemaError('Invalid observation date', [`${date} is not a finite ordinal`]);
    }
    return date;
  }

  const time = parseISO(date).getTime();
  if (Number.isNaN(time)) {
    throw new SchemaError('Invalid observation date', [`"${date}" is not an ISO-8601 date`]);
  }
  return time;
}

export function compareDateKeys(a: number, b: number): number {
  return a - b;
}
