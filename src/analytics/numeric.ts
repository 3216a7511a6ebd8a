/**
 * Statistical helpers shared by the backtest, statistics and optimizer modules.
 */

import { ContractViolationError } from '@/core/errors';

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return sum(values) / values.length;
}

function allEqual(values: readonly number[]): boolean {
  for (let i = 1; i < values.length; i++) {
    if (values[i] !== values[0]) return false;
  }
  return true;
}

/**
 * Standard deviation with `ddof` delta degrees of freedom (0 = population).
 * A series of identical values has a deviation of exactly 0, with no
 * rounding residue from the mean.
 */
export function stdDev(values: readonly number[], ddof: number = 0): number {
  const n = values.length;
  if (n - ddof <= 0) return NaN;
  if (allEqual(values)) return 0;

  const avg = mean(values);
  let squared = 0;
  for (const v of values) squared += (v - avg) ** 2;
  return Math.sqrt(squared / (n - ddof));
}

/**
 * Linearly interpolated percentile (0-100) over the sorted values.
 */
export function percentile(values: readonly number[], pct: number): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const position = (Math.min(Math.max(pct, 0), 100) / 100) * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  const fraction = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
}

/**
 * Running maximum to date.
 */
export function cumulativeMax(values: readonly number[]): number[] {
  const result: number[] = [];
  let peak = -Infinity;
  for (const v of values) {
    peak = Math.max(peak, v);
    result.push(peak);
  }
  return result;
}

export function assertFiniteSeries(values: readonly number[], label: string): void {
  values.forEach((v, i) => {
    if (!Number.isFinite(v)) {
      throw new ContractViolationError(`${label}[${i}] must be a finite number, got ${v}`);
    }
  });
}

export function assertPositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ContractViolationError(`${label} must be a finite number > 0, got ${value}`);
  }
}

export function assertNonNegative(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ContractViolationError(`${label} must be a finite number >= 0, got ${value}`);
  }
}
