/**
 * Shared record shapes for the factor analytics core.
 */

/** ISO-8601 date or date-time string, or a numeric ordinal. */
export type PanelDate = string | number;

export interface Observation {
  date: PanelDate;
  entityId: string;
  /** `null` or a non-finite number means the factor is missing for this row. */
  factorValue: number | null;
  /** Return realized over the holding period that follows `date`. */
  realizedReturn: number;
}

export type ObservationPanel = Observation[];

export interface BucketAssignment {
  date: PanelDate;
  entityId: string;
  /** 1 = lowest factor value group, N = highest. */
  bucket: number;
}

export interface BucketReturnMatrix {
  dates: PanelDate[];
  bucketCount: number;
  /** rows[t][b - 1] is the mean realized return of bucket b on dates[t]. */
  rows: number[][];
}

export interface DatedSeries {
  dates: PanelDate[];
  values: number[];
}

export interface ReturnMatrix {
  assets: string[];
  /** One row per period, one column per asset. */
  rows: number[][];
}

export interface AssetWeight {
  asset: string;
  weight: number;
}

export interface PerformanceStatistics {
  totalReturn: number;
  annualizedReturn: number;
  annualizedVolatility: number;
  /** NaN when annualized volatility is exactly zero. */
  sharpeRatio: number;
  maxDrawdown: number;
}

export type InsufficientDatePolicy = 'throw' | 'skip';
