/**
 * Observation panel checks and per-date grouping
 */

import { compareDateKeys, toDateKey } from '@/core/dates';
import { SchemaError } from '@/core/errors';
import { validateObservationPanel } from '@/validation/ajv_instance';
import type { Observation, ObservationPanel, PanelDate } from '@/types/analytics';

export interface DateGroup {
  key: number;
  /** The date as first seen in the input. */
  date: PanelDate;
  /** Rows in input order. */
  rows: Observation[];
}

export function hasFactorValue(row: Observation): row is Observation & { factorValue: number } {
  return typeof row.factorValue === 'number' && Number.isFinite(row.factorValue);
}

/**
 * Fail fast on missing fields, wrong types or non-finite returns.
 */
export function assertObservationPanel(panel: unknown): asserts panel is ObservationPanel {
  const result = validateObservationPanel(panel);
  if (!result.valid) {
    throw new SchemaError('Observation panel failed validation', result.errors);
  }

  const issues: string[] = [];
  result.data.forEach((row, i) => {
    if (!Number.isFinite(row.realizedReturn)) {
      issues.push(`/${i}/realizedReturn: must be finite`);
    }
  });
  if (issues.length > 0) {
    throw new SchemaError('Observation panel failed validation', issues);
  }
}

/**
 * Partition rows by date, ascending. Each (date, entityId) pair must be unique.
 */
export function groupByDate(panel: readonly Observation[]): DateGroup[] {
  const groups = new Map<number, DateGroup>();
  const seen = new Map<number, Set<string>>();
  const dateKind = panel.length > 0 ? typeof panel[0].date : undefined;

  for (const row of panel) {
    if (typeof row.date !== dateKind) {
      throw new SchemaError('Mixed observation date types', [
        `date ${String(row.date)} is a ${typeof row.date}, expected ${String(dateKind)}`,
      ]);
    }
    const key = toDateKey(row.date);
    let group = groups.get(key);
    let entities = seen.get(key);
    if (!group || !entities) {
      group = { key, date: row.date, rows: [] };
      entities = new Set<string>();
      groups.set(key, group);
      seen.set(key, entities);
    }

    if (entities.has(row.entityId)) {
      throw new SchemaError('Duplicate observation', [
        `entity ${row.entityId} appears more than once on ${String(row.date)}`,
      ]);
    }
    entities.add(row.entityId);
    group.rows.push(row);
  }

  return [...groups.values()].sort((a, b) => compareDateKeys(a.key, b.key));
}
