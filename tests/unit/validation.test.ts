import { describe, expect, it } from 'vitest';
import { validateObservationPanel, validateReturnMatrix } from '@/validation/ajv_instance';
import { toDateKey } from '@/core/dates';
import { SchemaError } from '@/core/errors';

describe('validateObservationPanel', () => {
  it('accepts ISO dates, date-times and ordinals', () => {
    const result = validateObservationPanel([
      { date: '2021-01-31', entityId: 'AAA', factorValue: 1.2, realizedReturn: 0.01 },
      { date: '2021-01-31T00:00:00Z', entityId: 'BBB', factorValue: null, realizedReturn: 0.02 },
      { date: 3, entityId: 'CCC', factorValue: -0.4, realizedReturn: -0.01 },
    ]);
    expect(result.valid).toBe(true);
    expect(result.errors).toBeNull();
  });

  it('names the missing field', () => {
    const result = validateObservationPanel([
      { date: '2021-01-31', entityId: 'AAA', factorValue: 1 },
    ]);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain("/0: must have required property 'realizedReturn'");
  });

  it('rejects a non-date string', () => {
    const result = validateObservationPanel([
      { date: 'last tuesday', entityId: 'AAA', factorValue: 1, realizedReturn: 0.01 },
    ]);
    expect(result.valid).toBe(false);
  });
});

describe('validateReturnMatrix', () => {
  it('requires at least two periods', () => {
    const result = validateReturnMatrix({ assets: ['A'], rows: [[0.01]] });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('/rows: must NOT have fewer than 2 items');
  });

  it('rejects duplicate asset names', () => {
    const result = validateReturnMatrix({ assets: ['A', 'A'], rows: [[0.01, 0.01], [0.02, 0.02]] });
    expect(result.valid).toBe(false);
  });
});

describe('toDateKey', () => {
  it('orders ISO dates chronologically', () => {
    expect(toDateKey('2021-01-31')).toBeLessThan(toDateKey('2021-02-28'));
    expect(toDateKey(7)).toBe(7);
  });

  it('rejects unparseable dates', () => {
    expect(() => toDateKey('not-a-date')).toThrow(SchemaError);
    expect(() => toDateKey(Infinity)).toThrow(SchemaError);
  });
});
