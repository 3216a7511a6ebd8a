import { describe, expect, it } from 'vitest';
import { clipAndNormalize, meanVarianceWeights } from '@/portfolio/mean_variance';
import { ContractViolationError, SchemaError } from '@/core/errors';
import type { AssetWeight, ReturnMatrix } from '@/types/analytics';

// Equal variance, zero covariance; A has twice the mean of B.
const twoAssets: ReturnMatrix = {
  assets: ['A', 'B'],
  rows: [
    [0.03, 0.02],
    [0.01, 0.0],
    [0.03, 0.0],
    [0.01, 0.02],
  ],
};

function total(weights: AssetWeight[]): number {
  return weights.reduce((acc, w) => acc + w.weight, 0);
}

describe('meanVarianceWeights', () => {
  it('tilts towards the asset with the higher mean', () => {
    const weights = meanVarianceWeights(twoAssets);
    expect(weights.map((w) => w.asset)).toEqual(['A', 'B']);
    expect(weights[0].weight).toBeGreaterThan(weights[1].weight);
    expect(weights[0].weight).toBeCloseTo(2 / 3, 9);
    expect(weights[1].weight).toBeCloseTo(1 / 3, 9);
    expect(Math.abs(total(weights) - 1)).toBeLessThan(1e-9);
  });

  it('does not depend on risk aversion', () => {
    const base = meanVarianceWeights(twoAssets, { riskAversion: 1 });
    const averse = meanVarianceWeights(twoAssets, { riskAversion: 5 });
    expect(averse[0].weight).toBeCloseTo(base[0].weight, 12);
    expect(averse[1].weight).toBeCloseTo(base[1].weight, 12);
  });

  it('clips into bounds and renormalizes', () => {
    const weights = meanVarianceWeights(twoAssets, { weightBounds: [0.4, 0.6] });
    expect(weights[0].weight).toBeCloseTo(0.6, 9);
    expect(weights[1].weight).toBeCloseTo(0.4, 9);
    expect(Math.abs(total(weights) - 1)).toBeLessThan(1e-9);
  });

  it('absorbs a singular covariance matrix', () => {
    const duplicated: ReturnMatrix = {
      assets: ['A', 'A2', 'B'],
      rows: twoAssets.rows.map(([a, b]) => [a, a, b]),
    };
    const weights = meanVarianceWeights(duplicated);
    for (const w of weights) {
      expect(w.weight).toBeCloseTo(1 / 3, 9);
    }
    expect(Math.abs(total(weights) - 1)).toBeLessThan(1e-9);
  });

  it('falls back to equal weights when the solution sums to zero', () => {
    const weights = meanVarianceWeights({
      assets: ['A', 'B'],
      rows: [
        [0.01, -0.01],
        [-0.01, 0.01],
      ],
    });
    expect(weights.map((w) => w.weight)).toEqual([0.5, 0.5]);
  });

  it('rejects a non-positive risk aversion', () => {
    expect(() => meanVarianceWeights(twoAssets, { riskAversion: 0 })).toThrow(
      ContractViolationError
    );
  });

  it('rejects missing, ragged or too-short inputs', () => {
    expect(() =>
      meanVarianceWeights({ assets: ['A', 'B'], rows: [[0.01, NaN], [0.02, 0.01]] })
    ).toThrow(SchemaError);
    expect(() =>
      meanVarianceWeights({ assets: ['A', 'B'], rows: [[0.01], [0.02, 0.01]] })
    ).toThrow(SchemaError);
    expect(() => meanVarianceWeights({ assets: ['A'], rows: [[0.01]] })).toThrow(SchemaError);
  });
});

describe('clipAndNormalize', () => {
  it('compresses extreme weights', () => {
    const weights = clipAndNormalize([0.8, 0.3, -0.1], [0, 0.5]);
    expect(weights[0]).toBeCloseTo(0.625, 12);
    expect(weights[1]).toBeCloseTo(0.375, 12);
    expect(weights[2]).toBe(0);
  });

  it('rejects inverted bounds and bounds that zero every weight', () => {
    expect(() => clipAndNormalize([0.5, 0.5], [0.6, 0.4])).toThrow(ContractViolationError);
    expect(() => clipAndNormalize([0.5, 0.5], [0, 0])).toThrow(ContractViolationError);
  });
});
