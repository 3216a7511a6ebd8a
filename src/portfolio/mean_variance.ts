/**
 * Mean-variance portfolio weights
 *
 * Closed-form unconstrained solution w ∝ Σ⁺μ / λ, normalized to sum to 1.
 * λ only rescales the raw vector, so it cancels after normalization; the
 * result does not depend on it.
 *
 * Optional bounds are applied by clipping then renormalizing. This compresses
 * extreme weights and is not a constrained solve.
 */

import { ContractViolationError, SchemaError } from '@/core/errors';
import { assertPositive, sum } from '@/analytics/numeric';
import {
  columnMeans,
  multiplyVector,
  sampleCovariance,
  symmetricPseudoInverse,
} from '@/analytics/matrix';
import { validateReturnMatrix } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import type { AssetWeight, ReturnMatrix } from '@/types/analytics';

const logger = createChildLogger('mean_variance');

export interface MeanVarianceOptions {
  /** λ > 0. Default 1 */
  riskAversion?: number;
  weightBounds?: [number, number];
}

function assertReturnMatrix(input: unknown): asserts input is ReturnMatrix {
  const result = validateReturnMatrix(input);
  if (!result.valid) {
    throw new SchemaError('Return matrix failed validation', result.errors);
  }

  const { assets, rows } = result.data;
  const issues: string[] = [];
  rows.forEach((row, t) => {
    if (row.length !== assets.length) {
      issues.push(`/rows/${t}: expected ${assets.length} values, got ${row.length}`);
    }
    row.forEach((value, j) => {
      if (!Number.isFinite(value)) {
        issues.push(`/rows/${t}/${j}: missing or non-finite return`);
      }
    });
  });
  if (issues.length > 0) {
    throw new SchemaError('Return matrix failed validation', issues);
  }
}

export function clipAndNormalize(weights: readonly number[], bounds: [number, number]): number[] {
  const [lower, upper] = bounds;
  if (!Number.isFinite(lower) || !Number.isFinite(upper) || lower > upper) {
    throw new ContractViolationError(`Invalid weight bounds [${lower}, ${upper}]`);
  }

  const clipped = weights.map((w) => Math.min(Math.max(w, lower), upper));
  const total = sum(clipped);
  if (total === 0) {
    throw new ContractViolationError(
      `Weights clipped into [${lower}, ${upper}] sum to zero and cannot be renormalized`
    );
  }
  return clipped.map((w) => w / total);
}

export function meanVarianceWeights(
  returns: ReturnMatrix,
  options: MeanVarianceOptions = {}
): AssetWeight[] {
  const { riskAversion = 1, weightBounds } = options;
  assertPositive(riskAversion, 'riskAversion');
  assertReturnMatrix(returns);

  const mu = columnMeans(returns.rows);
  const covariance = sampleCovariance(returns.rows);
  const raw = multiplyVector(symmetricPseudoInverse(covariance), mu).map((x) => x / riskAversion);
  const rawTotal = sum(raw);

  let weights: number[];
  if (rawTotal === 0 || !Number.isFinite(rawTotal)) {
    logger.warn(
      { assets: returns.assets.length },
      'Mean-variance solution sums to zero; falling back to equal weights'
    );
    weights = raw.map(() => 1 / raw.length);
  } else {
    weights = raw.map((x) => x / rawTotal);
  }

  if (weightBounds) {
    weights = clipAndNormalize(weights, weightBounds);
  }

  logger.debug({ assets: returns.assets, weights }, 'Mean-variance weights computed');

  return returns.assets.map((asset, i) => ({ asset, weight: weights[i] }));
}
