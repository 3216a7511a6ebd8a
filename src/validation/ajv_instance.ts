/**
 * Ajv validation instance with schema validators
 * Every caller-supplied table passes through one of these before computation.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import type { ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { ObservationPanel, ReturnMatrix } from '@/types/analytics';
import type { AnalyticsConfigJson } from '@/core/config';

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// date and date-time formats for panel dates
addFormats(ajv);

let panelValidator: ValidateFunction<ObservationPanel> | null = null;
let returnMatrixValidator: ValidateFunction<ReturnMatrix> | null = null;
let configValidator: ValidateFunction<AnalyticsConfigJson> | null = null;

export function getObservationPanelValidator(): ValidateFunction<ObservationPanel> {
  if (!panelValidator) {
    panelValidator = ajv.compile<ObservationPanel>(loadSchema('observation_panel.v1'));
  }
  return panelValidator;
}

export function getReturnMatrixValidator(): ValidateFunction<ReturnMatrix> {
  if (!returnMatrixValidator) {
    returnMatrixValidator = ajv.compile<ReturnMatrix>(loadSchema('return_matrix.v1'));
  }
  return returnMatrixValidator;
}

export function getAnalyticsConfigValidator(): ValidateFunction<AnalyticsConfigJson> {
  if (!configValidator) {
    configValidator = ajv.compile<AnalyticsConfigJson>(loadSchema('analytics_config.v1'));
  }
  return configValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  return { valid: false, data: null, errors: formatErrors(validate.errors) };
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return errors?.map((e) => `${e.instancePath || 'root'}: ${e.message}`) ?? [
    'Unknown validation error',
  ];
}

export function validateObservationPanel(data: unknown): ValidationResult<ObservationPanel> {
  return runValidator(getObservationPanelValidator(), data);
}

export function validateReturnMatrix(data: unknown): ValidationResult<ReturnMatrix> {
  return runValidator(getReturnMatrixValidator(), data);
}

export function validateAnalyticsConfig(data: unknown): ValidationResult<AnalyticsConfigJson> {
  return runValidator(getAnalyticsConfigValidator(), data);
}
