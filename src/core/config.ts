/**
 * Analytics configuration loaded from JSON files
 *
 * Library functions never read this implicitly; callers turn it into the
 * parameter structs each function takes.
 */

import { readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { getEnvConfig } from './env';
import { SchemaError } from './errors';
import { validateAnalyticsConfig } from '@/validation/ajv_instance';
import type { InsufficientDatePolicy } from '@/types/analytics';

export interface AnalyticsConfigJson {
  backtest: {
    bucket_count: number;
    insufficient_dates: InsufficientDatePolicy;
  };
  performance: {
    periods_per_year: number;
    risk_free_rate: number;
    var_confidence: number;
  };
  transaction_costs: {
    sqrt_impact: { k: number; daily_vol: number };
    almgren_chriss: { permanent_cost_per_share: number; eta: number; time_horizon: number };
  };
  optimizer: {
    risk_aversion: number;
    weight_bounds?: [number, number];
  };
}

export interface BacktestDefaults {
  bucketCount: number;
  onInsufficientDate: InsufficientDatePolicy;
}

export interface PerformanceDefaults {
  periodsPerYear: number;
  riskFreeRate: number;
  confidenceLevel: number;
}

export interface CostModelDefaults {
  sqrtImpact: { k: number; dailyVol: number };
  almgrenChriss: { permanentCostPerShare: number; eta: number; timeHorizon: number };
}

export interface OptimizerDefaults {
  riskAversion: number;
  weightBounds?: [number, number];
}

export interface AppConfig {
  backtest: BacktestDefaults;
  performance: PerformanceDefaults;
  costs: CostModelDefaults;
  optimizer: OptimizerDefaults;
  configPath: string;
}

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(projectRoot: string): string {
  const envPath = getEnvConfig().analyticsConfigPath;
  if (!envPath) {
    return join(projectRoot, 'config', 'analytics.json');
  }
  return isAbsolute(envPath) ? envPath : join(projectRoot, envPath);
}

function toAppConfig(raw: AnalyticsConfigJson, configPath: string): AppConfig {
  const { backtest, performance, transaction_costs: costs, optimizer } = raw;

  if (optimizer.weight_bounds && optimizer.weight_bounds[0] > optimizer.weight_bounds[1]) {
    throw new SchemaError(`Invalid analytics config at ${configPath}`, [
      '/optimizer/weight_bounds: lower bound exceeds upper bound',
    ]);
  }

  return {
    backtest: {
      bucketCount: backtest.bucket_count,
      onInsufficientDate: backtest.insufficient_dates,
    },
    performance: {
      periodsPerYear: performance.periods_per_year,
      riskFreeRate: performance.risk_free_rate,
      confidenceLevel: performance.var_confidence,
    },
    costs: {
      sqrtImpact: { k: costs.sqrt_impact.k, dailyVol: costs.sqrt_impact.daily_vol },
      almgrenChriss: {
        permanentCostPerShare: costs.almgren_chriss.permanent_cost_per_share,
        eta: costs.almgren_chriss.eta,
        timeHorizon: costs.almgren_chriss.time_horizon,
      },
    },
    optimizer: {
      riskAversion: optimizer.risk_aversion,
      weightBounds: optimizer.weight_bounds,
    },
    configPath,
  };
}

export function loadConfig(): AppConfig {
  const configPath = resolveConfigPath(process.cwd());
  const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));

  const result = validateAnalyticsConfig(parsed);
  if (!result.valid) {
    throw new SchemaError(`Invalid analytics config at ${configPath}`, result.errors);
  }

  return toAppConfig(result.data, configPath);
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
