/**
 * Environment variable handling with validation
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

export interface EnvConfig {
  analyticsConfigPath: string | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
}

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() ? value.trim() : undefined;
}

function isLogLevel(value: string): value is EnvConfig['logLevel'] {
  return ['debug', 'info', 'warn', 'error', 'silent'].includes(value);
}

function isNodeEnv(value: string): value is EnvConfig['nodeEnv'] {
  return ['development', 'production', 'test'].includes(value);
}

export function loadEnvConfig(): EnvConfig {
  const logLevelRaw = getEnvVar('LOG_LEVEL') || 'info';
  const nodeEnvRaw = getEnvVar('NODE_ENV') || 'development';

  return {
    analyticsConfigPath: getEnvVar('ANALYTICS_CONFIG') ?? null,
    logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : 'info',
    nodeEnv: isNodeEnv(nodeEnvRaw) ? nodeEnvRaw : 'development',
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}

/**
 * Load `.env.local`, then `.env`, from a directory. Variables already set in
 * the process win. Clears the cached snapshot so the next read sees them.
 */
export function loadEnvFiles(dir: string = process.cwd()): void {
  dotenv.config({ path: resolve(dir, '.env.local') });
  dotenv.config({ path: resolve(dir, '.env') });
  resetEnvConfig();
}
