/**
 * Deterministic random streams for reproducible synthetic data
 */

import { createHash } from 'crypto';

export function deterministicSeed(label: string, salt: string = ''): number {
  const hash = createHash('sha256').update(`${label}${salt}`).digest('hex');
  // Use first 8 hex characters as a number
  return parseInt(hash.substring(0, 8), 16);
}

export interface RandomStream {
  /** Uniform in [0, 1) */
  next(): number;
  uniform(min: number, max: number): number;
  normal(mean: number, sd: number): number;
}

// Mulberry32
export function createRandomStream(seed: number): RandomStream {
  let state = seed | 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    uniform: (min, max) => min + (max - min) * next(),
    normal: (mean, sd) => {
      // Box-Muller; 1 - u keeps the log argument in (0, 1]
      const u1 = 1 - next();
      const u2 = next();
      return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    },
  };
}
