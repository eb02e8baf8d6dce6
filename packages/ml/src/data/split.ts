import * as ss from 'simple-statistics';
import { MLError, MLErrorCode } from '@creditops/types';

export interface SplitOptions {
  testFraction?: number;
  seed?: number;
}

export interface DataSplit<T> {
  train: T[];
  test: T[];
}

/**
 * Deterministic PRNG (mulberry32) so a seed always yields the same split
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function trainTestSplit<T>(rows: readonly T[], options: SplitOptions = {}): DataSplit<T> {
  const testFraction = options.testFraction ?? 0.25;
  const seed = options.seed ?? 42;

  if (!(testFraction > 0 && testFraction < 1)) {
    throw new MLError(MLErrorCode.DATA_LOAD_FAILED, `testFraction must be in (0, 1), got ${testFraction}`);
  }
  if (rows.length < 2) {
    throw new MLError(MLErrorCode.DATA_LOAD_FAILED, 'At least two rows are needed to split a dataset');
  }

  const shuffled = ss.shuffle([...rows], seededRandom(seed));
  const testSize = Math.min(rows.length - 1, Math.max(1, Math.round(rows.length * testFraction)));

  return {
    test: shuffled.slice(0, testSize),
    train: shuffled.slice(testSize),
  };
}
