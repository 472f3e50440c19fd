export interface RegressionMetrics {
  rmse: number;
  mae: number;
  samples: number;
}

export function regressionMetrics(actual: number[], predicted: number[]): RegressionMetrics {
  if (actual.length !== predicted.length) {
    throw new Error(`Length mismatch: ${actual.length} actual vs ${predicted.length} predicted`);
  }
  if (actual.length === 0) {
    return { rmse: 0, mae: 0, samples: 0 };
  }
  let squared = 0;
  let absolute = 0;
  for (let i = 0; i < actual.length; i += 1) {
    const error = predicted[i] - actual[i];
    squared += error * error;
    absolute += Math.abs(error);
  }
  return {
    rmse: Math.sqrt(squared / actual.length),
    mae: absolute / actual.length,
    samples: actual.length
  };
}

/**
 * Chronological split: the first `trainRatio` share trains, the remainder is
 * held out. Input order is preserved on both sides.
 */
export function timeOrderedSplit<T>(items: T[], trainRatio: number): { train: T[]; test: T[] } {
  if (trainRatio <= 0 || trainRatio >= 1) {
    throw new Error(`trainRatio must be within (0, 1), received ${trainRatio}`);
  }
  const cut = Math.floor(items.length * trainRatio);
  return { train: items.slice(0, cut), test: items.slice(cut) };
}
