import { createRng, Rng, shuffleInPlace } from './random';

export type TreeNode =
  | { kind: 'leaf'; value: number[]; samples: number }
  | {
      kind: 'split';
      feature: number;
      threshold: number;
      samples: number;
      left: TreeNode;
      right: TreeNode;
    };

/**
 * Running impurity over a set of sample indexes. `impurity()` is the total
 * (not per-sample) impurity so that child sums compare directly to the parent.
 */
export interface ImpurityAccumulator {
  readonly count: number;
  add(index: number): void;
  remove(index: number): void;
  impurity(): number;
}

export interface SplitCriterion {
  createAccumulator(): ImpurityAccumulator;
  leafValue(indices: number[]): number[];
}

export class SquaredErrorCriterion implements SplitCriterion {
  constructor(private readonly targets: number[]) {}

  createAccumulator(): ImpurityAccumulator {
    const targets = this.targets;
    let count = 0;
    let sum = 0;
    let sumSq = 0;
    return {
      get count() {
        return count;
      },
      add(index) {
        const y = targets[index];
        count += 1;
        sum += y;
        sumSq += y * y;
      },
      remove(index) {
        const y = targets[index];
        count -= 1;
        sum -= y;
        sumSq -= y * y;
      },
      impurity() {
        return count === 0 ? 0 : Math.max(sumSq - (sum * sum) / count, 0);
      }
    };
  }

  leafValue(indices: number[]): number[] {
    let sum = 0;
    for (const index of indices) {
      sum += this.targets[index];
    }
    return [indices.length ? sum / indices.length : 0];
  }
}

export class GiniCriterion implements SplitCriterion {
  constructor(private readonly labels: number[], private readonly classCount: number) {}

  createAccumulator(): ImpurityAccumulator {
    const labels = this.labels;
    const counts = new Array<number>(this.classCount).fill(0);
    let count = 0;
    return {
      get count() {
        return count;
      },
      add(index) {
        counts[labels[index]] += 1;
        count += 1;
      },
      remove(index) {
        counts[labels[index]] -= 1;
        count -= 1;
      },
      impurity() {
        if (count === 0) {
          return 0;
        }
        let sumSq = 0;
        for (const c of counts) {
          sumSq += c * c;
        }
        return count - sumSq / count;
      }
    };
  }

  leafValue(indices: number[]): number[] {
    const counts = new Array<number>(this.classCount).fill(0);
    for (const index of indices) {
      counts[this.labels[index]] += 1;
    }
    return counts.map((c) => (indices.length ? c / indices.length : 0));
  }
}

export interface TreeOptions {
  maxDepth: number;
  minSamplesLeaf: number;
  minSamplesSplit: number;
  /** Features considered per split; all of them when omitted. */
  maxFeatures?: number;
  seed?: number;
  rng?: Rng;
}

export interface BuiltTree {
  root: TreeNode;
  /** Total impurity decrease attributed to each feature. */
  importances: number[];
}

interface SplitCandidate {
  feature: number;
  threshold: number;
  gain: number;
  left: number[];
  right: number[];
}

/** CART: greedy binary splits minimising the criterion's impurity. */
export function buildTree(
  rows: number[][],
  indices: number[],
  criterion: SplitCriterion,
  options: TreeOptions
): BuiltTree {
  const featureCount = rows.length ? rows[0].length : 0;
  const maxFeatures = Math.min(
    Math.max(options.maxFeatures ?? featureCount, 1),
    featureCount
  );
  const rng = options.rng ?? createRng(options.seed ?? 0);
  const importances = new Array<number>(featureCount).fill(0);
  const minLeaf = Math.max(options.minSamplesLeaf, 1);

  const impurityOf = (subset: number[]): number => {
    const acc = criterion.createAccumulator();
    for (const index of subset) {
      acc.add(index);
    }
    return acc.impurity();
  };

  const findSplit = (subset: number[], parentImpurity: number): SplitCandidate | null => {
    const features = shuffleInPlace(
      Array.from({ length: featureCount }, (_, i) => i),
      rng
    );
    let best: SplitCandidate | null = null;

    // Past maxFeatures, keep looking only until some valid split exists.
    for (let inspected = 0; inspected < features.length; inspected += 1) {
      if (inspected >= maxFeatures && best !== null) {
        break;
      }
      const feature = features[inspected];
      const sorted = [...subset].sort((a, b) => rows[a][feature] - rows[b][feature]);
      const left = criterion.createAccumulator();
      const right = criterion.createAccumulator();
      for (const index of sorted) {
        right.add(index);
      }

      for (let i = 0; i < sorted.length - 1; i += 1) {
        left.add(sorted[i]);
        right.remove(sorted[i]);
        const current = rows[sorted[i]][feature];
        const next = rows[sorted[i + 1]][feature];
        if (current === next || left.count < minLeaf || right.count < minLeaf) {
          continue;
        }
        const gain = parentImpurity - (left.impurity() + right.impurity());
        if (gain > 1e-12 && (best === null || gain > best.gain)) {
          best = {
            feature,
            threshold: (current + next) / 2,
            gain,
            left: sorted.slice(0, i + 1),
            right: sorted.slice(i + 1)
          };
        }
      }
    }
    return best;
  };

  const grow = (subset: number[], depth: number): TreeNode => {
    const leaf: TreeNode = {
      kind: 'leaf',
      value: criterion.leafValue(subset),
      samples: subset.length
    };
    if (
      depth >= options.maxDepth ||
      subset.length < options.minSamplesSplit ||
      subset.length < minLeaf * 2
    ) {
      return leaf;
    }
    const parentImpurity = impurityOf(subset);
    if (parentImpurity <= 1e-12) {
      return leaf;
    }
    const split = findSplit(subset, parentImpurity);
    if (!split) {
      return leaf;
    }
    importances[split.feature] += split.gain;
    return {
      kind: 'split',
      feature: split.feature,
      threshold: split.threshold,
      samples: subset.length,
      left: grow(split.left, depth + 1),
      right: grow(split.right, depth + 1)
    };
  };

  return { root: grow(indices, 0), importances };
}

export function predictTree(node: TreeNode, row: number[]): number[] {
  let current = node;
  while (current.kind === 'split') {
    current = row[current.feature] <= current.threshold ? current.left : current.right;
  }
  return current.value;
}
