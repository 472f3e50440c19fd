import { FitCancelledError } from '@tradeloop/core';
import { z } from 'zod';
import {
  buildTree,
  GiniCriterion,
  predictTree,
  SplitCriterion,
  SquaredErrorCriterion,
  TreeNode
} from './decisionTree';
import { bootstrapIndices, createRng } from './random';

export interface ForestOptions {
  trees: number;
  maxDepth: number;
  minSamplesLeaf: number;
  minSamplesSplit: number;
  /** Fraction of features tried per split; null means all of them. */
  maxFeatures: number | null;
  seed: number;
}

export interface FitControl {
  /** Trees built between yields to the event loop. */
  batchSize?: number;
  signal?: AbortSignal;
  onBatch?: (treesBuilt: number) => void;
}

const treeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    z.object({
      kind: z.literal('leaf'),
      value: z.array(z.number()),
      samples: z.number()
    }),
    z.object({
      kind: z.literal('split'),
      feature: z.number().int().min(0),
      threshold: z.number(),
      samples: z.number(),
      left: treeNodeSchema,
      right: treeNodeSchema
    })
  ])
);

const forestOptionsSchema = z.object({
  trees: z.number().int().min(1),
  maxDepth: z.number().int().min(1),
  minSamplesLeaf: z.number().int().min(1),
  minSamplesSplit: z.number().int().min(2),
  maxFeatures: z.number().nullable(),
  seed: z.number().int()
});

export const forestStateSchema = z.object({
  options: forestOptionsSchema,
  featureCount: z.number().int().min(0),
  outputSize: z.number().int().min(1),
  trees: z.array(treeNodeSchema),
  importances: z.array(z.number())
});

export type ForestState = z.infer<typeof forestStateSchema>;

const yieldToEventLoop = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

/**
 * Bootstrap-aggregated CART ensemble. Each tree draws its own seed from the
 * forest seed, so a fit is reproducible regardless of batching.
 */
abstract class BaggedForest {
  protected trees: TreeNode[] = [];
  protected importances: number[] = [];
  protected featureCount = 0;

  constructor(readonly options: ForestOptions) {}

  get isFitted(): boolean {
    return this.trees.length > 0;
  }

  get treeCount(): number {
    return this.trees.length;
  }

  protected abstract get outputSize(): number;

  /** Mean impurity decrease per feature, normalised to sum to 1. */
  featureImportances(): number[] {
    const total = this.importances.reduce((acc, value) => acc + value, 0);
    return this.importances.map((value) => (total > 0 ? value / total : 0));
  }

  toJSON(): ForestState {
    return {
      options: { ...this.options },
      featureCount: this.featureCount,
      outputSize: this.outputSize,
      trees: this.trees,
      importances: [...this.importances]
    };
  }

  protected restore(state: ForestState): void {
    this.trees = state.trees;
    this.importances = [...state.importances];
    this.featureCount = state.featureCount;
  }

  protected fitSync(rows: number[][], criterion: SplitCriterion): void {
    const plan = this.plan(rows);
    const trees: TreeNode[] = [];
    const importances = new Array<number>(plan.featureCount).fill(0);
    for (const treeSeed of plan.seeds) {
      trees.push(this.growOne(rows, criterion, treeSeed, importances));
    }
    this.commit(trees, importances, plan.featureCount);
  }

  protected async fitBatched(
    rows: number[][],
    criterion: SplitCriterion,
    control: FitControl
  ): Promise<void> {
    const plan = this.plan(rows);
    const batchSize = Math.max(control.batchSize ?? 10, 1);
    const trees: TreeNode[] = [];
    const importances = new Array<number>(plan.featureCount).fill(0);

    for (let i = 0; i < plan.seeds.length; i += 1) {
      if (i > 0 && i % batchSize === 0) {
        control.onBatch?.(trees.length);
        await yieldToEventLoop();
        if (control.signal?.aborted) {
          throw new FitCancelledError(trees.length);
        }
      }
      trees.push(this.growOne(rows, criterion, plan.seeds[i], importances));
    }
    if (control.signal?.aborted) {
      throw new FitCancelledError(trees.length);
    }
    this.commit(trees, importances, plan.featureCount);
  }

  protected predictAll(row: number[]): number[][] {
    return this.trees.map((tree) => predictTree(tree, row));
  }

  private plan(rows: number[][]): { seeds: number[]; featureCount: number } {
    if (rows.length === 0) {
      throw new Error('Cannot fit a forest on an empty training set');
    }
    const master = createRng(this.options.seed);
    const seeds = Array.from({ length: this.options.trees }, () =>
      Math.floor(master() * 2 ** 31)
    );
    return { seeds, featureCount: rows[0].length };
  }

  private growOne(
    rows: number[][],
    criterion: SplitCriterion,
    treeSeed: number,
    importances: number[]
  ): TreeNode {
    const rng = createRng(treeSeed);
    const sample = bootstrapIndices(rows.length, rng);
    const featureCount = rows[0].length;
    const built = buildTree(rows, sample, criterion, {
      maxDepth: this.options.maxDepth,
      minSamplesLeaf: this.options.minSamplesLeaf,
      minSamplesSplit: this.options.minSamplesSplit,
      maxFeatures:
        this.options.maxFeatures === null
          ? featureCount
          : Math.max(1, Math.round(this.options.maxFeatures * featureCount)),
      rng
    });
    built.importances.forEach((value, index) => {
      importances[index] += value / this.options.trees;
    });
    return built.root;
  }

  private commit(trees: TreeNode[], importances: number[], featureCount: number): void {
    this.trees = trees;
    this.importances = importances;
    this.featureCount = featureCount;
  }
}

export class RandomForestRegressor extends BaggedForest {
  protected get outputSize(): number {
    return 1;
  }

  fit(rows: number[][], targets: number[]): this {
    this.fitSync(rows, new SquaredErrorCriterion(targets));
    return this;
  }

  async fitAsync(rows: number[][], targets: number[], control: FitControl = {}): Promise<this> {
    await this.fitBatched(rows, new SquaredErrorCriterion(targets), control);
    return this;
  }

  /** One point prediction per tree, in tree order. */
  predictEach(row: number[]): number[] {
    return this.predictAll(row).map((value) => value[0] ?? 0);
  }

  predict(row: number[]): number {
    const values = this.predictEach(row);
    return values.length ? values.reduce((acc, v) => acc + v, 0) / values.length : 0;
  }

  static fromJSON(raw: unknown): RandomForestRegressor {
    const state = forestStateSchema.parse(raw);
    const forest = new RandomForestRegressor(state.options);
    forest.restore(state);
    return forest;
  }
}

export class RandomForestClassifier extends BaggedForest {
  constructor(options: ForestOptions, readonly classCount: number) {
    super(options);
  }

  protected get outputSize(): number {
    return this.classCount;
  }

  fit(rows: number[][], labels: number[]): this {
    this.fitSync(rows, new GiniCriterion(labels, this.classCount));
    return this;
  }

  async fitAsync(rows: number[][], labels: number[], control: FitControl = {}): Promise<this> {
    await this.fitBatched(rows, new GiniCriterion(labels, this.classCount), control);
    return this;
  }

  /** Class probabilities averaged over the trees. */
  predictProba(row: number[]): number[] {
    const proba = new Array<number>(this.classCount).fill(0);
    const outputs = this.predictAll(row);
    for (const distribution of outputs) {
      distribution.forEach((p, index) => {
        proba[index] += p / outputs.length;
      });
    }
    return proba;
  }

  predict(row: number[]): number {
    const proba = this.predictProba(row);
    let best = 0;
    for (let i = 1; i < proba.length; i += 1) {
      if (proba[i] > proba[best]) {
        best = i;
      }
    }
    return best;
  }

  static fromJSON(raw: unknown): RandomForestClassifier {
    const state = forestStateSchema.parse(raw);
    const forest = new RandomForestClassifier(state.options, state.outputSize);
    forest.restore(state);
    return forest;
  }
}
