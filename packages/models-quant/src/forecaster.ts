import {
  createLogger,
  FeatureVector,
  FitCancelledError,
  ForecastConfig,
  InsufficientDataError,
  ModelNotTrainedError,
  PriceDirection
} from '@tradeloop/core';
import { TrainingSample } from '@tradeloop/indicators';
import { mean, standardDeviation } from 'simple-statistics';
import { z } from 'zod';
import { DriftCheck, DriftDetector } from './drift';
import { regressionMetrics, timeOrderedSplit } from './metrics';
import { MODEL_INPUT_NAMES, ModelInputName, toModelInputs } from './modelInputs';
import { forestStateSchema, RandomForestRegressor } from './randomForest';

const logger = createLogger('forecaster');

export const MAX_TARGET_CHANGE_PCT = 30;
export const DIRECTION_THRESHOLD_PCT = 1;
export const MIN_TRAINING_SAMPLES = 10;

export interface ForecastOutput {
  currentPrice: number;
  predictedPrice: number;
  predictedChangePct: number;
  confidence: number;
  direction: PriceDirection;
}

export interface ForecastEvaluation {
  /** Next-close error in price units over the held-out slice. */
  rmse: number;
  mae: number;
  /** Error of the predicted % change; this one feeds drift detection. */
  changeRmse: number;
  trainSamples: number;
  testSamples: number;
  drift: DriftCheck;
  trainedAt: string;
}

export interface FeatureImportance {
  feature: ModelInputName;
  importance: number;
}

export interface ForecasterFitOptions {
  signal?: AbortSignal;
  /** Called after each batch of trees, before yielding. */
  onProgress?: (treesBuilt: number, trees: number) => void;
}

const evaluationSchema = z.object({
  rmse: z.number(),
  mae: z.number(),
  changeRmse: z.number(),
  trainSamples: z.number(),
  testSamples: z.number(),
  drift: z.object({
    drifted: z.boolean(),
    rmse: z.number(),
    baseline: z.number().nullable()
  }),
  trainedAt: z.string()
});

const forecasterStateSchema = z.object({
  kind: z.literal('forecaster'),
  inputs: z.array(z.string()),
  forest: forestStateSchema,
  evaluation: evaluationSchema.nullable()
});

export type ForecasterState = z.infer<typeof forecasterStateSchema>;

export const clampChange = (pct: number): number =>
  Math.min(Math.max(pct, -MAX_TARGET_CHANGE_PCT), MAX_TARGET_CHANGE_PCT);

export const directionFor = (changePct: number): PriceDirection => {
  if (changePct > DIRECTION_THRESHOLD_PCT) {
    return 'UP';
  }
  if (changePct < -DIRECTION_THRESHOLD_PCT) {
    return 'DOWN';
  }
  return 'STABLE';
};

export const targetChangePct = (sample: TrainingSample): number =>
  sample.features.close !== 0
    ? clampChange(((sample.nextClose - sample.features.close) / sample.features.close) * 100)
    : 0;

/**
 * Next-step price forecaster over a bagged regression-tree ensemble. The
 * served forest is replaced only once a new fit has fully completed.
 */
export class Forecaster {
  private forest: RandomForestRegressor | null = null;
  private evaluation: ForecastEvaluation | null = null;
  private readonly drift: DriftDetector;

  constructor(private readonly config: ForecastConfig) {
    this.drift = new DriftDetector(config.driftWindow, config.driftTolerance);
  }

  get isTrained(): boolean {
    return this.forest !== null;
  }

  get lastEvaluation(): ForecastEvaluation | null {
    return this.evaluation;
  }

  async fit(samples: TrainingSample[], options: ForecasterFitOptions = {}): Promise<ForecastEvaluation> {
    if (samples.length < MIN_TRAINING_SAMPLES) {
      throw new InsufficientDataError('training set', samples.length, MIN_TRAINING_SAMPLES);
    }

    const ordered = [...samples]
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
      .slice(-this.config.maxTrainingSamples);
    const { train, test } = timeOrderedSplit(ordered, this.config.trainRatio);
    const forest = new RandomForestRegressor({
      trees: this.config.trees,
      maxDepth: this.config.maxDepth,
      minSamplesLeaf: this.config.minSamplesLeaf,
      minSamplesSplit: this.config.minSamplesSplit,
      maxFeatures: this.config.maxFeatures,
      seed: this.config.seed
    });

    logger.info('model_fit_started', {
      samples: ordered.length,
      trainSamples: train.length,
      testSamples: test.length,
      trees: this.config.trees
    });

    try {
      await forest.fitAsync(
        train.map((sample) => toModelInputs(sample.features)),
        train.map(targetChangePct),
        {
          batchSize: this.config.fitBatchSize,
          signal: options.signal,
          onBatch: (treesBuilt) => {
            logger.debug('model_fit_progress', { treesBuilt, trees: this.config.trees });
            options.onProgress?.(treesBuilt, this.config.trees);
          }
        }
      );
    } catch (error) {
      if (error instanceof FitCancelledError) {
        logger.warn('model_fit_cancelled', { treesBuilt: error.details.treesBuilt });
      }
      throw error;
    }

    const predictedChanges = test.map((sample) => forest.predict(toModelInputs(sample.features)));
    const priceMetrics = regressionMetrics(
      test.map((sample) => sample.nextClose),
      test.map((sample, i) => sample.features.close * (1 + predictedChanges[i] / 100))
    );
    const changeMetrics = regressionMetrics(test.map(targetChangePct), predictedChanges);
    const drift = this.drift.record(changeMetrics.rmse);

    const evaluation: ForecastEvaluation = {
      rmse: priceMetrics.rmse,
      mae: priceMetrics.mae,
      changeRmse: changeMetrics.rmse,
      trainSamples: train.length,
      testSamples: test.length,
      drift,
      trainedAt: new Date().toISOString()
    };

    if (drift.drifted) {
      logger.warn('model_drift_detected', {
        changeRmse: drift.rmse,
        baseline: drift.baseline,
        tolerance: this.config.driftTolerance
      });
    }

    this.forest = forest;
    this.evaluation = evaluation;
    logger.info('model_fit_completed', {
      rmse: evaluation.rmse,
      mae: evaluation.mae,
      changeRmse: evaluation.changeRmse,
      trainSamples: evaluation.trainSamples,
      testSamples: evaluation.testSamples
    });
    return evaluation;
  }

  predict(features: FeatureVector): ForecastOutput {
    const forest = this.requireForest();
    const close = features.close;
    const changes = forest.predictEach(toModelInputs(features));
    const predictedChangePct = mean(changes);
    const treePrices = changes.map((pct) => close * (1 + pct / 100));
    const spread = treePrices.length > 1 ? standardDeviation(treePrices) : 0;
    const confidence = close > 0 ? Math.min(Math.max(1 - spread / close, 0), 1) : 0;

    return {
      currentPrice: close,
      predictedPrice: close * (1 + predictedChangePct / 100),
      predictedChangePct,
      confidence,
      direction: directionFor(predictedChangePct)
    };
  }

  featureImportances(top = 10): FeatureImportance[] {
    const importances = this.requireForest().featureImportances();
    return MODEL_INPUT_NAMES.map((feature, index) => ({
      feature,
      importance: importances[index] ?? 0
    }))
      .sort((a, b) => b.importance - a.importance)
      .slice(0, top);
  }

  toJSON(): ForecasterState {
    return {
      kind: 'forecaster',
      inputs: [...MODEL_INPUT_NAMES],
      forest: this.requireForest().toJSON(),
      evaluation: this.evaluation
    };
  }

  static fromJSON(raw: unknown, config: ForecastConfig): Forecaster {
    const state = forecasterStateSchema.parse(raw);
    if (state.inputs.join(',') !== MODEL_INPUT_NAMES.join(',')) {
      throw new Error('Saved forecaster was trained on a different input layout');
    }
    const forecaster = new Forecaster(config);
    forecaster.forest = RandomForestRegressor.fromJSON(state.forest);
    forecaster.evaluation = state.evaluation;
    return forecaster;
  }

  private requireForest(): RandomForestRegressor {
    if (!this.forest) {
      throw new ModelNotTrainedError('forecaster');
    }
    return this.forest;
  }
}
