import {
  DEFAULT_PIPELINE_CONFIG,
  FitCancelledError,
  ForecastConfig,
  InsufficientDataError,
  ModelNotTrainedError
} from '@tradeloop/core';
import { buildTrainingSamples, computeFeatures } from '@tradeloop/indicators';
import { describe, expect, it } from 'vitest';
import { waveBars } from './__tests__/bars';
import { clampChange, directionFor, Forecaster } from './forecaster';
import { regressionMetrics, timeOrderedSplit } from './metrics';
import { DriftDetector } from './drift';
import { MODEL_INPUT_NAMES } from './modelInputs';
import { trainForecaster } from './trainForecaster';

const config: ForecastConfig = {
  ...DEFAULT_PIPELINE_CONFIG.forecast,
  trees: 8,
  maxDepth: 5,
  fitBatchSize: 4
};

const bars = waveBars('WAVE', 130);
const samples = buildTrainingSamples(bars);
const latest = computeFeatures(bars);

describe('Forecaster', () => {
  it('refuses to predict before a fit', () => {
    expect(() => new Forecaster(config).predict(latest)).toThrow(ModelNotTrainedError);
  });

  it('refuses a training set that is too small', async () => {
    await expect(new Forecaster(config).fit(samples.slice(0, 5))).rejects.toBeInstanceOf(
      InsufficientDataError
    );
  });

  it('evaluates on the chronological tail', async () => {
    const forecaster = new Forecaster(config);
    const evaluation = await forecaster.fit(samples);
    // 130 bars give 80 samples; 80% of them train.
    expect(evaluation.trainSamples).toBe(64);
    expect(evaluation.testSamples).toBe(16);
    expect(evaluation.rmse).toBeGreaterThanOrEqual(0);
    expect(evaluation.drift.baseline).toBeNull();
    expect(forecaster.isTrained).toBe(true);
  });

  it('gives identical output for identical input', async () => {
    const forecaster = new Forecaster(config);
    await forecaster.fit(samples);
    const first = forecaster.predict(latest);
    const second = forecaster.predict(latest);
    expect(second).toEqual(first);
    expect(first.confidence).toBeGreaterThanOrEqual(0);
    expect(first.confidence).toBeLessThanOrEqual(1);
    expect(first.predictedPrice).toBeCloseTo(latest.close * (1 + first.predictedChangePct / 100), 9);
    expect(first.direction).toBe(directionFor(first.predictedChangePct));
  });

  it('is reproducible across instances with the same seed', async () => {
    const a = new Forecaster(config);
    const b = new Forecaster(config);
    await a.fit(samples);
    await b.fit(samples);
    expect(b.predict(latest)).toEqual(a.predict(latest));
  });

  it('reports progress after each batch of trees', async () => {
    const progress: Array<[number, number]> = [];
    await new Forecaster({ ...config, trees: 10 }).fit(samples, {
      onProgress: (treesBuilt, trees) => progress.push([treesBuilt, trees])
    });
    expect(progress).toEqual([
      [4, 10],
      [8, 10]
    ]);
  });

  it('keeps serving the previous model when a refit is cancelled', async () => {
    const forecaster = new Forecaster(config);
    await forecaster.fit(samples);
    const before = forecaster.predict(latest);

    const controller = new AbortController();
    controller.abort();
    await expect(
      forecaster.fit(samples.slice(0, 40), { signal: controller.signal })
    ).rejects.toBeInstanceOf(FitCancelledError);
    expect(forecaster.predict(latest)).toEqual(before);
  });

  it('reloads from JSON with the same predictions', async () => {
    const forecaster = new Forecaster(config);
    await forecaster.fit(samples);
    const restored = Forecaster.fromJSON(JSON.parse(JSON.stringify(forecaster)), config);
    expect(restored.predict(latest)).toEqual(forecaster.predict(latest));
    expect(restored.lastEvaluation).toEqual(forecaster.lastEvaluation);
  });

  it('ranks feature importances', async () => {
    const forecaster = new Forecaster(config);
    await forecaster.fit(samples);
    const top = forecaster.featureImportances(3);
    expect(top).toHaveLength(3);
    expect(top[0].importance).toBeGreaterThanOrEqual(top[1].importance);
    expect(MODEL_INPUT_NAMES).toContain(top[0].feature);
  });
});

describe('forecast helpers', () => {
  it('labels direction around one percent', () => {
    expect(directionFor(1.5)).toBe('UP');
    expect(directionFor(-1.01)).toBe('DOWN');
    expect(directionFor(1)).toBe('STABLE');
  });

  it('clips targets to thirty percent', () => {
    expect(clampChange(45)).toBe(30);
    expect(clampChange(-80)).toBe(-30);
    expect(clampChange(2)).toBe(2);
  });

  it('computes rmse and mae', () => {
    const metrics = regressionMetrics([1, 2], [2, 4]);
    expect(metrics.rmse).toBeCloseTo(Math.sqrt(2.5), 12);
    expect(metrics.mae).toBe(1.5);
  });

  it('splits in time order without shuffling', () => {
    const { train, test } = timeOrderedSplit([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], 0.8);
    expect(train).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(test).toEqual([9, 10]);
  });

  it('flags drift against the rolling baseline', () => {
    const detector = new DriftDetector(5, 0.25);
    expect(detector.record(1).drifted).toBe(false);
    expect(detector.record(1.1).drifted).toBe(false);
    const check = detector.record(2);
    expect(check.drifted).toBe(true);
    expect(check.baseline).toBeCloseTo(1.05, 12);
  });
});

describe('trainForecaster', () => {
  it('pools symbols and reports the ones without history', async () => {
    const report = await trainForecaster(new Forecaster(config), [
      { symbol: 'AAA', bars: waveBars('AAA', 100, 50) },
      { symbol: 'BBB', bars: waveBars('BBB', 100, 200) },
      { symbol: 'CCC', bars: waveBars('CCC', 30) }
    ]);
    expect(report.samplesPerSymbol).toEqual({ AAA: 50, BBB: 50 });
    expect(report.samples).toBe(100);
    expect(report.failedSymbols.map((entry) => entry.symbol)).toEqual(['CCC']);
    expect(report.evaluation.trainSamples).toBe(80);
    expect(report.topFeatures.length).toBeLessThanOrEqual(10);
  });
});
