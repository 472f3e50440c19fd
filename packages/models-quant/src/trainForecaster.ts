import { Bar, createLogger, describeError, InsufficientDataError } from '@tradeloop/core';
import { buildTrainingSamples, MIN_FEATURE_BARS, TrainingSample } from '@tradeloop/indicators';
import { FeatureImportance, ForecastEvaluation, Forecaster } from './forecaster';

const logger = createLogger('forecaster');

export interface SymbolHistory {
  symbol: string;
  bars: Bar[];
}

export interface TrainingReport {
  symbols: number;
  samples: number;
  samplesPerSymbol: Record<string, number>;
  failedSymbols: Array<{ symbol: string; reason: string }>;
  evaluation: ForecastEvaluation;
  topFeatures: FeatureImportance[];
}

export interface TrainForecasterOptions {
  featureWindow?: number;
  signal?: AbortSignal;
}

/**
 * Pools training samples across symbols and fits `forecaster` on them in date
 * order. Symbols without enough history are reported, not fatal.
 */
export async function trainForecaster(
  forecaster: Forecaster,
  histories: SymbolHistory[],
  options: TrainForecasterOptions = {}
): Promise<TrainingReport> {
  const pooled: TrainingSample[] = [];
  const samplesPerSymbol: Record<string, number> = {};
  const failedSymbols: TrainingReport['failedSymbols'] = [];

  for (const { symbol, bars } of histories) {
    try {
      const samples = buildTrainingSamples(bars, { window: options.featureWindow });
      if (samples.length === 0) {
        throw new InsufficientDataError(symbol, bars.length, MIN_FEATURE_BARS + 1);
      }
      samplesPerSymbol[symbol] = samples.length;
      pooled.push(...samples);
    } catch (error) {
      failedSymbols.push({ symbol, reason: describeError(error) });
      logger.warn('features_insufficient_data', { symbol, bars: bars.length, error });
    }
  }

  const evaluation = await forecaster.fit(pooled, { signal: options.signal });
  return {
    symbols: Object.keys(samplesPerSymbol).length,
    samples: pooled.length,
    samplesPerSymbol,
    failedSymbols,
    evaluation,
    topFeatures: forecaster.featureImportances(10)
  };
}
