import { FeatureVector } from '@tradeloop/core';
import { percentChange } from '@tradeloop/indicators';

export const MODEL_INPUT_NAMES = [
  'close_vs_ma5_pct',
  'close_vs_ma10_pct',
  'close_vs_ma20_pct',
  'close_vs_ma50_pct',
  'ma5_vs_ma20_pct',
  'momentum5_pct',
  'momentum10_pct',
  'return_1_pct',
  'return_2_pct',
  'return_3_pct',
  'return_4_pct',
  'return_5_pct',
  'macd_pct',
  'macd_signal_pct',
  'macd_histogram_pct',
  'rsi',
  'bb_position',
  'range_pct',
  'open_close_pct',
  'volume_delta'
] as const;

export type ModelInputName = (typeof MODEL_INPUT_NAMES)[number];

const ofPrice = (value: number, price: number): number =>
  price !== 0 ? (value / price) * 100 : 0;

/**
 * Price-free view of a feature vector, so one model serves symbols at any
 * price level. Order matches MODEL_INPUT_NAMES.
 */
export function toModelInputs(features: FeatureVector): number[] {
  const { close, lagCloses } = features;
  const [lag1, lag2, lag3, lag4, lag5] = lagCloses;
  return [
    percentChange(close, features.ma5),
    percentChange(close, features.ma10),
    percentChange(close, features.ma20),
    percentChange(close, features.ma50),
    percentChange(features.ma5, features.ma20),
    percentChange(close, close - features.momentum5),
    percentChange(close, close - features.momentum10),
    percentChange(close, lag1),
    percentChange(lag1, lag2),
    percentChange(lag2, lag3),
    percentChange(lag3, lag4),
    percentChange(lag4, lag5),
    ofPrice(features.macd, close),
    ofPrice(features.macdSignal, close),
    ofPrice(features.macdHistogram, close),
    features.rsi,
    features.bbPosition,
    ofPrice(features.high - features.low, close),
    percentChange(close, features.open),
    features.volumeDelta
  ].map((value) => (Number.isFinite(value) ? value : 0));
}
