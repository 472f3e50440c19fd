import { emaSeries, ema } from './ema';

export interface MacdResult {
  macd: number | null;
  signal: number | null;
  histogram: number | null;
}

export function macd(
  closes: number[],
  fast = 12,
  slow = 26,
  signalLength = 9
): MacdResult {
  if (closes.length === 0 || slow <= 0 || fast <= 0 || signalLength <= 0) {
    return { macd: null, signal: null, histogram: null };
  }

  const fastSeries = padded(emaSeries(closes, fast), closes.length);
  const slowSeries = padded(emaSeries(closes, slow), closes.length);

  const macdSeries: Array<number | null> = fastSeries.map((fastValue, index) => {
    const slowValue = slowSeries[index];
    if (fastValue === null || slowValue === null) {
      return null;
    }
    return fastValue - slowValue;
  });

  const latestMacd = lastDefined(macdSeries);
  const macdValues = macdSeries.filter((value): value is number => value !== null);
  const signalValue = macdValues.length >= signalLength ? ema(macdValues, signalLength) : null;
  const histogram = latestMacd !== null && signalValue !== null ? latestMacd - signalValue : null;

  return {
    macd: latestMacd,
    signal: signalValue,
    histogram
  };
}

const padded = (series: Array<number | null>, length: number): Array<number | null> =>
  series.length === length ? series : new Array(length).fill(null);

const lastDefined = (values: Array<number | null>): number | null => {
  for (let i = values.length - 1; i >= 0; i -= 1) {
    const value = values[i];
    if (value !== null) {
      return value;
    }
  }
  return null;
};
