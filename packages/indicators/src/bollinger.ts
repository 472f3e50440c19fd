import { mean, sampleStandardDeviation } from 'simple-statistics';

export interface BollingerBands {
  middle: number;
  upper: number;
  lower: number;
  /** Where the latest value sits inside the band, 0 (lower) to 1 (upper). */
  position: number;
}

export const NEUTRAL_BAND_POSITION = 0.5;

export function bollingerBands(
  values: number[],
  period = 20,
  multiplier = 2
): BollingerBands | null {
  if (period < 2 || values.length < period) {
    return null;
  }

  const window = values.slice(values.length - period);
  const middle = mean(window);
  const deviation = sampleStandardDeviation(window);
  const upper = middle + deviation * multiplier;
  const lower = middle - deviation * multiplier;
  const width = upper - lower;
  const latest = values[values.length - 1];

  const position =
    width > 0 && Number.isFinite(width)
      ? Math.min(Math.max((latest - lower) / width, 0), 1)
      : NEUTRAL_BAND_POSITION;

  return { middle, upper, lower, position };
}
