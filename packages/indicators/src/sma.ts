import { mean } from 'simple-statistics';

/** Mean of the trailing `period` values, or null until enough values exist. */
export function sma(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) {
    return null;
  }
  return mean(values.slice(values.length - period));
}
