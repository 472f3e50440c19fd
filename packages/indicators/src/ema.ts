export function ema(values: number[], length: number): number | null {
  const series = emaSeries(values, length);
  return series.length ? series[series.length - 1] ?? null : null;
}

/**
 * EMA seeded with the simple average of the first `length` values. Entries
 * before the seed are null so indexes line up with the input.
 */
export function emaSeries(values: number[], length: number): Array<number | null> {
  const series: Array<number | null> = new Array(values.length).fill(null);

  if (length <= 0 || values.length < length) {
    return values.length < length ? [] : series;
  }

  const multiplier = 2 / (length + 1);
  let emaValue = average(values.slice(0, length));
  series[length - 1] = emaValue;

  for (let i = length; i < values.length; i += 1) {
    emaValue = (values[i] - emaValue) * multiplier + emaValue;
    series[i] = emaValue;
  }

  return series;
}

const average = (nums: number[]): number => {
  const sum = nums.reduce((acc, value) => acc + value, 0);
  return sum / nums.length;
};
