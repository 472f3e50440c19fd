export function momentum(values: number[], lookback: number): number | null {
	if (lookback <= 0 || values.length <= lookback) {
		return null;
	}
	return values[values.length - 1] - values[values.length - 1 - lookback];
}

/** Percent change from `previous` to `current`; 0 when `previous` is 0. */
export function percentChange(current: number, previous: number): number {
	if (previous === 0 || !Number.isFinite(previous)) {
		return 0;
	}
	return ((current - previous) / previous) * 100;
}
