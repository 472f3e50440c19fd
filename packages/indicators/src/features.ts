import {
	Bar,
	FeatureVector,
	IndicatorSnapshot,
	InsufficientDataError,
} from "@tradeloop/core";
import { bollingerBands, NEUTRAL_BAND_POSITION } from "./bollinger";
import { macd } from "./macd";
import { momentum } from "./momentum";
import { latestRsi, NEUTRAL_RSI } from "./rsi";
import { sma } from "./sma";

export const MIN_FEATURE_BARS = 50;
export const DEFAULT_FEATURE_WINDOW = 120;

export interface FeatureOptions {
	/** Trailing bars the indicators are computed over. */
	window?: number;
	minBars?: number;
}

export interface TrainingSample {
	symbol: string;
	date: string;
	features: FeatureVector;
	nextClose: number;
}

const resolveWindow = (options: FeatureOptions): number =>
	Math.max(options.window ?? DEFAULT_FEATURE_WINDOW, MIN_FEATURE_BARS);

export const assertAscending = (bars: Bar[]): void => {
	for (let i = 1; i < bars.length; i += 1) {
		if (bars[i].date < bars[i - 1].date) {
			throw new Error(
				`Bars for ${bars[i].symbol} are not in ascending date order at ${bars[i].date}`
			);
		}
	}
};

/**
 * Features for the latest bar in `bars`. Only the bars passed in are read, so
 * callers control the evaluation date by slicing.
 */
export function computeFeatures(
	bars: Bar[],
	options: FeatureOptions = {}
): FeatureVector {
	const minBars = Math.max(options.minBars ?? MIN_FEATURE_BARS, MIN_FEATURE_BARS);
	const symbol = bars[bars.length - 1]?.symbol ?? "UNKNOWN";
	if (bars.length < minBars) {
		throw new InsufficientDataError(symbol, bars.length, minBars);
	}

	const window = bars.slice(-resolveWindow(options));
	const closes = window.map((bar) => bar.close);
	const latest = window[window.length - 1];
	const previous = window[window.length - 2];

	const macdResult = macd(closes, 12, 26, 9);
	const bands = bollingerBands(closes, 20, 2);
	const close = latest.close;
	const lag = (offset: number): number => closes[closes.length - 1 - offset];

	return {
		symbol: latest.symbol,
		date: latest.date,
		close,
		open: latest.open,
		high: latest.high,
		low: latest.low,
		rsi: latestRsi(closes, 14) ?? NEUTRAL_RSI,
		macd: macdResult.macd ?? 0,
		macdSignal: macdResult.signal ?? 0,
		macdHistogram: macdResult.histogram ?? 0,
		bbPosition: bands?.position ?? NEUTRAL_BAND_POSITION,
		ma5: sma(closes, 5) ?? close,
		ma10: sma(closes, 10) ?? close,
		ma20: sma(closes, 20) ?? close,
		ma50: sma(closes, 50) ?? close,
		momentum5: momentum(closes, 5) ?? 0,
		momentum10: momentum(closes, 10) ?? 0,
		lagCloses: [lag(1), lag(2), lag(3), lag(4), lag(5)],
		volumeDelta:
			previous.volume > 0
				? (latest.volume - previous.volume) / previous.volume
				: 0,
	};
}

/** Features as of `bars[index]`, ignoring everything after it. */
export function computeFeaturesAt(
	bars: Bar[],
	index: number,
	options: FeatureOptions = {}
): FeatureVector {
	const start = Math.max(0, index + 1 - resolveWindow(options));
	const history = bars.slice(start, index + 1);
	if (index + 1 < MIN_FEATURE_BARS) {
		throw new InsufficientDataError(
			bars[index]?.symbol ?? "UNKNOWN",
			index + 1,
			MIN_FEATURE_BARS
		);
	}
	return computeFeatures(history, options);
}

/**
 * One sample per bar that has both a full lookback and a following bar: the
 * features at t paired with the close at t+1.
 */
export function buildTrainingSamples(
	bars: Bar[],
	options: FeatureOptions = {}
): TrainingSample[] {
	assertAscending(bars);
	const samples: TrainingSample[] = [];
	for (let i = MIN_FEATURE_BARS - 1; i < bars.length - 1; i += 1) {
		const features = computeFeaturesAt(bars, i, options);
		samples.push({
			symbol: features.symbol,
			date: features.date,
			features,
			nextClose: bars[i + 1].close,
		});
	}
	return samples;
}

export const indicatorSnapshot = (
	features: FeatureVector
): IndicatorSnapshot => ({
	rsi: features.rsi,
	macd: features.macd,
	macdSignal: features.macdSignal,
	bbPosition: features.bbPosition,
	distanceMa20Pct:
		features.ma20 !== 0 ? ((features.close - features.ma20) / features.ma20) * 100 : 0,
});
