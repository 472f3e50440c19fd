import { Bar } from "@tradeloop/core";
import { standardDeviation } from "simple-statistics";
import { assertAscending } from "./features";
import { percentChange } from "./momentum";
import { sma } from "./sma";

export const PATTERN_WINDOW = 20;

export interface SymbolBars {
	symbol: string;
	bars: Bar[];
}

export interface SimilarSymbol {
	symbol: string;
	/** Cosine similarity of the two pattern vectors, in [-1, 1]. */
	similarity: number;
	currentPrice: number;
	priceChange1dPct: number;
}

/**
 * Shape of the trailing `window` bars, independent of price level:
 * the last 10 closes relative to the window's first close, the population
 * std of daily returns, the last 5 volumes relative to the window's peak,
 * and the distance of MA5 and MA10 from the close. Null below `window` bars.
 */
export function extractPatternFeatures(
	bars: Bar[],
	window = PATTERN_WINDOW
): number[] | null {
	if (bars.length < window || window < 10) {
		return null;
	}
	assertAscending(bars);
	const recent = bars.slice(-window);
	const closes = recent.map((bar) => bar.close);
	const first = closes[0];
	if (!(first > 0)) {
		return null;
	}
	const close = closes[closes.length - 1];
	const shape = closes.map((value) => (value - first) / first);
	const returns = closes.slice(1).map((value, i) => (value - closes[i]) / closes[i]);
	const volumes = recent.map((bar) => bar.volume);
	const peakVolume = Math.max(...volumes);
	const volumeShape =
		peakVolume > 0 ? volumes.map((volume) => volume / peakVolume) : volumes;

	return [
		...shape.slice(-10),
		standardDeviation(returns),
		...volumeShape.slice(-5),
		((sma(closes, 5) ?? close) - close) / close,
		((sma(closes, 10) ?? close) - close) / close,
	];
}

/** 0 when either vector has no magnitude. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
		dot += a[i] * b[i];
		normA += a[i] * a[i];
		normB += b[i] * b[i];
	}
	if (normA === 0 || normB === 0) {
		return 0;
	}
	return dot / Math.sqrt(normA * normB);
}

/**
 * Ranks `candidates` by how closely their recent pattern matches `target`'s.
 * The target itself and candidates with too little history are left out.
 */
export function findSimilarSymbols(
	target: SymbolBars,
	candidates: readonly SymbolBars[],
	topN = 5,
	window = PATTERN_WINDOW
): SimilarSymbol[] {
	const targetPattern = extractPatternFeatures(target.bars, window);
	if (!targetPattern) {
		return [];
	}

	const ranked: SimilarSymbol[] = [];
	for (const candidate of candidates) {
		if (candidate.symbol === target.symbol) {
			continue;
		}
		const pattern = extractPatternFeatures(candidate.bars, window);
		if (!pattern) {
			continue;
		}
		const bars = candidate.bars;
		const latest = bars[bars.length - 1];
		const previous = bars[bars.length - 2];
		ranked.push({
			symbol: candidate.symbol,
			similarity: cosineSimilarity(targetPattern, pattern),
			currentPrice: latest.close,
			priceChange1dPct: previous ? percentChange(latest.close, previous.close) : 0,
		});
	}
	return ranked.sort((a, b) => b.similarity - a.similarity).slice(0, Math.max(topN, 0));
}
