import type { Bar } from "@tradeloop/core";

export interface BarRequest {
	/** Keep only the most recent `limit` bars. */
	limit?: number;
	/** Drop bars dated after this ISO date (inclusive bound). */
	asOf?: string;
}

/** Where the pipeline reads bar history from. Bars come back in ascending date order. */
export interface BarSource {
	loadBars(symbol: string, request?: BarRequest): Promise<Bar[]>;
	listSymbols(): Promise<string[]>;
}

export interface BarSourceLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
}
