import { Bar, InvalidSymbolError } from "@tradeloop/core";
import { normalizeBars } from "./normalize";
import { normalizeSymbol } from "./symbols";
import type { BarRequest, BarSource } from "./types";

/** Bar history held in memory; used by tests and by callers that already hold bars. */
export class InMemoryBarSource implements BarSource {
	private readonly series = new Map<string, Bar[]>();

	constructor(initial: Record<string, Bar[]> = {}) {
		for (const [symbol, bars] of Object.entries(initial)) {
			this.set(symbol, bars);
		}
	}

	set(rawSymbol: string, bars: Bar[]): void {
		const symbol = normalizeSymbol(rawSymbol);
		this.series.set(symbol, normalizeBars(bars.map((bar) => ({ ...bar, symbol }))));
	}

	async loadBars(rawSymbol: string, request: BarRequest = {}): Promise<Bar[]> {
		const symbol = normalizeSymbol(rawSymbol);
		const bars = this.series.get(symbol);
		if (!bars) {
			throw new InvalidSymbolError(symbol, "no bars loaded");
		}
		return normalizeBars(bars, request);
	}

	async listSymbols(): Promise<string[]> {
		return [...this.series.keys()].sort();
	}
}
