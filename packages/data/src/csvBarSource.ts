import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { Bar, createLogger, InvalidSymbolError } from "@tradeloop/core";
import { normalizeBars } from "./normalize";
import { normalizeSymbol } from "./symbols";
import type { BarRequest, BarSource, BarSourceLogger } from "./types";

const defaultLogger = createLogger("data:csv");

type Column = "date" | "open" | "high" | "low" | "close" | "volume" | "preMarket" | "afterHours";

const HEADER_ALIASES: Record<string, Column> = {
	date: "date",
	timestamp: "date",
	open: "open",
	high: "high",
	low: "low",
	close: "close",
	volume: "volume",
	pre_market: "preMarket",
	premarket: "preMarket",
	after_hours: "afterHours",
	afterhours: "afterHours",
};

const REQUIRED: Column[] = ["date", "open", "high", "low", "close"];

export interface CsvParseResult {
	bars: Bar[];
	skipped: number;
	missingVolume: number;
}

const parseNumber = (raw: string | undefined): number | undefined => {
	if (raw === undefined || raw.trim() === "") {
		return undefined;
	}
	const value = Number(raw);
	return Number.isFinite(value) ? value : undefined;
};

/**
 * Parses `Date,Open,High,Low,Close,Volume` style CSV (headers matched without
 * case). Rows with a bad date or price are skipped; a missing volume reads as 0.
 */
export function parseCsvBars(
	text: string,
	symbol: string,
	logger: BarSourceLogger = defaultLogger
): CsvParseResult {
	const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
	if (lines.length === 0) {
		return { bars: [], skipped: 0, missingVolume: 0 };
	}

	const columns = new Map<Column, number>();
	lines[0].split(",").forEach((header, index) => {
		const column = HEADER_ALIASES[header.trim().toLowerCase()];
		if (column && !columns.has(column)) {
			columns.set(column, index);
		}
	});
	const missing = REQUIRED.filter((column) => !columns.has(column));
	if (missing.length) {
		throw new InvalidSymbolError(symbol, `CSV is missing columns: ${missing.join(", ")}`);
	}

	const bars: Bar[] = [];
	let skipped = 0;
	let missingVolume = 0;
	for (let row = 1; row < lines.length; row += 1) {
		const cells = lines[row].split(",");
		const cell = (column: Column): string | undefined => {
			const index = columns.get(column);
			return index === undefined ? undefined : cells[index]?.trim();
		};

		const date = cell("date")?.split("T")[0] ?? "";
		const open = parseNumber(cell("open"));
		const high = parseNumber(cell("high"));
		const low = parseNumber(cell("low"));
		const close = parseNumber(cell("close"));
		if (
			!/^\d{4}-\d{2}-\d{2}$/.test(date) ||
			open === undefined ||
			high === undefined ||
			low === undefined ||
			close === undefined ||
			close <= 0
		) {
			skipped += 1;
			logger.warn?.("bar_row_invalid", { symbol, row, line: lines[row] });
			continue;
		}

		let volume = parseNumber(cell("volume"));
		if (volume === undefined) {
			volume = 0;
			missingVolume += 1;
			logger.warn?.("bar_volume_missing", { symbol, date });
		}

		const bar: Bar = { symbol, date, open, high, low, close, volume };
		const preMarket = parseNumber(cell("preMarket"));
		const afterHours = parseNumber(cell("afterHours"));
		if (preMarket !== undefined) {
			bar.preMarket = preMarket;
		}
		if (afterHours !== undefined) {
			bar.afterHours = afterHours;
		}
		bars.push(bar);
	}
	return { bars, skipped, missingVolume };
}

export interface CsvBarSourceOptions {
	directory: string;
	logger?: BarSourceLogger;
}

/** Reads `<directory>/<SYMBOL>.csv`. */
export class CsvBarSource implements BarSource {
	private readonly logger: BarSourceLogger;

	constructor(private readonly options: CsvBarSourceOptions) {
		this.logger = options.logger ?? defaultLogger;
	}

	async loadBars(rawSymbol: string, request: BarRequest = {}): Promise<Bar[]> {
		const symbol = normalizeSymbol(rawSymbol);
		const file = path.join(this.options.directory, `${symbol}.csv`);
		let text: string;
		try {
			text = await readFile(file, "utf-8");
		} catch (error) {
			if (error instanceof Error && "code" in error && error.code === "ENOENT") {
				throw new InvalidSymbolError(symbol, `no bar file at ${file}`);
			}
			throw error;
		}
		const parsed = parseCsvBars(text, symbol, this.logger);
		const bars = normalizeBars(parsed.bars, request);
		this.logger.info?.("bars_loaded", {
			symbol,
			bars: bars.length,
			skipped: parsed.skipped,
			missingVolume: parsed.missingVolume,
		});
		return bars;
	}

	async listSymbols(): Promise<string[]> {
		const entries = await readdir(this.options.directory);
		return entries
			.filter((entry) => entry.toLowerCase().endsWith(".csv"))
			.map((entry) => entry.slice(0, -4).toUpperCase())
			.sort();
	}
}
