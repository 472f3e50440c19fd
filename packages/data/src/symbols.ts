import { InvalidSymbolError } from "@tradeloop/core";

const SYMBOL_PATTERN = /^[A-Z][A-Z0-9.-]{0,9}$/;

/** Upper-cases and validates a ticker; rejects anything that could escape a path. */
export const normalizeSymbol = (raw: string): string => {
	const symbol = raw.trim().toUpperCase();
	if (!SYMBOL_PATTERN.test(symbol)) {
		throw new InvalidSymbolError(raw, "expected 1-10 letters, digits, '.' or '-'");
	}
	return symbol;
};
