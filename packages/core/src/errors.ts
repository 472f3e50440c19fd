export type TradingErrorCode =
	| "INSUFFICIENT_DATA"
	| "MODEL_NOT_TRAINED"
	| "INSUFFICIENT_FUNDS"
	| "INSUFFICIENT_SHARES"
	| "INVALID_SYMBOL"
	| "CONFIGURATION_ERROR"
	| "LEDGER_INVARIANT_VIOLATION"
	| "FIT_CANCELLED";

export class TradingError extends Error {
	constructor(
		message: string,
		readonly code: TradingErrorCode,
		readonly recoverable: boolean,
		readonly details: Record<string, unknown> = {}
	) {
		super(message);
		this.name = new.target.name;
	}
}

export class InsufficientDataError extends TradingError {
	constructor(symbol: string, available: number, required: number) {
		super(
			`Insufficient data for ${symbol}: ${available} bars, need ${required}`,
			"INSUFFICIENT_DATA",
			true,
			{ symbol, available, required }
		);
	}
}

export class ModelNotTrainedError extends TradingError {
	constructor(model: string) {
		super(`${model} has not been trained`, "MODEL_NOT_TRAINED", true, {
			model,
		});
	}
}

export class InsufficientFundsError extends TradingError {
	constructor(symbol: string, required: number, available: number) {
		super(
			`Insufficient funds for ${symbol}. Need $${required.toFixed(
				2
			)}, have $${available.toFixed(2)}`,
			"INSUFFICIENT_FUNDS",
			true,
			{ symbol, required, available }
		);
	}
}

export class InsufficientSharesError extends TradingError {
	constructor(symbol: string, requested: number, held: number) {
		super(
			`Insufficient shares of ${symbol}. Have ${held}, trying to sell ${requested}`,
			"INSUFFICIENT_SHARES",
			true,
			{ symbol, requested, held }
		);
	}
}

export class InvalidSymbolError extends TradingError {
	constructor(symbol: string, reason: string) {
		super(`Invalid symbol ${JSON.stringify(symbol)}: ${reason}`, "INVALID_SYMBOL", true, {
			symbol,
			reason,
		});
	}
}

export class ConfigurationError extends TradingError {
	constructor(message: string, readonly issues: string[] = []) {
		super(message, "CONFIGURATION_ERROR", false, { issues });
	}
}

export class LedgerInvariantError extends TradingError {
	constructor(invariant: string, details: Record<string, unknown>) {
		super(
			`Ledger invariant violated: ${invariant}`,
			"LEDGER_INVARIANT_VIOLATION",
			false,
			details
		);
	}
}

export class FitCancelledError extends TradingError {
	constructor(treesBuilt: number) {
		super(`Model fit cancelled after ${treesBuilt} trees`, "FIT_CANCELLED", true, {
			treesBuilt,
		});
	}
}

export const isTradingError = (value: unknown): value is TradingError =>
	value instanceof TradingError;

export const describeError = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
