export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	const normalized = value?.toLowerCase();
	return normalized && isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			console.log(JSON.stringify(sanitizeValue(base, new WeakSet())));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	readonly module: string;
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
	/** Logger that stamps `context` onto every payload (e.g. a cycle id). */
	child: (context: Record<string, unknown>) => ModuleLogger;
}

export const createLogger = (
	moduleName: string,
	context: Record<string, unknown> = {}
): ModuleLogger => {
	const emit = (
		level: LogLevel,
		event: string,
		data?: Record<string, unknown>
	): void => log({ ...context, ...(data ?? {}), level, event, module: moduleName });
	return {
		module: moduleName,
		log: emit,
		debug: (event, data) => emit("debug", event, data),
		info: (event, data) => emit("info", event, data),
		warn: (event, data) => emit("warn", event, data),
		error: (event, data) => emit("error", event, data),
		child: (extra) => createLogger(moduleName, { ...context, ...extra }),
	};
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value instanceof Map) {
		return sanitizeValue(Object.fromEntries(value), seen);
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

export const sanitizeLogPayload = (payload: BaseLogPayload): unknown =>
	sanitizeValue(payload, new WeakSet());

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	switch (event) {
		case "cycle_summary":
			printCycleSummary(rest);
			break;
		case "decision_made":
			printDecision(rest);
			break;
		case "execution_result":
			printExecution(rest);
			break;
		case "portfolio_snapshot":
			printPortfolio(rest);
			break;
		default:
			break;
	}
}

const readNumber = (value: unknown): number | undefined =>
	typeof value === "number" ? value : undefined;

const readRecord = (value: unknown): Record<string, unknown> =>
	value && typeof value === "object" && !Array.isArray(value)
		? Object.fromEntries(Object.entries(value))
		: {};

const fmtMoney = (value: unknown): string => {
	const num = readNumber(value);
	return num === undefined ? "-" : `$${num.toFixed(2)}`;
};

const printCycleSummary = (rest: Record<string, unknown>): void => {
	const decisions = readRecord(rest.decisions);
	const portfolio = readRecord(rest.portfolio);
	console.table([
		{
			cycleId: rest.cycleId,
			durationMs: rest.durationMs,
			symbols: rest.symbolsAnalyzed,
			predicted: rest.predictionsMade,
			buy: decisions.BUY,
			sell: decisions.SELL,
			hold: decisions.HOLD,
			executed: rest.tradesExecuted,
			failed: rest.tradesFailed,
			timedOut: rest.timedOut,
			totalValue: fmtMoney(portfolio.totalValue),
		},
	]);
};

const printDecision = (rest: Record<string, unknown>): void => {
	const reasons = Array.isArray(rest.reasons) ? rest.reasons.join("; ") : "";
	console.table([
		{
			symbol: rest.symbol,
			action: rest.action,
			confidence: readNumber(rest.confidence)?.toFixed(2),
			method: rest.method,
			size: readNumber(rest.suggestedPositionSize)?.toFixed(4),
			reasons,
		},
	]);
};

const printExecution = (rest: Record<string, unknown>): void => {
	console.table([
		{
			symbol: rest.symbol,
			action: rest.action,
			status: rest.status,
			quantity: rest.quantity,
			price: fmtMoney(rest.price),
			total: fmtMoney(rest.total),
			reason: rest.reason ?? "",
		},
	]);
};

const printPortfolio = (rest: Record<string, unknown>): void => {
	const snapshot = readRecord(rest.snapshot);
	console.table([
		{
			userId: snapshot.userId,
			cash: fmtMoney(snapshot.cash),
			positionsValue: fmtMoney(snapshot.positionsValue),
			totalValue: fmtMoney(snapshot.totalValue),
			totalReturn: fmtMoney(snapshot.totalReturn),
			positions: snapshot.positionsCount,
		},
	]);
};
