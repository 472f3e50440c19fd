import { ConfigurationError } from "@tradeloop/core";

export type ArgValue = string | boolean;

export interface ParsedArgs {
	flags: Record<string, ArgValue>;
	positionals: string[];
}

export const parseCliArgs = (argv: string[]): ParsedArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			flags[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	return { flags, positionals };
};

export interface CycleCliOptions {
	help: boolean;
	json: boolean;
	/** Retrain even when a saved model exists. */
	train: boolean;
	userId: string;
	symbols: string[];
	cycles: number;
	riskTolerance?: number;
	timeoutMs?: number;
	profile?: string;
	configDir?: string;
	envPath?: string;
	dataDir?: string;
	modelDir: string;
	/** Also list the symbols whose recent pattern is closest to this one. */
	similarTo?: string;
}

const readString = (flags: Record<string, ArgValue>, key: string): string | undefined => {
	const value = flags[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || value.trim() === "") {
		throw new ConfigurationError(`--${key} needs a value`, [`${key}: missing value`]);
	}
	return value.trim();
};

const readNumber = (flags: Record<string, ArgValue>, key: string): number | undefined => {
	const raw = readString(flags, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigurationError(`Invalid numeric value for --${key}: ${raw}`, [
			`${key}: not a number`,
		]);
	}
	return value;
};

const readFlag = (flags: Record<string, ArgValue>, key: string): boolean =>
	flags[key] === true || flags[key] === "true";

/** Symbols come from `--symbols A,B` and from positionals, de-duplicated in order. */
const readSymbols = (parsed: ParsedArgs): string[] => {
	const listed = readString(parsed.flags, "symbols")?.split(",") ?? [];
	const symbols = [...listed, ...parsed.positionals]
		.map((symbol) => symbol.trim())
		.filter((symbol) => symbol.length > 0);
	return [...new Set(symbols)];
};

export const parseCycleOptions = (argv: string[]): CycleCliOptions => {
	const parsed = parseCliArgs(argv);
	const { flags } = parsed;
	const cycles = readNumber(flags, "cycles") ?? 1;
	if (!Number.isInteger(cycles) || cycles < 1) {
		throw new ConfigurationError(`--cycles must be a positive integer, received ${cycles}`, [
			"cycles: out of range",
		]);
	}
	return {
		help: readFlag(flags, "help"),
		json: readFlag(flags, "json"),
		train: readFlag(flags, "train"),
		userId: readString(flags, "user") ?? "default",
		symbols: readSymbols(parsed),
		cycles,
		riskTolerance: readNumber(flags, "risk"),
		timeoutMs: readNumber(flags, "timeout"),
		profile: readString(flags, "profile"),
		configDir: readString(flags, "configDir"),
		envPath: readString(flags, "envPath") ?? readString(flags, "env"),
		dataDir: readString(flags, "dataDir"),
		modelDir: readString(flags, "modelDir") ?? "models",
		similarTo: readString(flags, "similar")?.toUpperCase(),
	};
};
