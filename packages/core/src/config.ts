import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "./errors";

const forecastSchema = z.object({
	trees: z.number().int().min(1).default(100),
	maxDepth: z.number().int().min(1).default(15),
	minSamplesLeaf: z.number().int().min(1).default(2),
	minSamplesSplit: z.number().int().min(2).default(5),
	maxFeatures: z.number().min(0).max(1).nullable().default(null),
	seed: z.number().int().default(42),
	trainRatio: z.number().gt(0).lt(1).default(0.8),
	featureWindow: z.number().int().min(50).default(120),
	driftWindow: z.number().int().min(1).default(5),
	driftTolerance: z.number().min(0).default(0.25),
	fitBatchSize: z.number().int().min(1).default(10),
	maxTrainingSamples: z.number().int().min(10).default(5000),
});

const decisionSchema = z.object({
	minFeedbackSamples: z.number().int().min(1).default(30),
	labelThresholdPct: z.number().min(0).default(2),
	classifierTrees: z.number().int().min(1).default(50),
	classifierMaxDepth: z.number().int().min(1).default(6),
	seed: z.number().int().default(42),
});

const riskSchema = z.object({
	maxPositionFraction: z.number().gt(0).max(1).default(0.1),
	stopLossPct: z.number().min(0).max(100).default(5),
	takeProfitPct: z.number().min(0).default(10),
});

const executionSchema = z.object({
	sellSizing: z.enum(["position", "notional"]).default("position"),
	oversell: z.enum(["reject", "clip"]).default("reject"),
});

const cycleSchema = z.object({
	predictConcurrency: z.number().int().min(1).default(4),
	timeoutMs: z.number().int().min(1).default(30_000),
	refitOnDrift: z.boolean().default(true),
});

const accountSchema = z.object({
	startingCash: z.number().min(0).default(100_000),
});

export const pipelineConfigSchema = z.object({
	riskTolerance: z.number().min(0).max(1).default(0.5),
	forecast: forecastSchema.default({}),
	decision: decisionSchema.default({}),
	risk: riskSchema.default({}),
	execution: executionSchema.default({}),
	cycle: cycleSchema.default({}),
	account: accountSchema.default({}),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type ForecastConfig = PipelineConfig["forecast"];
export type DecisionConfig = PipelineConfig["decision"];
export type RiskConfig = PipelineConfig["risk"];
export type ExecutionConfig = PipelineConfig["execution"];
export type CycleConfig = PipelineConfig["cycle"];
export type AccountConfig = PipelineConfig["account"];
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

const formatIssues = (error: z.ZodError): string[] =>
	error.issues.map((issue) => {
		const where = issue.path.length ? issue.path.join(".") : "(root)";
		return `${where}: ${issue.message}`;
	});

export const parsePipelineConfig = (raw: unknown): PipelineConfig => {
	const result = pipelineConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		const issues = formatIssues(result.error);
		throw new ConfigurationError(
			`Invalid pipeline config: ${issues.join("; ")}`,
			issues
		);
	}
	return result.data;
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = parsePipelineConfig({});

export const assertRiskTolerance = (value: number): number => {
	if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
		throw new ConfigurationError(
			`risk_tolerance must be within [0, 1], received ${String(value)}`,
			["riskTolerance: out of range"]
		);
	}
	return value;
};

export interface EnvConfig {
	pipelineProfile: string;
	configDir?: string;
	dataDir?: string;
	riskTolerance?: number;
	cycleTimeoutMs?: number;
}

const WORKSPACE_SENTINELS = [".git", "config"];
let cachedWorkspaceRoot: string | undefined;
const loadedEnvFiles = new Set<string>();

export const getWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}
	let current = process.cwd();
	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	cachedWorkspaceRoot = current;
	return current;
};

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readNumericEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): number | undefined => {
	const raw = readOptionalEnvVar(env, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigurationError(`${key} must be numeric, received "${raw}"`, [
			`${key}: not a number`,
		]);
	}
	return value;
};

export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig => ({
	pipelineProfile: readOptionalEnvVar(env, "PIPELINE_PROFILE") ?? "default",
	configDir: readOptionalEnvVar(env, "PIPELINE_CONFIG_DIR"),
	dataDir: readOptionalEnvVar(env, "DATA_DIR"),
	riskTolerance: readNumericEnvVar(env, "RISK_TOLERANCE"),
	cycleTimeoutMs: readNumericEnvVar(env, "CYCLE_TIMEOUT_MS"),
});

export const loadEnvConfig = (
	envPath = path.join(getWorkspaceRoot(), ".env")
): EnvConfig => {
	if (!loadedEnvFiles.has(envPath) && fs.existsSync(envPath)) {
		dotenv.config({ path: envPath });
		loadedEnvFiles.add(envPath);
	}
	return readEnvConfig(process.env);
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const mergeConfig = (
	base: Record<string, unknown>,
	override: Record<string, unknown>
): Record<string, unknown> => {
	const merged: Record<string, unknown> = { ...base };
	for (const [key, value] of Object.entries(override)) {
		const existing = merged[key];
		merged[key] =
			isPlainObject(existing) && isPlainObject(value)
				? mergeConfig(existing, value)
				: value;
	}
	return merged;
};

export const readPipelineProfile = (
	configDir: string,
	profile: string
): Record<string, unknown> => {
	const profilePath = path.join(configDir, "pipeline", `${profile}.json`);
	if (!fs.existsSync(profilePath)) {
		throw new ConfigurationError(`Pipeline profile not found: ${profilePath}`, [
			`profile: ${profile} missing`,
		]);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(profilePath, "utf-8"));
	} catch (error) {
		throw new ConfigurationError(
			`Pipeline profile ${profilePath} is not valid JSON: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
	if (!isPlainObject(parsed)) {
		throw new ConfigurationError(
			`Pipeline profile ${profilePath} must contain a JSON object`
		);
	}
	return parsed;
};

export interface PipelineConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
	overrides?: Record<string, unknown>;
	env?: EnvConfig;
}

export interface LoadedPipelineConfig {
	config: PipelineConfig;
	env: EnvConfig;
	profile: string;
	path: string;
}

/**
 * Resolves a pipeline config: profile JSON, then env overrides, then explicit
 * overrides, validated as a whole.
 */
export const loadPipelineConfig = (
	options: PipelineConfigLoadOptions = {}
): LoadedPipelineConfig => {
	const env = options.env ?? loadEnvConfig(options.envPath);
	const configDir =
		options.configDir ??
		env.configDir ??
		path.join(getWorkspaceRoot(), "config");
	const profile = options.profile ?? env.pipelineProfile;
	const fileConfig = readPipelineProfile(configDir, profile);

	const envOverrides: Record<string, unknown> = {};
	if (env.riskTolerance !== undefined) {
		envOverrides.riskTolerance = env.riskTolerance;
	}
	if (env.cycleTimeoutMs !== undefined) {
		envOverrides.cycle = { timeoutMs: env.cycleTimeoutMs };
	}

	const merged = mergeConfig(
		mergeConfig(fileConfig, envOverrides),
		options.overrides ?? {}
	);
	return {
		config: parsePipelineConfig(merged),
		env,
		profile,
		path: path.join(configDir, "pipeline", `${profile}.json`),
	};
};
