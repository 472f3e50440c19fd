import PQueue from "p-queue";
import {
	Bar,
	describeError,
	FeatureVector,
	InsufficientDataError,
	isTradingError,
	ModuleLogger,
	Prediction,
} from "@tradeloop/core";
import { BarSource, normalizeSymbol } from "@tradeloop/data";
import { computeFeatures, indicatorSnapshot } from "@tradeloop/indicators";
import { Forecaster } from "@tradeloop/models-quant";
import { CycleDeadline } from "./deadline";

export const CYCLE_TIMEOUT_CODE = "CYCLE_TIMEOUT";
export const PREDICTION_FAILED_CODE = "PREDICTION_FAILED";

export interface PredictContext {
	bars: BarSource;
	forecaster: Forecaster;
	featureWindow: number;
	logger: ModuleLogger;
}

export interface PredictStageInput extends PredictContext {
	symbols: string[];
	concurrency: number;
	deadline: CycleDeadline;
}

export interface PredictStageResult {
	/** One prediction per requested symbol, in request order. */
	predictions: Prediction[];
	timedOut: boolean;
}

const neutralPrediction = (
	symbol: string,
	currentPrice: number,
	features: FeatureVector | null
): Prediction => ({
	symbol,
	status: "error",
	...(features ? { date: features.date } : {}),
	currentPrice,
	predictedPrice: currentPrice,
	predictedChangePct: 0,
	confidence: 0,
	direction: "STABLE",
	indicators: features ? indicatorSnapshot(features) : null,
});

const degradedPrediction = (
	symbol: string,
	bars: Bar[],
	features: FeatureVector | null,
	error: unknown,
	logger: ModuleLogger
): Prediction => {
	const lastClose = features?.close ?? bars[bars.length - 1]?.close ?? 0;
	const base = neutralPrediction(symbol, lastClose, features);
	if (error instanceof InsufficientDataError) {
		logger.warn("features_insufficient_data", {
			symbol,
			available: error.details.available,
			required: error.details.required,
		});
		return {
			...base,
			status: "insufficient_data",
			errorCode: error.code,
			message: error.message,
		};
	}
	const errorCode = isTradingError(error) ? error.code : PREDICTION_FAILED_CODE;
	logger.warn("prediction_failed", { symbol, errorCode, error });
	return { ...base, errorCode, message: describeError(error) };
};

/**
 * Features and forecast for one symbol. Never rejects: every failure comes
 * back as a degraded prediction carrying its error code.
 */
export async function predictSymbol(
	rawSymbol: string,
	context: PredictContext
): Promise<Prediction> {
	let symbol = rawSymbol;
	let bars: Bar[] = [];
	let features: FeatureVector | null = null;
	try {
		symbol = normalizeSymbol(rawSymbol);
		bars = await context.bars.loadBars(symbol);
		features = computeFeatures(bars, { window: context.featureWindow });
		const forecast = context.forecaster.predict(features);
		return {
			symbol,
			status: "predicted",
			date: features.date,
			...forecast,
			indicators: indicatorSnapshot(features),
		};
	} catch (error) {
		return degradedPrediction(symbol, bars, features, error, context.logger);
	}
}

const timedOutPrediction = (symbol: string): Prediction => ({
	...neutralPrediction(symbol, 0, null),
	errorCode: CYCLE_TIMEOUT_CODE,
	message: "Cycle timed out before this symbol was predicted",
});

/**
 * Bounded fan-out over the symbol list. Results are written back by index so
 * the output keeps request order whatever order the tasks finish in.
 */
export async function predictStage(input: PredictStageInput): Promise<PredictStageResult> {
	const settled: Array<Prediction | undefined> = new Array(input.symbols.length);
	const queue = new PQueue({ concurrency: input.concurrency });
	const tasks = input.symbols.map((symbol, index) =>
		queue.add(
			async () => {
				settled[index] = await predictSymbol(symbol, input);
			},
			{ throwOnTimeout: true }
		)
	);

	const outcome = await input.deadline.race(Promise.all(tasks));
	if (!outcome.settled) {
		queue.clear();
	}
	const predictions = input.symbols.map(
		(symbol, index) => settled[index] ?? timedOutPrediction(symbol)
	);
	return { predictions, timedOut: !outcome.settled };
}
