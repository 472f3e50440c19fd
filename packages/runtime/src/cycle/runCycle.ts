import { randomUUID } from "node:crypto";
import {
	assertRiskTolerance,
	createLogger,
	CycleLearningSummary,
	CycleState,
	CycleSummary,
	Decision,
	ExecutionResult,
	Feedback,
	ModuleLogger,
	PipelineConfig,
	PortfolioSnapshot,
	Prediction,
	SymbolCycleResult,
	TradeAction,
	TradeStats,
} from "@tradeloop/core";
import { BarSource } from "@tradeloop/data";
import { DecisionPolicy, DecisionThresholds, getThresholds } from "@tradeloop/decision-engine";
import { ExecutionEngine, LedgerRegistry } from "@tradeloop/execution-engine";
import { ForecastEvaluation, Forecaster } from "@tradeloop/models-quant";
import { CycleDeadline } from "./deadline";
import { decideStage } from "./decideStage";
import { executeStage } from "./executeStage";
import { feedbackStage } from "./feedbackStage";
import { predictStage } from "./predictStage";

const cycleLogger = createLogger("coordinator");

export interface CycleDependencies {
	bars: BarSource;
	forecaster: Forecaster;
	policy: DecisionPolicy;
	engine: ExecutionEngine;
	ledgers: LedgerRegistry;
	config: PipelineConfig;
	/** Asked to start a background re-fit when the last fit flagged drift; true if one was started. */
	requestRefit?: (evaluation: ForecastEvaluation, symbols: string[]) => boolean;
	now?: () => number;
}

export interface CycleRequest {
	userId: string;
	symbols: string[];
	/** Falls back to the configured tolerance. */
	riskTolerance?: number;
	/** Falls back to `cycle.timeoutMs`. */
	timeoutMs?: number;
}

interface CycleContext {
	readonly deps: CycleDependencies;
	readonly request: CycleRequest;
	readonly riskTolerance: number;
	readonly deadline: CycleDeadline;
	readonly logger: ModuleLogger;
	predictions: Prediction[];
	decisions: Array<Decision | null>;
	executions: Array<ExecutionResult | null>;
	feedback: Feedback[];
	learning: CycleLearningSummary | null;
	portfolio: PortfolioSnapshot | null;
	performance: TradeStats | null;
	driftDetected: boolean;
	refitScheduled: boolean;
	timedOut: boolean;
}

type StageHandler = (context: CycleContext) => Promise<CycleState>;

const markTimedOut = (context: CycleContext, state: CycleState): CycleState => {
	context.timedOut = true;
	context.logger.warn("cycle_timeout", {
		state,
		timeoutMs: context.deadline.timeoutMs,
		predicted: context.predictions.filter((p) => p.status === "predicted").length,
		executed: context.executions.filter((e) => e !== null).length,
	});
	return "COMPLETE";
};

const refitWanted = (context: CycleContext): boolean =>
	context.deps.config.cycle.refitOnDrift && context.driftDetected;

const stages: Record<Exclude<CycleState, "COMPLETE">, StageHandler> = {
	STARTED: async (context) => (context.request.symbols.length > 0 ? "PREDICTING" : "COMPLETE"),

	PREDICTING: async (context) => {
		const { deps } = context;
		const result = await predictStage({
			symbols: context.request.symbols,
			bars: deps.bars,
			forecaster: deps.forecaster,
			featureWindow: deps.config.forecast.featureWindow,
			concurrency: deps.config.cycle.predictConcurrency,
			deadline: context.deadline,
			logger: context.logger,
		});
		context.predictions = result.predictions;
		if (result.timedOut) {
			return markTimedOut(context, "PREDICTING");
		}
		return context.predictions.some((p) => p.status === "predicted") ? "DECIDING" : "COMPLETE";
	},

	DECIDING: async (context) => {
		if (context.deadline.expired) {
			return markTimedOut(context, "DECIDING");
		}
		const portfolio = await context.deps.ledgers.snapshot(context.request.userId);
		context.decisions = decideStage(
			context.predictions,
			context.deps.policy,
			context.riskTolerance,
			portfolio
		);
		return context.decisions.some((d) => d !== null) ? "EXECUTING" : "COMPLETE";
	},

	EXECUTING: async (context) => {
		const { deps } = context;
		const result = await deps.ledgers.withLedger(context.request.userId, (ledger) =>
			executeStage(context.decisions, context.predictions, deps.engine, ledger, context.deadline)
		);
		context.executions = result.executions;
		context.feedback = result.feedback;
		context.portfolio = result.portfolio;
		context.performance = result.performance;
		context.driftDetected = deps.forecaster.lastEvaluation?.drift.drifted ?? false;
		if (result.timedOut) {
			return markTimedOut(context, "EXECUTING");
		}
		return context.feedback.length > 0 || refitWanted(context) ? "FEEDBACK" : "COMPLETE";
	},

	FEEDBACK: async (context) => {
		const { deps } = context;
		if (context.feedback.length > 0) {
			const result = await feedbackStage(
				context.feedback,
				deps.policy,
				context.deadline,
				context.logger
			);
			context.learning = result.learning;
			if (result.timedOut) {
				return markTimedOut(context, "FEEDBACK");
			}
		}
		const evaluation = deps.forecaster.lastEvaluation;
		if (refitWanted(context) && evaluation && deps.requestRefit) {
			context.refitScheduled = deps.requestRefit(evaluation, context.request.symbols);
		}
		return "COMPLETE";
	},
};

const countDecisions = (
	decisions: ReadonlyArray<Decision | null>
): Record<TradeAction, number> => {
	const counts: Record<TradeAction, number> = { BUY: 0, SELL: 0, HOLD: 0 };
	for (const decision of decisions) {
		if (decision) {
			counts[decision.action] += 1;
		}
	}
	return counts;
};

const buildSummary = (
	context: CycleContext,
	cycleId: string,
	states: CycleState[],
	thresholds: DecisionThresholds,
	startedAt: number,
	completedAt: number,
	portfolio: PortfolioSnapshot,
	performance: TradeStats
): CycleSummary => {
	const results: SymbolCycleResult[] = context.predictions.map((prediction, index) => ({
		symbol: prediction.symbol,
		prediction,
		decision: context.decisions[index] ?? null,
		execution: context.executions[index] ?? null,
	}));
	const executions = context.executions.filter(
		(execution): execution is ExecutionResult => execution !== null
	);
	const withStatus = (status: ExecutionResult["status"]): number =>
		executions.filter((execution) => execution.status === status).length;
	const withPrediction = (status: Prediction["status"]): number =>
		context.predictions.filter((prediction) => prediction.status === status).length;

	return {
		cycleId,
		userId: context.request.userId,
		startedAt: new Date(startedAt).toISOString(),
		completedAt: new Date(completedAt).toISOString(),
		durationMs: completedAt - startedAt,
		riskTolerance: context.riskTolerance,
		thresholds: {
			buyThresholdPct: thresholds.buyThresholdPct,
			sellThresholdPct: thresholds.sellThresholdPct,
			minConfidence: thresholds.minConfidence,
		},
		states,
		timedOut: context.timedOut,
		symbolsAnalyzed: context.request.symbols.length,
		predictionsMade: withPrediction("predicted"),
		insufficientData: withPrediction("insufficient_data"),
		predictionErrors: withPrediction("error"),
		decisions: countDecisions(context.decisions),
		tradesExecuted: withStatus("EXECUTED"),
		tradesFailed: withStatus("FAILED"),
		tradesSkipped: withStatus("SKIPPED"),
		learning: context.learning,
		driftDetected: context.driftDetected,
		refitScheduled: context.refitScheduled,
		portfolio,
		performance,
		results,
	};
};

/**
 * One pass of the pipeline for one user:
 * STARTED → PREDICTING → DECIDING → EXECUTING → FEEDBACK → COMPLETE.
 * Any stage may jump to COMPLETE when nothing downstream is actionable or the
 * deadline has passed; the summary then carries whatever was produced so far.
 * Only configuration errors and ledger invariant violations reject.
 */
export async function runCycle(
	deps: CycleDependencies,
	request: CycleRequest
): Promise<CycleSummary> {
	const riskTolerance = assertRiskTolerance(request.riskTolerance ?? deps.config.riskTolerance);
	const thresholds = getThresholds(riskTolerance);
	const now = deps.now ?? Date.now;
	const startedAt = now();
	const cycleId = randomUUID();
	const logger = cycleLogger.child({ cycleId, userId: request.userId });
	const deadline = new CycleDeadline(request.timeoutMs ?? deps.config.cycle.timeoutMs, now);

	const context: CycleContext = {
		deps,
		request,
		riskTolerance,
		deadline,
		logger,
		predictions: [],
		decisions: [],
		executions: [],
		feedback: [],
		learning: null,
		portfolio: null,
		performance: null,
		driftDetected: false,
		refitScheduled: false,
		timedOut: false,
	};

	logger.info("cycle_started", {
		symbols: request.symbols,
		riskTolerance,
		buyThresholdPct: thresholds.buyThresholdPct,
		sellThresholdPct: thresholds.sellThresholdPct,
		minConfidence: thresholds.minConfidence,
	});

	const states: CycleState[] = [];
	let state: CycleState = "STARTED";
	try {
		while (state !== "COMPLETE") {
			states.push(state);
			logger.info("cycle_state", { state });
			state = await stages[state](context);
		}
	} finally {
		deadline.dispose();
	}
	states.push("COMPLETE");
	logger.info("cycle_state", { state: "COMPLETE" });

	let portfolio = context.portfolio;
	let performance = context.performance;
	if (!portfolio || !performance) {
		const view = await deps.ledgers.withLedger(request.userId, (ledger) => ({
			portfolio: ledger.snapshot(),
			performance: ledger.stats(),
		}));
		portfolio = view.portfolio;
		performance = view.performance;
	}

	const summary = buildSummary(
		context,
		cycleId,
		states,
		thresholds,
		startedAt,
		now(),
		portfolio,
		performance
	);
	const { results, ...headline } = summary;
	logger.info("cycle_summary", { ...headline, symbols: results.length });
	logger.info("portfolio_snapshot", { snapshot: portfolio });
	return summary;
}
