import {
	createLogger,
	CycleSummary,
	DecisionMethodName,
	describeError,
	FitCancelledError,
	PipelineConfig,
} from "@tradeloop/core";
import { BarSource } from "@tradeloop/data";
import { DecisionPolicy } from "@tradeloop/decision-engine";
import {
	analyzePortfolioHealth,
	ExecutionEngine,
	LedgerRegistry,
	PortfolioHealth,
} from "@tradeloop/execution-engine";
import { findSimilarSymbols, SimilarSymbol, SymbolBars } from "@tradeloop/indicators";
import {
	ForecastEvaluation,
	Forecaster,
	SymbolHistory,
	trainForecaster,
	TrainingReport,
} from "@tradeloop/models-quant";
import { CycleRequest, runCycle } from "./cycle/runCycle";

const logger = createLogger("coordinator");

export interface CoordinatorOptions {
	config: PipelineConfig;
	bars: BarSource;
	/** Injected when a saved model is reloaded; a fresh one otherwise. */
	forecaster?: Forecaster;
	policy?: DecisionPolicy;
	now?: () => number;
}

export interface TrainOptions {
	signal?: AbortSignal;
}

export interface SystemStatus {
	forecasterTrained: boolean;
	decisionMethod: DecisionMethodName;
	feedbackSamples: number;
	labeledFeedbackSamples: number;
	cyclesRun: number;
	refitInProgress: boolean;
	users: string[];
	lastEvaluation: ForecastEvaluation | null;
}

interface RefitTask {
	controller: AbortController;
	done: Promise<void>;
}

/**
 * Owns the long-lived pipeline state: the forecaster, the decision policy and
 * every user's ledger. Cycles for different users run in parallel; cycles for
 * the same user serialise on that user's ledger.
 */
export class TradingCoordinator {
	readonly forecaster: Forecaster;
	readonly policy: DecisionPolicy;
	readonly ledgers: LedgerRegistry;
	private readonly engine: ExecutionEngine;
	private readonly config: PipelineConfig;
	private readonly bars: BarSource;
	private readonly now?: () => number;
	private cyclesRun = 0;
	private trainedSymbols: string[] = [];
	private refit: RefitTask | null = null;
	private lastRefitTrigger: string | null = null;

	constructor(options: CoordinatorOptions) {
		this.config = options.config;
		this.bars = options.bars;
		this.now = options.now;
		this.forecaster = options.forecaster ?? new Forecaster(options.config.forecast);
		this.policy =
			options.policy ?? new DecisionPolicy(options.config.decision, options.config.risk);
		this.engine = new ExecutionEngine(options.config.execution);
		this.ledgers = new LedgerRegistry({
			startingCash: options.config.account.startingCash,
			labelThresholdPct: options.config.decision.labelThresholdPct,
		});
	}

	/**
	 * Fits the forecaster on the full history of `symbols`. Symbols that cannot
	 * be loaded are reported with the ones that had too little history.
	 */
	async train(symbols: string[], options: TrainOptions = {}): Promise<TrainingReport> {
		const histories: SymbolHistory[] = [];
		const unreadable: TrainingReport["failedSymbols"] = [];
		for (const symbol of symbols) {
			try {
				histories.push({ symbol, bars: await this.bars.loadBars(symbol) });
			} catch (error) {
				unreadable.push({ symbol, reason: describeError(error) });
				logger.warn("training_symbol_unreadable", { symbol, error });
			}
		}

		const report = await trainForecaster(this.forecaster, histories, {
			featureWindow: this.config.forecast.featureWindow,
			signal: options.signal,
		});
		this.trainedSymbols = Object.keys(report.samplesPerSymbol);
		logger.info("training_completed", {
			symbols: report.symbols,
			samples: report.samples,
			rmse: report.evaluation.rmse,
			mae: report.evaluation.mae,
			failedSymbols: unreadable.length + report.failedSymbols.length,
		});
		return { ...report, failedSymbols: [...unreadable, ...report.failedSymbols] };
	}

	async runCycle(request: CycleRequest): Promise<CycleSummary> {
		const summary = await runCycle(
			{
				bars: this.bars,
				forecaster: this.forecaster,
				policy: this.policy,
				engine: this.engine,
				ledgers: this.ledgers,
				config: this.config,
				requestRefit: (evaluation, symbols) => this.scheduleRefit(evaluation, symbols),
				now: this.now,
			},
			request
		);
		this.cyclesRun += 1;
		return summary;
	}

	/** Health of the user's holdings at their last marks. */
	portfolioHealth(userId: string): Promise<PortfolioHealth> {
		return this.ledgers.withLedger(userId, (ledger) =>
			analyzePortfolioHealth(ledger.snapshot())
		);
	}

	/**
	 * Candidates whose recent price and volume pattern is closest to `symbol`'s.
	 * Candidates that cannot be loaded are skipped.
	 */
	async similarSymbols(
		symbol: string,
		candidates: string[],
		topN = 5
	): Promise<SimilarSymbol[]> {
		const target: SymbolBars = { symbol, bars: await this.bars.loadBars(symbol) };
		const loaded: SymbolBars[] = [];
		for (const candidate of candidates) {
			try {
				loaded.push({ symbol: candidate, bars: await this.bars.loadBars(candidate) });
			} catch (error) {
				logger.warn("similarity_symbol_unreadable", { symbol: candidate, error });
			}
		}
		const similar = findSimilarSymbols(target, loaded, topN);
		logger.info("similar_symbols_found", {
			symbol,
			candidates: loaded.length,
			returned: similar.length,
		});
		return similar;
	}

	/** Aborts an in-flight background re-fit; the served model stays in place. */
	cancelRefit(): void {
		this.refit?.controller.abort();
	}

	/** Settles once no background re-fit is running. */
	async whenIdle(): Promise<void> {
		await this.refit?.done;
	}

	status(): SystemStatus {
		const policy = this.policy.status();
		return {
			forecasterTrained: this.forecaster.isTrained,
			decisionMethod: policy.method,
			feedbackSamples: policy.feedbackSamples,
			labeledFeedbackSamples: policy.labeledSamples,
			cyclesRun: this.cyclesRun,
			refitInProgress: this.refit !== null,
			users: this.ledgers.users(),
			lastEvaluation: this.forecaster.lastEvaluation,
		};
	}

	/** One re-fit per drifted evaluation, and never two at once. */
	private scheduleRefit(evaluation: ForecastEvaluation, cycleSymbols: string[]): boolean {
		if (this.refit || this.lastRefitTrigger === evaluation.trainedAt) {
			return false;
		}
		this.lastRefitTrigger = evaluation.trainedAt;
		const symbols = this.trainedSymbols.length > 0 ? this.trainedSymbols : cycleSymbols;
		const controller = new AbortController();
		logger.info("model_refit_scheduled", {
			symbols: symbols.length,
			changeRmse: evaluation.drift.rmse,
			baseline: evaluation.drift.baseline,
		});

		const done = this.train(symbols, { signal: controller.signal })
			.then((report) => {
				logger.info("model_refit_completed", {
					samples: report.samples,
					rmse: report.evaluation.rmse,
					drifted: report.evaluation.drift.drifted,
				});
			})
			.catch((error: unknown) => {
				if (error instanceof FitCancelledError) {
					logger.warn("model_refit_cancelled", { treesBuilt: error.details.treesBuilt });
					return;
				}
				logger.error("model_refit_failed", { error });
			})
			.finally(() => {
				this.refit = null;
			});
		this.refit = { controller, done };
		return true;
	}
}
