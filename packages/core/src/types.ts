export interface Bar {
	symbol: string;
	/** ISO calendar date (YYYY-MM-DD). */
	date: string;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	preMarket?: number;
	afterHours?: number;
}

export interface FeatureVector {
	symbol: string;
	date: string;
	close: number;
	open: number;
	high: number;
	low: number;
	rsi: number;
	macd: number;
	macdSignal: number;
	macdHistogram: number;
	bbPosition: number;
	ma5: number;
	ma10: number;
	ma20: number;
	ma50: number;
	momentum5: number;
	momentum10: number;
	/** Closes at t-1 .. t-5, most recent first. */
	lagCloses: [number, number, number, number, number];
	/** Fractional change of volume versus the previous bar. */
	volumeDelta: number;
}

export interface IndicatorSnapshot {
	rsi: number;
	macd: number;
	macdSignal: number;
	bbPosition: number;
	distanceMa20Pct: number;
}

export type PredictionStatus = "predicted" | "insufficient_data" | "error";

export type PriceDirection = "UP" | "DOWN" | "STABLE";

export interface Prediction {
	symbol: string;
	status: PredictionStatus;
	date?: string;
	currentPrice: number;
	predictedPrice: number;
	predictedChangePct: number;
	confidence: number;
	direction: PriceDirection;
	indicators: IndicatorSnapshot | null;
	errorCode?: string;
	message?: string;
}

export type TradeAction = "BUY" | "SELL" | "HOLD";

export type DecisionMethodName = "rule_based" | "ml_model";

export interface Decision {
	symbol: string;
	action: TradeAction;
	confidence: number;
	reasons: string[];
	/** Fraction of portfolio value, in [0, 1]. */
	suggestedPositionSize: number;
	stopLoss?: number;
	takeProfit?: number;
	method: DecisionMethodName;
	riskTolerance: number;
	currentPrice: number;
	predictedChangePct: number;
	/** Inputs the decision was made from; carried into the position it opens. */
	signal: EntrySignal | null;
}

/**
 * The decision inputs captured when a BUY opens a position. Closing the
 * position compares them against the realized exit.
 */
export interface EntrySignal {
	predictedChangePct: number;
	predictedPrice: number;
	confidence: number;
	rsi: number;
	macd: number;
	bbPosition: number;
	riskTolerance: number;
}

export interface Position {
	symbol: string;
	quantity: number;
	avgBuyPrice: number;
	markPrice: number;
	currentValue: number;
	unrealizedPnl: number;
	openedAt: string;
	entrySignal: EntrySignal | null;
}

export type TransactionType = "BUY" | "SELL";

export interface Transaction {
	readonly id: number;
	readonly symbol: string;
	readonly type: TransactionType;
	readonly quantity: number;
	readonly price: number;
	readonly total: number;
	readonly profitLoss?: number;
	readonly profitLossPct?: number;
	readonly timestamp: string;
}

export interface Feedback {
	symbol: string;
	tradeType: TransactionType;
	entryPrice: number;
	exitPrice?: number;
	quantity: number;
	profitLoss?: number;
	actualChangePct: number;
	predictedChangePct: number | null;
	wasCorrect: boolean;
	predictionError: number;
	withinTolerance: boolean;
	entrySignal: EntrySignal | null;
	timestamp: string;
}

export interface PortfolioSnapshot {
	userId: string;
	cash: number;
	startingCash: number;
	positionsValue: number;
	totalValue: number;
	totalReturn: number;
	totalReturnPct: number;
	positionsCount: number;
	positions: Position[];
}

export interface TradeStats {
	totalTrades: number;
	buys: number;
	sells: number;
	wins: number;
	losses: number;
	breakeven: number;
	winRate: number;
	realizedPnl: number;
}

export type ExecutionStatus = "EXECUTED" | "FAILED" | "SKIPPED" | "HELD";

export interface ExecutionResult {
	symbol: string;
	action: TradeAction;
	status: ExecutionStatus;
	quantity: number;
	price: number;
	total: number;
	reason?: string;
	errorCode?: string;
	transaction?: Transaction;
	feedback?: Feedback;
}

export type CycleState =
	| "STARTED"
	| "PREDICTING"
	| "DECIDING"
	| "EXECUTING"
	| "FEEDBACK"
	| "COMPLETE";

/** Everything one cycle produced for one symbol; later stages stay null when skipped. */
export interface SymbolCycleResult {
	symbol: string;
	prediction: Prediction;
	decision: Decision | null;
	execution: ExecutionResult | null;
}

export interface CycleLearningSummary {
	feedbackRecorded: number;
	feedbackSamples: number;
	retrained: boolean;
	method: DecisionMethodName;
}

export interface CycleSummary {
	cycleId: string;
	userId: string;
	startedAt: string;
	completedAt: string;
	durationMs: number;
	riskTolerance: number;
	thresholds: {
		buyThresholdPct: number;
		sellThresholdPct: number;
		minConfidence: number;
	};
	/** States visited, in order, ending with COMPLETE. */
	states: CycleState[];
	timedOut: boolean;
	symbolsAnalyzed: number;
	predictionsMade: number;
	insufficientData: number;
	predictionErrors: number;
	decisions: Record<TradeAction, number>;
	tradesExecuted: number;
	tradesFailed: number;
	tradesSkipped: number;
	learning: CycleLearningSummary | null;
	driftDetected: boolean;
	refitScheduled: boolean;
	portfolio: PortfolioSnapshot;
	performance: TradeStats;
	results: SymbolCycleResult[];
}
