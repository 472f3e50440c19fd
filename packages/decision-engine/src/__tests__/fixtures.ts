import { EntrySignal, Feedback, Prediction } from "@tradeloop/core";

export const buildPrediction = (overrides: Partial<Prediction> = {}): Prediction => ({
	symbol: "AAPL",
	status: "predicted",
	date: "2024-03-01",
	currentPrice: 100,
	predictedPrice: 101.45,
	predictedChangePct: 1.45,
	confidence: 0.78,
	direction: "UP",
	indicators: {
		rsi: 55,
		macd: 0.4,
		macdSignal: 0.3,
		bbPosition: 0.6,
		distanceMa20Pct: 1.2,
	},
	...overrides,
});

export const withRsi = (rsi: number, overrides: Partial<Prediction> = {}): Prediction => {
	const base = buildPrediction(overrides);
	return {
		...base,
		indicators: base.indicators ? { ...base.indicators, rsi } : null,
	};
};

export const buildFeedback = (
	actualChangePct: number,
	signal: Partial<EntrySignal> | null = {}
): Feedback => ({
	symbol: "AAPL",
	tradeType: "SELL",
	entryPrice: 100,
	exitPrice: 100 * (1 + actualChangePct / 100),
	quantity: 10,
	profitLoss: 10 * actualChangePct,
	actualChangePct,
	predictedChangePct: signal?.predictedChangePct ?? null,
	wasCorrect: actualChangePct > 0,
	predictionError: 0,
	withinTolerance: true,
	entrySignal:
		signal === null
			? null
			: {
					predictedChangePct: 1,
					predictedPrice: 101,
					confidence: 0.7,
					rsi: 50,
					macd: 0,
					bbPosition: 0.5,
					riskTolerance: 0.5,
					...signal,
				},
	timestamp: "2024-03-05T00:00:00.000Z",
});
