import { CycleSummary } from "@tradeloop/core";
import { describe, expect, it } from "vitest";
import { formatCycleSummary, formatPortfolioHealth, formatSimilarSymbols } from "./summaryReport";

const summary: CycleSummary = {
	cycleId: "cycle-1",
	userId: "alice",
	startedAt: "2024-03-01T00:00:00.000Z",
	completedAt: "2024-03-01T00:00:00.120Z",
	durationMs: 120,
	riskTolerance: 0.5,
	thresholds: { buyThresholdPct: 0.55, sellThresholdPct: -0.55, minConfidence: 0.5 },
	states: ["STARTED", "PREDICTING", "DECIDING", "EXECUTING", "COMPLETE"],
	timedOut: false,
	symbolsAnalyzed: 2,
	predictionsMade: 1,
	insufficientData: 1,
	predictionErrors: 0,
	decisions: { BUY: 1, SELL: 0, HOLD: 0 },
	tradesExecuted: 1,
	tradesFailed: 0,
	tradesSkipped: 0,
	learning: null,
	driftDetected: false,
	refitScheduled: false,
	portfolio: {
		userId: "alice",
		cash: 90_000,
		startingCash: 100_000,
		positionsValue: 10_000,
		totalValue: 100_000,
		totalReturn: 0,
		totalReturnPct: 0,
		positionsCount: 1,
		positions: [],
	},
	performance: {
		totalTrades: 1,
		buys: 1,
		sells: 0,
		wins: 0,
		losses: 0,
		breakeven: 0,
		winRate: 0,
		realizedPnl: 0,
	},
	results: [
		{
			symbol: "AAPL",
			prediction: {
				symbol: "AAPL",
				status: "predicted",
				currentPrice: 100,
				predictedPrice: 102,
				predictedChangePct: 2,
				confidence: 0.9,
				direction: "UP",
				indicators: null,
			},
			decision: {
				symbol: "AAPL",
				action: "BUY",
				confidence: 0.9,
				reasons: ["ML predicts +2.00% gain"],
				suggestedPositionSize: 0.095,
				method: "rule_based",
				riskTolerance: 0.5,
				currentPrice: 100,
				predictedChangePct: 2,
				signal: null,
			},
			execution: {
				symbol: "AAPL",
				action: "BUY",
				status: "EXECUTED",
				quantity: 95,
				price: 100,
				total: 9_500,
			},
		},
		{
			symbol: "MSFT",
			prediction: {
				symbol: "MSFT",
				status: "insufficient_data",
				currentPrice: 50,
				predictedPrice: 50,
				predictedChangePct: 0,
				confidence: 0,
				direction: "STABLE",
				indicators: null,
				errorCode: "INSUFFICIENT_DATA",
			},
			decision: null,
			execution: null,
		},
	],
};

describe("formatCycleSummary", () => {
	it("prints one line per symbol between the headline and the portfolio", () => {
		expect(formatCycleSummary(summary)).toEqual([
			"---- Cycle cycle-1 ----",
			"User: alice (risk tolerance 0.5)",
			"States: STARTED -> PREDICTING -> DECIDING -> EXECUTING -> COMPLETE",
			"Symbols analyzed: 2 (predicted 1, insufficient 1, errors 0)",
			"Decisions: BUY 1 / SELL 0 / HOLD 0",
			"Trades executed: 1 (failed 0, skipped 0)",
			"AAPL: +2.00% | conf 0.90 | BUY via rule_based | EXECUTED 95 @ $100.00",
			"MSFT: insufficient_data (INSUFFICIENT_DATA)",
			"Cash: $90000.00",
			"Total value: $100000.00 (+0.00%)",
			"Duration: 120ms",
		]);
	});

	it("flags a timed-out cycle and shows why an order failed", () => {
		const lines = formatCycleSummary({
			...summary,
			timedOut: true,
			results: [
				{
					...summary.results[0],
					execution: {
						symbol: "AAPL",
						action: "BUY",
						status: "FAILED",
						quantity: 0,
						price: 100,
						total: 0,
						reason: "Insufficient funds",
					},
				},
			],
		});
		expect(lines[2]).toBe(
			"States: STARTED -> PREDICTING -> DECIDING -> EXECUTING -> COMPLETE [timed out]"
		);
		expect(lines[6]).toBe("AAPL: +2.00% | conf 0.90 | BUY via rule_based | FAILED (Insufficient funds)");
	});
});

describe("formatPortfolioHealth", () => {
	it("lists weights, performers and recommendations", () => {
		expect(
			formatPortfolioHealth({
				status: "needs_diversification",
				totalValue: 10_000,
				cashPct: 75,
				positionsCount: 2,
				diversificationScore: 0.2,
				concentration: [
					{ symbol: "AAA", pct: 15 },
					{ symbol: "BBB", pct: 10 },
				],
				topPerformers: [{ symbol: "AAA", returnPct: 20 }],
				underperformers: [],
				recommendations: ["Spread holdings across more symbols (holding 2)"],
			})
		).toEqual([
			"Portfolio health: needs_diversification (diversification 0.20, cash 75.0%)",
			"Largest holdings: AAA 15.0%, BBB 10.0%",
			"Top performers: AAA +20.00%",
			"- Spread holdings across more symbols (holding 2)",
		]);
	});
});

describe("formatSimilarSymbols", () => {
	it("prints one line per match", () => {
		expect(
			formatSimilarSymbols("AAPL", [
				{ symbol: "MSFT", similarity: 0.98765, currentPrice: 50, priceChange1dPct: -1.5 },
			])
		).toEqual(["Similar to AAPL:", "  MSFT 0.988 @ $50.00 (-1.50%)"]);
	});

	it("says when nothing could be compared", () => {
		expect(formatSimilarSymbols("AAPL", [])).toEqual([
			"No symbols with enough history to compare against AAPL",
		]);
	});
});
