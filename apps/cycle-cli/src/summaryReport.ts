import { CycleSummary, SymbolCycleResult } from "@tradeloop/core";
import type { HoldingReturn, PortfolioHealth } from "@tradeloop/execution-engine";
import type { SimilarSymbol } from "@tradeloop/indicators";

const formatUsd = (value: number): string => `$${value.toFixed(2)}`;

const signedPct = (value: number): string => `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;

const describeResult = (result: SymbolCycleResult): string => {
	const { prediction, decision, execution } = result;
	if (prediction.status !== "predicted") {
		return `${result.symbol}: ${prediction.status} (${prediction.errorCode ?? "no code"})`;
	}
	const parts = [
		`${result.symbol}: ${signedPct(prediction.predictedChangePct)}`,
		`conf ${prediction.confidence.toFixed(2)}`,
	];
	if (decision) {
		parts.push(`${decision.action} via ${decision.method}`);
	}
	if (execution) {
		parts.push(
			execution.status === "EXECUTED"
				? `${execution.status} ${execution.quantity} @ ${formatUsd(execution.price)}`
				: `${execution.status}${execution.reason ? ` (${execution.reason})` : ""}`
		);
	}
	return parts.join(" | ");
};

/** Console report for one cycle, one line per fact. */
export const formatCycleSummary = (summary: CycleSummary): string[] => [
	`---- Cycle ${summary.cycleId} ----`,
	`User: ${summary.userId} (risk tolerance ${summary.riskTolerance})`,
	`States: ${summary.states.join(" -> ")}${summary.timedOut ? " [timed out]" : ""}`,
	`Symbols analyzed: ${summary.symbolsAnalyzed} (predicted ${summary.predictionsMade}, insufficient ${summary.insufficientData}, errors ${summary.predictionErrors})`,
	`Decisions: BUY ${summary.decisions.BUY} / SELL ${summary.decisions.SELL} / HOLD ${summary.decisions.HOLD}`,
	`Trades executed: ${summary.tradesExecuted} (failed ${summary.tradesFailed}, skipped ${summary.tradesSkipped})`,
	...summary.results.map(describeResult),
	`Cash: ${formatUsd(summary.portfolio.cash)}`,
	`Total value: ${formatUsd(summary.portfolio.totalValue)} (${signedPct(summary.portfolio.totalReturnPct)})`,
	`Duration: ${summary.durationMs}ms`,
];

const listReturns = (label: string, entries: HoldingReturn[]): string[] =>
	entries.length > 0
		? [`${label}: ${entries.map((entry) => `${entry.symbol} ${signedPct(entry.returnPct)}`).join(", ")}`]
		: [];

export const formatPortfolioHealth = (health: PortfolioHealth): string[] => [
	`Portfolio health: ${health.status} (diversification ${health.diversificationScore.toFixed(2)}, cash ${health.cashPct.toFixed(1)}%)`,
	...(health.concentration.length > 0
		? [
				`Largest holdings: ${health.concentration
					.slice(0, 3)
					.map((entry) => `${entry.symbol} ${entry.pct.toFixed(1)}%`)
					.join(", ")}`,
			]
		: []),
	...listReturns("Top performers", health.topPerformers),
	...listReturns("Underperformers", health.underperformers),
	...health.recommendations.map((recommendation) => `- ${recommendation}`),
];

export const formatSimilarSymbols = (symbol: string, similar: SimilarSymbol[]): string[] =>
	similar.length === 0
		? [`No symbols with enough history to compare against ${symbol}`]
		: [
				`Similar to ${symbol}:`,
				...similar.map(
					(entry) =>
						`  ${entry.symbol} ${entry.similarity.toFixed(3)} @ ${formatUsd(entry.currentPrice)} (${signedPct(entry.priceChange1dPct)})`
				),
			];
