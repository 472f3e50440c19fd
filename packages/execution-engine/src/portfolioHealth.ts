import { PortfolioSnapshot } from "@tradeloop/core";

export type PortfolioHealthStatus = "empty" | "healthy" | "needs_diversification";

export interface HoldingReturn {
	symbol: string;
	returnPct: number;
}

export interface SymbolWeight {
	symbol: string;
	/** Share of total portfolio value, in percent. */
	pct: number;
}

export interface PortfolioHealth {
	status: PortfolioHealthStatus;
	totalValue: number;
	cashPct: number;
	positionsCount: number;
	/** 0..1; reaches 1 at five or more holdings. */
	diversificationScore: number;
	/** Largest holding first. */
	concentration: SymbolWeight[];
	topPerformers: HoldingReturn[];
	underperformers: HoldingReturn[];
	recommendations: string[];
}

export interface HealthOptions {
	/** Unrealised return, in percent, past which a holding is a top or under performer. */
	performerThresholdPct?: number;
	listSize?: number;
	/** A single holding above this share of the portfolio is flagged. */
	maxConcentrationPct?: number;
}

const HEALTHY_SCORE = 0.5;

/**
 * Health check over a marked snapshot. Each symbol is its own group, so the
 * score grows with the square of the number of holdings.
 */
export function analyzePortfolioHealth(
	snapshot: PortfolioSnapshot,
	options: HealthOptions = {}
): PortfolioHealth {
	const threshold = options.performerThresholdPct ?? 10;
	const listSize = options.listSize ?? 5;
	const maxConcentrationPct = options.maxConcentrationPct ?? 40;
	const { totalValue, positions } = snapshot;
	const cashPct = totalValue > 0 ? (snapshot.cash / totalValue) * 100 : 0;

	if (positions.length === 0) {
		return {
			status: "empty",
			totalValue,
			cashPct,
			positionsCount: 0,
			diversificationScore: 0,
			concentration: [],
			topPerformers: [],
			underperformers: [],
			recommendations: ["Start building portfolio with diversified positions"],
		};
	}

	const returns: HoldingReturn[] = positions.map((position) => ({
		symbol: position.symbol,
		returnPct:
			position.avgBuyPrice > 0
				? ((position.markPrice - position.avgBuyPrice) / position.avgBuyPrice) * 100
				: 0,
	}));
	const concentration = positions
		.map((position) => ({
			symbol: position.symbol,
			pct: totalValue > 0 ? (position.currentValue / totalValue) * 100 : 0,
		}))
		.sort((a, b) => b.pct - a.pct);
	const count = positions.length;
	const diversificationScore = Math.min(1, (count * count) / 20);
	const status = diversificationScore > HEALTHY_SCORE ? "healthy" : "needs_diversification";

	const recommendations: string[] = [];
	if (status === "needs_diversification") {
		recommendations.push(`Spread holdings across more symbols (holding ${count})`);
	}
	const largest = concentration[0];
	if (largest && largest.pct > maxConcentrationPct) {
		recommendations.push(
			`${largest.symbol} is ${largest.pct.toFixed(1)}% of the portfolio; consider trimming it`
		);
	}

	return {
		status,
		totalValue,
		cashPct,
		positionsCount: count,
		diversificationScore,
		concentration,
		topPerformers: returns
			.filter((entry) => entry.returnPct > threshold)
			.sort((a, b) => b.returnPct - a.returnPct)
			.slice(0, listSize),
		underperformers: returns
			.filter((entry) => entry.returnPct < -threshold)
			.sort((a, b) => a.returnPct - b.returnPct)
			.slice(0, listSize),
		recommendations,
	};
}
