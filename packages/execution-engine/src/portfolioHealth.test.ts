import { describe, expect, it } from "vitest";
import { analyzePortfolioHealth } from "./portfolioHealth";
import { PortfolioLedger } from "./portfolioLedger";

const createLedger = (startingCash: number): PortfolioLedger =>
	new PortfolioLedger({ userId: "user-1", startingCash });

describe("analyzePortfolioHealth", () => {
	it("reports an empty portfolio", () => {
		const health = analyzePortfolioHealth(createLedger(1_000).snapshot());
		expect(health).toEqual({
			status: "empty",
			totalValue: 1_000,
			cashPct: 100,
			positionsCount: 0,
			diversificationScore: 0,
			concentration: [],
			topPerformers: [],
			underperformers: [],
			recommendations: ["Start building portfolio with diversified positions"],
		});
	});

	it("ranks holdings by weight and unrealised return", () => {
		const ledger = createLedger(10_000);
		ledger.buy("AAA", 10, 100);
		ledger.buy("BBB", 20, 50);
		ledger.buy("CCC", 5, 100);
		const snapshot = ledger.markToMarket(
			new Map([
				["AAA", 120],
				["BBB", 40],
				["CCC", 105],
			])
		);

		const health = analyzePortfolioHealth(snapshot);
		expect(health.status).toBe("needs_diversification");
		expect(health.totalValue).toBe(10_025);
		expect(health.cashPct).toBeCloseTo((7_500 / 10_025) * 100, 9);
		expect(health.diversificationScore).toBeCloseTo(0.45, 12);
		expect(health.concentration.map((entry) => entry.symbol)).toEqual(["AAA", "BBB", "CCC"]);
		expect(health.concentration[0].pct).toBeCloseTo((1_200 / 10_025) * 100, 9);
		expect(health.topPerformers).toHaveLength(1);
		expect(health.topPerformers[0].symbol).toBe("AAA");
		expect(health.topPerformers[0].returnPct).toBeCloseTo(20, 9);
		expect(health.underperformers).toHaveLength(1);
		expect(health.underperformers[0].symbol).toBe("BBB");
		expect(health.underperformers[0].returnPct).toBeCloseTo(-20, 9);
		expect(health.recommendations).toEqual(["Spread holdings across more symbols (holding 3)"]);
	});

	it("flags a single dominant holding", () => {
		const ledger = createLedger(1_000);
		ledger.buy("AAA", 8, 100);

		const health = analyzePortfolioHealth(ledger.snapshot());
		expect(health.diversificationScore).toBeCloseTo(0.05, 12);
		expect(health.recommendations).toEqual([
			"Spread holdings across more symbols (holding 1)",
			"AAA is 80.0% of the portfolio; consider trimming it",
		]);
	});

	it("calls four evenly weighted holdings healthy", () => {
		const ledger = createLedger(10_000);
		for (const symbol of ["AAA", "BBB", "CCC", "DDD"]) {
			ledger.buy(symbol, 10, 100);
		}

		const health = analyzePortfolioHealth(ledger.snapshot());
		expect(health.status).toBe("healthy");
		expect(health.diversificationScore).toBe(0.8);
		expect(health.cashPct).toBeCloseTo(60, 9);
		expect(health.recommendations).toEqual([]);
		expect(health.topPerformers).toEqual([]);
	});
});
