import { Decision, DEFAULT_PIPELINE_CONFIG, ExecutionConfig } from "@tradeloop/core";
import { describe, expect, it } from "vitest";
import { ExecutionEngine } from "./executionEngine";
import { LedgerRegistry } from "./ledgerRegistry";
import { PortfolioLedger } from "./portfolioLedger";

const createEngine = (overrides: Partial<ExecutionConfig> = {}): ExecutionEngine =>
	new ExecutionEngine({ ...DEFAULT_PIPELINE_CONFIG.execution, ...overrides });

const createLedger = (startingCash = 1_000): PortfolioLedger =>
	new PortfolioLedger({ userId: "user-1", startingCash });

const buildDecision = (overrides: Partial<Decision> = {}): Decision => ({
	symbol: "AAPL",
	action: "BUY",
	confidence: 0.8,
	reasons: ["test"],
	suggestedPositionSize: 0.5,
	method: "rule_based",
	riskTolerance: 0.5,
	currentPrice: 100,
	predictedChangePct: 2,
	signal: null,
	...overrides,
});

describe("ExecutionEngine", () => {
	it("sizes a BUY from the portfolio value and floors to whole shares", () => {
		const ledger = createLedger();
		const result = createEngine().execute(buildDecision(), { currentPrice: 100 }, ledger);
		expect(result).toMatchObject({
			symbol: "AAPL",
			action: "BUY",
			status: "EXECUTED",
			quantity: 5,
			price: 100,
			total: 500,
		});
		expect(ledger.cashBalance).toBe(500);
	});

	it("skips a BUY that rounds to zero shares", () => {
		const ledger = createLedger();
		const result = createEngine().execute(
			buildDecision({ suggestedPositionSize: 0.05 }),
			{ currentPrice: 120 },
			ledger
		);
		expect(result.status).toBe("SKIPPED");
		expect(result.quantity).toBe(0);
		expect(ledger.transactionLog()).toHaveLength(0);
	});

	it("fails a BUY the cash cannot cover", () => {
		const ledger = createLedger();
		ledger.buy("MSFT", 9, 100);
		// Total value is still 1000, so a full-size order wants 10 shares.
		const result = createEngine().execute(
			buildDecision({ suggestedPositionSize: 1 }),
			{},
			ledger
		);
		expect(result.status).toBe("FAILED");
		expect(result.errorCode).toBe("INSUFFICIENT_FUNDS");
		expect(result.reason).toBe("Insufficient funds for AAPL. Need $1000.00, have $100.00");
		expect(ledger.cashBalance).toBe(100);
	});

	it("executes HOLD as a no-op", () => {
		const ledger = createLedger();
		const result = createEngine().execute(
			buildDecision({ action: "HOLD", reasons: ["Overbought condition (RSI > 70)"] }),
			{},
			ledger
		);
		expect(result.status).toBe("HELD");
		expect(result.reason).toBe("Overbought condition (RSI > 70)");
		expect(ledger.transactionLog()).toHaveLength(0);
	});

	it("sells the whole position by default and returns feedback", () => {
		const ledger = createLedger();
		ledger.buy("AAPL", 4, 100);
		const result = createEngine().execute(
			buildDecision({ action: "SELL", suggestedPositionSize: 0.01 }),
			{ currentPrice: 110 },
			ledger
		);
		expect(result.status).toBe("EXECUTED");
		expect(result.quantity).toBe(4);
		expect(result.total).toBe(440);
		expect(result.feedback?.profitLoss).toBe(40);
		expect(ledger.position("AAPL")).toBeNull();
	});

	it("fails a SELL without a position", () => {
		const result = createEngine().execute(buildDecision({ action: "SELL" }), {}, createLedger());
		expect(result.status).toBe("FAILED");
		expect(result.errorCode).toBe("INSUFFICIENT_SHARES");
	});

	it("rejects a notional oversell by default", () => {
		const ledger = createLedger();
		ledger.buy("AAPL", 2, 100);
		const result = createEngine({ sellSizing: "notional" }).execute(
			buildDecision({ action: "SELL", suggestedPositionSize: 0.5 }),
			{},
			ledger
		);
		expect(result.status).toBe("FAILED");
		expect(result.reason).toBe("Insufficient shares of AAPL. Have 2, trying to sell 5");
		expect(ledger.position("AAPL")?.quantity).toBe(2);
	});

	it("clips a notional oversell to the held quantity when configured", () => {
		const ledger = createLedger();
		ledger.buy("AAPL", 2, 100);
		const result = createEngine({ sellSizing: "notional", oversell: "clip" }).execute(
			buildDecision({ action: "SELL", suggestedPositionSize: 0.5 }),
			{},
			ledger
		);
		expect(result.status).toBe("EXECUTED");
		expect(result.quantity).toBe(2);
		expect(ledger.position("AAPL")).toBeNull();
	});
});

describe("LedgerRegistry", () => {
	it("runs tasks for one user strictly one after another", async () => {
		const registry = new LedgerRegistry({ startingCash: 1_000 });
		const order: string[] = [];
		const slow = registry.withLedger("u1", async (ledger) => {
			order.push("slow:start");
			await new Promise((resolve) => setTimeout(resolve, 20));
			ledger.buy("AAPL", 1, 100);
			order.push("slow:end");
		});
		const fast = registry.withLedger("u1", (ledger) => {
			order.push(`fast:${ledger.cashBalance}`);
		});
		await Promise.all([slow, fast]);
		expect(order).toEqual(["slow:start", "slow:end", "fast:900"]);
	});

	it("keeps separate ledgers per user", async () => {
		const registry = new LedgerRegistry({ startingCash: 500 });
		await registry.withLedger("a", (ledger) => ledger.buy("AAPL", 1, 100));
		expect((await registry.snapshot("a")).cash).toBe(400);
		expect((await registry.snapshot("b")).cash).toBe(500);
		expect(registry.users()).toEqual(["a", "b"]);
	});

	it("propagates task errors to the caller", async () => {
		const registry = new LedgerRegistry({ startingCash: 100 });
		await expect(
			registry.withLedger("a", (ledger) => ledger.buy("AAPL", 5, 100))
		).rejects.toThrow("Insufficient funds for AAPL");
	});
});
