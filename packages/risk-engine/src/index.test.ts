import { describe, expect, it } from "vitest";
import { DEFAULT_PIPELINE_CONFIG, RiskConfig } from "@tradeloop/core";
import { RiskManager } from "./index";

const baseRiskConfig: RiskConfig = {
	...DEFAULT_PIPELINE_CONFIG.risk,
	maxPositionFraction: 0.1,
	stopLossPct: 5,
	takeProfitPct: 10,
};

const createManager = (): RiskManager => new RiskManager(baseRiskConfig);

const exposure = { heldValue: 0, totalValue: 10_000 };

describe("RiskManager.plan", () => {
	it("sizes a BUY between half and all of the cap by confidence", () => {
		const manager = createManager();
		expect(manager.plan("BUY", 0, 100, exposure)?.positionFraction).toBeCloseTo(0.05, 12);
		expect(manager.plan("BUY", 1, 100, exposure)?.positionFraction).toBeCloseTo(0.1, 12);
		expect(manager.plan("BUY", 0.78, 100, exposure)?.positionFraction).toBeCloseTo(0.089, 12);
	});

	it("places stop-loss below and take-profit above a BUY", () => {
		const plan = createManager().plan("BUY", 0.6, 100, exposure);
		expect(plan?.stopLoss).toBe(95);
		expect(plan?.takeProfit).toBe(110);
	});

	it("mirrors levels for a SELL and sizes it by the held share", () => {
		const plan = createManager().plan("SELL", 0.6, 100, {
			heldValue: 2_500,
			totalValue: 10_000,
		});
		expect(plan?.action).toBe("SELL");
		expect(plan?.positionFraction).toBe(0.25);
		expect(plan?.stopLoss).toBe(105);
		expect(plan?.takeProfit).toBe(90);
	});

	it("returns no plan for HOLD", () => {
		expect(createManager().plan("HOLD", 0.9, 100, exposure)).toBeNull();
	});

	it("clamps confidence outside the unit range", () => {
		const manager = createManager();
		expect(manager.entryFraction(3)).toBeCloseTo(0.1, 12);
		expect(manager.entryFraction(-1)).toBeCloseTo(0.05, 12);
	});
});
