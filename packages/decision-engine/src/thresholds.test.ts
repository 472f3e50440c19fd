import { ConfigurationError } from "@tradeloop/core";
import { describe, expect, it } from "vitest";
import { buyThreshold, getThresholds, minConfidence, sellThreshold } from "./thresholds";

describe("thresholds", () => {
	it.each([
		[0, 1.0, 0.6],
		[0.5, 0.55, 0.5],
		[1, 0.1, 0.4],
	])("r=%s gives buy %s%% and confidence %s", (r, buy, confidence) => {
		expect(buyThreshold(r)).toBeCloseTo(buy, 12);
		expect(sellThreshold(r)).toBeCloseTo(-buy, 12);
		expect(minConfidence(r)).toBeCloseTo(confidence, 12);
	});

	it("reports all three thresholds together", () => {
		const report = getThresholds(0.5);
		expect(report.riskTolerance).toBe(0.5);
		expect(report.buyThresholdPct).toBeCloseTo(0.55, 12);
		expect(report.sellThresholdPct).toBeCloseTo(-0.55, 12);
		expect(report.minConfidence).toBeCloseTo(0.5, 12);
	});

	it("rejects a tolerance outside the unit interval", () => {
		expect(() => getThresholds(1.5)).toThrow(ConfigurationError);
		expect(() => getThresholds(-0.1)).toThrow(ConfigurationError);
	});
});
