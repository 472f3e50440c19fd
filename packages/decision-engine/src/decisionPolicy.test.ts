import { ConfigurationError, DEFAULT_PIPELINE_CONFIG } from "@tradeloop/core";
import { describe, expect, it } from "vitest";
import { buildFeedback, buildPrediction, withRsi } from "./__tests__/fixtures";
import { DecisionPolicy } from "./decisionPolicy";
import { DECISION_INPUT_NAMES, labelFor } from "./feedbackStore";
import { LearnedDecisionModel } from "./learnedPolicy";

const createPolicy = (): DecisionPolicy =>
	new DecisionPolicy(
		{ ...DEFAULT_PIPELINE_CONFIG.decision, minFeedbackSamples: 30, classifierTrees: 20 },
		DEFAULT_PIPELINE_CONFIG.risk
	);

/** Gains follow positive predictions and losses negative ones. */
const separableFeedback = () =>
	Array.from({ length: 30 }, (_, i) => {
		const predicted = i % 2 === 0 ? 1 + i / 10 : -1 - i / 10;
		return buildFeedback(predicted > 0 ? 5 : -5, { predictedChangePct: predicted });
	});

describe("DecisionPolicy.decide", () => {
	it("buys scenario A with a confidence-scaled size and protective levels", () => {
		const decision = createPolicy().decide(buildPrediction(), 0.5, {
			heldValue: 0,
			totalValue: 10_000,
		});
		expect(decision.action).toBe("BUY");
		expect(decision.method).toBe("rule_based");
		expect(decision.suggestedPositionSize).toBeCloseTo(0.089, 12);
		expect(decision.stopLoss).toBe(95);
		expect(decision.takeProfit).toBe(110);
		expect(decision.signal).toEqual({
			predictedChangePct: 1.45,
			predictedPrice: 101.45,
			confidence: 0.78,
			rsi: 55,
			macd: 0.4,
			bbPosition: 0.6,
			riskTolerance: 0.5,
		});
	});

	it("holds scenario B with nothing to size", () => {
		const decision = createPolicy().decide(withRsi(75), 0.5);
		expect(decision.action).toBe("HOLD");
		expect(decision.suggestedPositionSize).toBe(0);
		expect(decision.stopLoss).toBeUndefined();
	});

	it("sizes a SELL by the share currently held", () => {
		const decision = createPolicy().decide(
			withRsi(45, { predictedChangePct: -1.2, confidence: 0.7 }),
			0.5,
			{ heldValue: 2_000, totalValue: 10_000 }
		);
		expect(decision.action).toBe("SELL");
		expect(decision.suggestedPositionSize).toBe(0.2);
	});

	it("carries no entry signal for a symbol without a prediction", () => {
		const decision = createPolicy().decide(
			buildPrediction({ status: "error", indicators: null }),
			0.5
		);
		expect(decision.action).toBe("HOLD");
		expect(decision.confidence).toBe(0);
		expect(decision.signal).toBeNull();
	});

	it("rejects a malformed risk tolerance", () => {
		expect(() => createPolicy().decide(buildPrediction(), 2)).toThrow(ConfigurationError);
	});
});

describe("DecisionPolicy learning", () => {
	it("stays rule based below the sample gate", async () => {
		const policy = createPolicy();
		const update = await policy.recordFeedback(separableFeedback().slice(0, 29));
		expect(update.retrained).toBe(false);
		expect(update.method).toBe("rule_based");
		expect(policy.method.kind).toBe("rule");
	});

	it("switches to the learned classifier once the gate is met", async () => {
		const policy = createPolicy();
		const update = await policy.recordFeedback(separableFeedback());
		expect(update).toEqual({
			recorded: 30,
			feedbackSamples: 30,
			labeledSamples: 30,
			retrained: true,
			method: "ml_model",
		});

		const decision = policy.decide(
			buildPrediction({ predictedChangePct: 3, confidence: 0.7 }),
			0.5
		);
		expect(decision.method).toBe("ml_model");
		expect(decision.action).toBe("BUY");
		expect(decision.reasons[0]).toMatch(/^ML model decision with \d+% confidence$/);
	});

	it("falls back to rules when the classifier is unsure", async () => {
		const policy = createPolicy();
		// Identical inputs with evenly split outcomes leave every class near 1/3.
		const mixed = Array.from({ length: 30 }, (_, i) =>
			buildFeedback([5, 0, -5][i % 3])
		);
		await policy.recordFeedback(mixed);
		expect(policy.method.kind).toBe("learned");

		const decision = policy.decide(buildPrediction(), 0.5);
		expect(decision.method).toBe("rule_based");
		expect(decision.action).toBe("BUY");
	});

	it("stores feedback without an entry signal but does not train on it", async () => {
		const policy = createPolicy();
		await policy.recordFeedback([buildFeedback(3, null), buildFeedback(-3)]);
		const status = policy.status();
		expect(status.feedbackSamples).toBe(2);
		expect(status.labeledSamples).toBe(1);
		expect(status.accuracy.correct).toBe(1);
		expect(status.learnedModelSamples).toBeNull();
	});

	it("attributes the classifier's splits to the inputs that vary", async () => {
		const policy = createPolicy();
		await policy.recordFeedback(separableFeedback());
		const importances = policy.learnedModel?.inputImportances() ?? [];

		expect(importances.map((entry) => entry.input)).toEqual([...DECISION_INPUT_NAMES]);
		// Only the predicted change differs between the stored entry signals.
		expect(importances[0]).toEqual({ input: "predicted_change_pct", importance: 1 });
		expect(importances.slice(1).every((entry) => entry.importance === 0)).toBe(true);
	});

	it("restores a trained classifier from JSON", async () => {
		const policy = createPolicy();
		await policy.recordFeedback(separableFeedback());
		const model = policy.learnedModel;
		expect(model).not.toBeNull();
		if (!model) {
			return;
		}
		const restored = createPolicy();
		restored.adoptLearnedModel(
			LearnedDecisionModel.fromJSON(JSON.parse(JSON.stringify(model)))
		);
		const prediction = buildPrediction({ predictedChangePct: -2, confidence: 0.7 });
		expect(restored.decide(prediction, 0.5)).toEqual(policy.decide(prediction, 0.5));
	});
});

describe("labelFor", () => {
	it("labels realised moves beyond the threshold", () => {
		expect(labelFor(2.5, 2)).toBe("BUY");
		expect(labelFor(-2.5, 2)).toBe("SELL");
		expect(labelFor(2, 2)).toBe("HOLD");
	});
});
