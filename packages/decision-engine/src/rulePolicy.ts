import { Prediction, TradeAction } from "@tradeloop/core";
import {
	getThresholds,
	OVERBOUGHT_RSI,
	OVERSOLD_RSI,
} from "./thresholds";

export interface PolicyVerdict {
	action: TradeAction;
	confidence: number;
	reasons: string[];
}

const signed = (value: number): string =>
	`${value >= 0 ? "+" : ""}${value.toFixed(2)}`;

export const NO_PREDICTION_VERDICT: PolicyVerdict = {
	action: "HOLD",
	confidence: 0,
	reasons: ["No prediction available"],
};

/**
 * Fixed-threshold policy. Thresholds are strict, so a prediction exactly on a
 * threshold holds. Pure: the same prediction and tolerance give the same verdict.
 */
export function ruleVerdict(
	prediction: Prediction,
	riskTolerance: number
): PolicyVerdict {
	if (prediction.status !== "predicted") {
		return { ...NO_PREDICTION_VERDICT, reasons: [...NO_PREDICTION_VERDICT.reasons] };
	}

	const thresholds = getThresholds(riskTolerance);
	const change = prediction.predictedChangePct;
	const confidence = prediction.confidence;
	const rsi = prediction.indicators?.rsi ?? 50;
	const confident = confidence >= thresholds.minConfidence;

	if (change > thresholds.buyThresholdPct && confident) {
		if (rsi < OVERBOUGHT_RSI) {
			return {
				action: "BUY",
				confidence,
				reasons: [
					`ML predicts ${signed(change)}% gain`,
					`RSI at ${rsi.toFixed(0)} (not overbought)`,
				],
			};
		}
		return {
			action: "HOLD",
			confidence: 0.5,
			reasons: [`Overbought condition (RSI > ${OVERBOUGHT_RSI})`],
		};
	}

	if (change < thresholds.sellThresholdPct && confident) {
		if (rsi > OVERSOLD_RSI) {
			return {
				action: "SELL",
				confidence,
				reasons: [
					`ML predicts ${change.toFixed(2)}% loss`,
					`RSI at ${rsi.toFixed(0)} (not oversold)`,
				],
			};
		}
		return {
			action: "HOLD",
			confidence: 0.5,
			reasons: [`Oversold condition (RSI < ${OVERSOLD_RSI})`],
		};
	}

	return {
		action: "HOLD",
		confidence: 0.5,
		reasons: [
			"Prediction below threshold or low confidence",
			`Predicted change: ${signed(change)}%`,
		],
	};
}
