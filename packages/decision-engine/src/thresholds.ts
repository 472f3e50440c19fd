import { assertRiskTolerance } from "@tradeloop/core";

export const OVERBOUGHT_RSI = 70;
export const OVERSOLD_RSI = 30;

export interface DecisionThresholds {
	riskTolerance: number;
	/** Minimum predicted gain, in percent, for a BUY. */
	buyThresholdPct: number;
	/** Maximum predicted change, in percent, for a SELL. */
	sellThresholdPct: number;
	minConfidence: number;
}

export const buyThreshold = (riskTolerance: number): number =>
	1.0 - 0.9 * riskTolerance;

export const sellThreshold = (riskTolerance: number): number =>
	-buyThreshold(riskTolerance);

export const minConfidence = (riskTolerance: number): number =>
	0.6 - 0.2 * riskTolerance;

export const getThresholds = (riskTolerance: number): DecisionThresholds => {
	const r = assertRiskTolerance(riskTolerance);
	return {
		riskTolerance: r,
		buyThresholdPct: buyThreshold(r),
		sellThresholdPct: sellThreshold(r),
		minConfidence: minConfidence(r),
	};
};
