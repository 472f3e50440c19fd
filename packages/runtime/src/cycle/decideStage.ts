import { Decision, PortfolioSnapshot, Prediction } from "@tradeloop/core";
import { DecisionPolicy } from "@tradeloop/decision-engine";
import { ExposureSnapshot } from "@tradeloop/risk-engine";
import { priceMarks } from "./marks";

/** Values every holding at this cycle's price where one exists, its last mark otherwise. */
export const exposureFor = (
	symbol: string,
	portfolio: PortfolioSnapshot,
	marks: ReadonlyMap<string, number>
): ExposureSnapshot => {
	let heldValue = 0;
	let totalValue = portfolio.cash;
	for (const position of portfolio.positions) {
		const value = position.quantity * (marks.get(position.symbol) ?? position.markPrice);
		totalValue += value;
		if (position.symbol === symbol) {
			heldValue = value;
		}
	}
	return { heldValue, totalValue };
};

/** Decisions for every successful prediction; degraded symbols map to null. */
export function decideStage(
	predictions: readonly Prediction[],
	policy: DecisionPolicy,
	riskTolerance: number,
	portfolio: PortfolioSnapshot
): Array<Decision | null> {
	const marks = priceMarks(predictions);
	return predictions.map((prediction) =>
		prediction.status === "predicted"
			? policy.decide(
					prediction,
					riskTolerance,
					exposureFor(prediction.symbol, portfolio, marks)
				)
			: null
	);
}
