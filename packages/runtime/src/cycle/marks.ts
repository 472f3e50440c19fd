import { Prediction } from "@tradeloop/core";

/** Latest close per symbol from this cycle's predictions, skipping unpriced ones. */
export const priceMarks = (predictions: readonly Prediction[]): Map<string, number> => {
	const marks = new Map<string, number>();
	for (const prediction of predictions) {
		if (Number.isFinite(prediction.currentPrice) && prediction.currentPrice > 0) {
			marks.set(prediction.symbol, prediction.currentPrice);
		}
	}
	return marks;
};
