import { EntrySignal, Feedback, TradeAction } from "@tradeloop/core";

/** Classifier output order. */
export const DECISION_CLASSES: readonly TradeAction[] = ["SELL", "HOLD", "BUY"];

export const DECISION_INPUT_NAMES = [
	"predicted_change_pct",
	"confidence",
	"rsi",
	"macd",
	"bb_position",
	"risk_tolerance",
] as const;

export type DecisionInputName = (typeof DECISION_INPUT_NAMES)[number];

export interface InputImportance {
	input: DecisionInputName;
	importance: number;
}

/** Order matches DECISION_INPUT_NAMES. */
export const decisionInputs = (signal: EntrySignal): number[] => [
	signal.predictedChangePct,
	signal.confidence,
	signal.rsi,
	signal.macd,
	signal.bbPosition,
	signal.riskTolerance,
];

/** Realised move past +threshold is a BUY, past -threshold a SELL, else HOLD. */
export const labelFor = (
	actualChangePct: number,
	thresholdPct: number
): TradeAction => {
	if (actualChangePct > thresholdPct) {
		return "BUY";
	}
	if (actualChangePct < -thresholdPct) {
		return "SELL";
	}
	return "HOLD";
};

export interface LabeledSet {
	rows: number[][];
	labels: number[];
}

export interface FeedbackAccuracy {
	samples: number;
	correct: number;
	rate: number;
	withinTolerance: number;
}

export class FeedbackStore {
	private readonly records: Feedback[] = [];

	add(feedback: Feedback): void {
		this.records.push(feedback);
	}

	get size(): number {
		return this.records.length;
	}

	/** Records that can train the classifier: those carrying an entry signal. */
	get labeledCount(): number {
		return this.records.filter((record) => record.entrySignal !== null).length;
	}

	all(): readonly Feedback[] {
		return this.records;
	}

	trainingSet(labelThresholdPct: number): LabeledSet {
		const rows: number[][] = [];
		const labels: number[] = [];
		for (const record of this.records) {
			if (!record.entrySignal) {
				continue;
			}
			rows.push(decisionInputs(record.entrySignal));
			labels.push(
				DECISION_CLASSES.indexOf(labelFor(record.actualChangePct, labelThresholdPct))
			);
		}
		return { rows, labels };
	}

	accuracy(): FeedbackAccuracy {
		const correct = this.records.filter((record) => record.wasCorrect).length;
		return {
			samples: this.records.length,
			correct,
			rate: this.records.length ? correct / this.records.length : 0,
			withinTolerance: this.records.filter((record) => record.withinTolerance)
				.length,
		};
	}
}
