import { DecisionConfig, Prediction, TradeAction } from "@tradeloop/core";
import { z } from "zod";
import {
	ForestState,
	RandomForestClassifier,
} from "@tradeloop/models-quant";
import {
	DECISION_CLASSES,
	DECISION_INPUT_NAMES,
	decisionInputs,
	InputImportance,
	LabeledSet,
} from "./feedbackStore";

export interface LearnedVerdict {
	action: TradeAction;
	/** Probability the classifier assigns to its top class. */
	probability: number;
}

const learnedStateSchema = z.object({
	forest: z.unknown(),
	trainedOn: z.number().int().min(0),
});

/** Feedback-trained BUY/SELL/HOLD classifier. */
export class LearnedDecisionModel {
	private constructor(
		private readonly forest: RandomForestClassifier,
		readonly trainedOn: number
	) {}

	static async train(
		set: LabeledSet,
		config: DecisionConfig,
		signal?: AbortSignal
	): Promise<LearnedDecisionModel> {
		const featureCount = DECISION_INPUT_NAMES.length;
		const forest = new RandomForestClassifier(
			{
				trees: config.classifierTrees,
				maxDepth: config.classifierMaxDepth,
				minSamplesLeaf: 1,
				minSamplesSplit: 2,
				maxFeatures: Math.sqrt(featureCount) / featureCount,
				seed: config.seed,
			},
			DECISION_CLASSES.length
		);
		await forest.fitAsync(set.rows, set.labels, { batchSize: 10, signal });
		return new LearnedDecisionModel(forest, set.rows.length);
	}

	static fromJSON(raw: unknown): LearnedDecisionModel {
		const state = learnedStateSchema.parse(raw);
		return new LearnedDecisionModel(
			RandomForestClassifier.fromJSON(state.forest),
			state.trainedOn
		);
	}

	verdict(prediction: Prediction, riskTolerance: number): LearnedVerdict {
		const proba = this.forest.predictProba(
			decisionInputs({
				predictedChangePct: prediction.predictedChangePct,
				predictedPrice: prediction.predictedPrice,
				confidence: prediction.confidence,
				rsi: prediction.indicators?.rsi ?? 50,
				macd: prediction.indicators?.macd ?? 0,
				bbPosition: prediction.indicators?.bbPosition ?? 0.5,
				riskTolerance,
			})
		);
		let best = 0;
		for (let i = 1; i < proba.length; i += 1) {
			if (proba[i] > proba[best]) {
				best = i;
			}
		}
		return { action: DECISION_CLASSES[best] ?? "HOLD", probability: proba[best] ?? 0 };
	}

	inputImportances(): InputImportance[] {
		const importances = this.forest.featureImportances();
		return DECISION_INPUT_NAMES.map((input, i) => ({
			input,
			importance: importances[i] ?? 0,
		}));
	}

	toJSON(): { forest: ForestState; trainedOn: number } {
		return { forest: this.forest.toJSON(), trainedOn: this.trainedOn };
	}
}
