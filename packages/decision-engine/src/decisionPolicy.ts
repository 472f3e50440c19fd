import {
	assertRiskTolerance,
	createLogger,
	Decision,
	DecisionConfig,
	DecisionMethodName,
	EntrySignal,
	Feedback,
	Prediction,
	RiskConfig,
} from "@tradeloop/core";
import { ExposureSnapshot, RiskManager } from "@tradeloop/risk-engine";
import { FeedbackAccuracy, FeedbackStore } from "./feedbackStore";
import { LearnedDecisionModel } from "./learnedPolicy";
import { PolicyVerdict, ruleVerdict } from "./rulePolicy";
import { minConfidence } from "./thresholds";

const logger = createLogger("decision-policy");

/** Which policy answers `decide`; chosen by the feedback sample gate. */
export type DecisionMethod =
	| { kind: "rule" }
	| { kind: "learned"; model: LearnedDecisionModel };

export interface LearningUpdate {
	recorded: number;
	feedbackSamples: number;
	labeledSamples: number;
	retrained: boolean;
	method: DecisionMethodName;
}

export interface DecisionPolicyStatus {
	method: DecisionMethodName;
	feedbackSamples: number;
	labeledSamples: number;
	minFeedbackSamples: number;
	learnedModelSamples: number | null;
	accuracy: FeedbackAccuracy;
}

const NO_EXPOSURE: ExposureSnapshot = { heldValue: 0, totalValue: 0 };

const methodName = (method: DecisionMethod): DecisionMethodName =>
	method.kind === "learned" ? "ml_model" : "rule_based";

const entrySignalFor = (
	prediction: Prediction,
	riskTolerance: number
): EntrySignal | null =>
	prediction.status === "predicted"
		? {
				predictedChangePct: prediction.predictedChangePct,
				predictedPrice: prediction.predictedPrice,
				confidence: prediction.confidence,
				rsi: prediction.indicators?.rsi ?? 50,
				macd: prediction.indicators?.macd ?? 0,
				bbPosition: prediction.indicators?.bbPosition ?? 0.5,
				riskTolerance,
			}
		: null;

export class DecisionPolicy {
	private readonly feedback = new FeedbackStore();
	private learned: LearnedDecisionModel | null = null;
	private readonly risk: RiskManager;

	constructor(
		private readonly config: DecisionConfig,
		riskConfig: RiskConfig
	) {
		this.risk = new RiskManager(riskConfig);
	}

	get method(): DecisionMethod {
		if (this.learned && this.learned.trainedOn >= this.config.minFeedbackSamples) {
			return { kind: "learned", model: this.learned };
		}
		return { kind: "rule" };
	}

	get learnedModel(): LearnedDecisionModel | null {
		return this.learned;
	}

	/** Installs a previously trained classifier, subject to the same sample gate. */
	adoptLearnedModel(model: LearnedDecisionModel): void {
		this.learned = model;
	}

	decide(
		prediction: Prediction,
		riskTolerance: number,
		exposure: ExposureSnapshot = NO_EXPOSURE
	): Decision {
		const r = assertRiskTolerance(riskTolerance);
		const { verdict, method } = this.verdictFor(prediction, r);
		const plan = this.risk.plan(
			verdict.action,
			verdict.confidence,
			prediction.currentPrice,
			exposure
		);

		const decision: Decision = {
			symbol: prediction.symbol,
			action: verdict.action,
			confidence: verdict.confidence,
			reasons: verdict.reasons,
			suggestedPositionSize: plan?.positionFraction ?? 0,
			...(plan ? { stopLoss: plan.stopLoss, takeProfit: plan.takeProfit } : {}),
			method,
			riskTolerance: r,
			currentPrice: prediction.currentPrice,
			predictedChangePct: prediction.predictedChangePct,
			signal: entrySignalFor(prediction, r),
		};

		logger.info("decision_made", {
			symbol: decision.symbol,
			action: decision.action,
			confidence: decision.confidence,
			method: decision.method,
			suggestedPositionSize: decision.suggestedPositionSize,
			reasons: decision.reasons,
		});
		return decision;
	}

	/**
	 * Stores feedback and, once enough labelled samples exist, retrains the
	 * classifier. The new model replaces the old one only after training ends.
	 */
	async recordFeedback(
		records: Feedback[],
		signal?: AbortSignal
	): Promise<LearningUpdate> {
		for (const record of records) {
			this.feedback.add(record);
			logger.info("feedback_recorded", {
				symbol: record.symbol,
				wasCorrect: record.wasCorrect,
				actualChangePct: record.actualChangePct,
				predictionError: record.predictionError,
			});
		}

		const labeledSamples = this.feedback.labeledCount;
		let retrained = false;
		if (records.length > 0 && labeledSamples >= this.config.minFeedbackSamples) {
			const set = this.feedback.trainingSet(this.config.labelThresholdPct);
			const model = await LearnedDecisionModel.train(set, this.config, signal);
			this.learned = model;
			retrained = true;
			logger.info("decision_model_trained", {
				samples: set.rows.length,
				importances: model.inputImportances(),
			});
		}

		return {
			recorded: records.length,
			feedbackSamples: this.feedback.size,
			labeledSamples,
			retrained,
			method: methodName(this.method),
		};
	}

	feedbackRecords(): readonly Feedback[] {
		return this.feedback.all();
	}

	status(): DecisionPolicyStatus {
		return {
			method: methodName(this.method),
			feedbackSamples: this.feedback.size,
			labeledSamples: this.feedback.labeledCount,
			minFeedbackSamples: this.config.minFeedbackSamples,
			learnedModelSamples: this.learned?.trainedOn ?? null,
			accuracy: this.feedback.accuracy(),
		};
	}

	private verdictFor(
		prediction: Prediction,
		riskTolerance: number
	): { verdict: PolicyVerdict; method: DecisionMethodName } {
		const method = this.method;
		if (method.kind === "rule" || prediction.status !== "predicted") {
			return { verdict: ruleVerdict(prediction, riskTolerance), method: "rule_based" };
		}

		const learned = method.model.verdict(prediction, riskTolerance);
		const floor = minConfidence(riskTolerance);
		if (learned.probability < floor) {
			logger.info("decision_learned_fallback", {
				symbol: prediction.symbol,
				learnedAction: learned.action,
				probability: learned.probability,
				minConfidence: floor,
			});
			return { verdict: ruleVerdict(prediction, riskTolerance), method: "rule_based" };
		}

		return {
			verdict: {
				action: learned.action,
				confidence: learned.probability,
				reasons: [
					`ML model decision with ${Math.round(learned.probability * 100)}% confidence`,
				],
			},
			method: "ml_model",
		};
	}
}
