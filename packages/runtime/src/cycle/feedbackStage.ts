import { CycleLearningSummary, Feedback, FitCancelledError, ModuleLogger } from "@tradeloop/core";
import { DecisionPolicy } from "@tradeloop/decision-engine";
import { CycleDeadline } from "./deadline";

export interface FeedbackStageResult {
	learning: CycleLearningSummary;
	timedOut: boolean;
}

/**
 * Hands the cycle's feedback to the decision policy. A retrain cut short by
 * the cycle deadline keeps the previous classifier and marks the cycle as
 * timed out.
 */
export async function feedbackStage(
	feedback: Feedback[],
	policy: DecisionPolicy,
	deadline: CycleDeadline,
	logger: ModuleLogger
): Promise<FeedbackStageResult> {
	try {
		const update = await policy.recordFeedback(feedback, deadline.signal);
		return {
			learning: {
				feedbackRecorded: update.recorded,
				feedbackSamples: update.feedbackSamples,
				retrained: update.retrained,
				method: update.method,
			},
			timedOut: false,
		};
	} catch (error) {
		if (!(error instanceof FitCancelledError)) {
			throw error;
		}
		logger.warn("decision_model_training_cancelled", { treesBuilt: error.details.treesBuilt });
		const status = policy.status();
		return {
			learning: {
				feedbackRecorded: feedback.length,
				feedbackSamples: status.feedbackSamples,
				retrained: false,
				method: status.method,
			},
			timedOut: true,
		};
	}
}
