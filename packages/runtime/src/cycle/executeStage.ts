import {
	Decision,
	ExecutionResult,
	Feedback,
	PortfolioSnapshot,
	Prediction,
	TradeStats,
} from "@tradeloop/core";
import { ExecutionEngine, PortfolioLedger } from "@tradeloop/execution-engine";
import { CycleDeadline } from "./deadline";
import { priceMarks } from "./marks";

export interface ExecuteStageResult {
	executions: Array<ExecutionResult | null>;
	feedback: Feedback[];
	portfolio: PortfolioSnapshot;
	performance: TradeStats;
	timedOut: boolean;
}

/**
 * Runs decisions against one ledger in order. Holdings are marked at this
 * cycle's prices first, so orders are sized from the current portfolio value.
 * Must be called from inside the ledger's single-writer section; a ledger
 * invariant violation propagates.
 */
export function executeStage(
	decisions: ReadonlyArray<Decision | null>,
	predictions: readonly Prediction[],
	engine: ExecutionEngine,
	ledger: PortfolioLedger,
	deadline: CycleDeadline
): ExecuteStageResult {
	const executions: Array<ExecutionResult | null> = decisions.map(() => null);
	const feedback: Feedback[] = [];
	let timedOut = false;
	const marks = priceMarks(predictions);
	ledger.markToMarket(marks);

	for (const [index, decision] of decisions.entries()) {
		if (!decision) {
			continue;
		}
		if (deadline.expired) {
			timedOut = true;
			break;
		}
		const result = engine.execute(
			decision,
			{ currentPrice: predictions[index]?.currentPrice },
			ledger
		);
		executions[index] = result;
		if (result.feedback) {
			feedback.push(result.feedback);
		}
	}

	return {
		executions,
		feedback,
		portfolio: ledger.markToMarket(marks),
		performance: ledger.stats(),
		timedOut,
	};
}
