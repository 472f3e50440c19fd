import {
	createLogger,
	Decision,
	ExecutionConfig,
	ExecutionResult,
	InsufficientFundsError,
	InsufficientSharesError,
	isTradingError,
} from "@tradeloop/core";
import { PortfolioLedger } from "./portfolioLedger";

const executionLogger = createLogger("execution-engine");

export interface SizingContext {
	/** Fill price; the decision's price when omitted. */
	currentPrice?: number;
}

type Outcome = Omit<ExecutionResult, "symbol" | "action" | "price">;

/**
 * Turns decisions into ledger orders. Order problems come back as FAILED or
 * SKIPPED results; only ledger corruption escapes as an exception.
 */
export class ExecutionEngine {
	constructor(private readonly config: ExecutionConfig) {}

	execute(
		decision: Decision,
		context: SizingContext,
		ledger: PortfolioLedger
	): ExecutionResult {
		const price = context.currentPrice ?? decision.currentPrice;
		const outcome = this.run(decision, price, ledger);
		const result: ExecutionResult = {
			symbol: decision.symbol,
			action: decision.action,
			price,
			...outcome,
		};
		executionLogger.info("execution_result", {
			userId: ledger.userId,
			symbol: result.symbol,
			action: result.action,
			status: result.status,
			quantity: result.quantity,
			price: result.price,
			total: result.total,
			reason: result.reason,
			errorCode: result.errorCode,
		});
		return result;
	}

	private run(decision: Decision, price: number, ledger: PortfolioLedger): Outcome {
		if (decision.action === "HOLD") {
			return { status: "HELD", quantity: 0, total: 0, reason: decision.reasons[0] };
		}
		if (!Number.isFinite(price) || price <= 0) {
			return { status: "FAILED", quantity: 0, total: 0, reason: `Invalid price ${price}` };
		}
		try {
			return decision.action === "BUY"
				? this.buy(decision, price, ledger)
				: this.sell(decision, price, ledger);
		} catch (error) {
			if (isTradingError(error) && error.recoverable) {
				return {
					status: "FAILED",
					quantity: 0,
					total: 0,
					reason: error.message,
					errorCode: error.code,
				};
			}
			throw error;
		}
	}

	private targetQuantity(decision: Decision, price: number, ledger: PortfolioLedger): number {
		const notional = decision.suggestedPositionSize * ledger.totalValue();
		return Math.max(Math.floor(notional / price), 0);
	}

	private buy(decision: Decision, price: number, ledger: PortfolioLedger): Outcome {
		const quantity = this.targetQuantity(decision, price, ledger);
		if (quantity === 0) {
			return {
				status: "SKIPPED",
				quantity: 0,
				total: 0,
				reason: "Position size rounds to zero shares",
			};
		}
		const cost = quantity * price;
		if (cost > ledger.cashBalance) {
			const error = new InsufficientFundsError(decision.symbol, cost, ledger.cashBalance);
			return {
				status: "FAILED",
				quantity,
				total: cost,
				reason: error.message,
				errorCode: error.code,
			};
		}
		const transaction = ledger.buy(decision.symbol, quantity, price, decision.signal);
		return { status: "EXECUTED", quantity, total: transaction.total, transaction };
	}

	private sell(decision: Decision, price: number, ledger: PortfolioLedger): Outcome {
		const held = ledger.position(decision.symbol)?.quantity ?? 0;
		if (held === 0) {
			return {
				status: "FAILED",
				quantity: 0,
				total: 0,
				reason: `No position in ${decision.symbol} to sell`,
				errorCode: "INSUFFICIENT_SHARES",
			};
		}

		let quantity =
			this.config.sellSizing === "position"
				? held
				: this.targetQuantity(decision, price, ledger);
		if (quantity === 0) {
			return {
				status: "SKIPPED",
				quantity: 0,
				total: 0,
				reason: "Position size rounds to zero shares",
			};
		}
		if (quantity > held) {
			if (this.config.oversell === "reject") {
				const error = new InsufficientSharesError(decision.symbol, quantity, held);
				return {
					status: "FAILED",
					quantity,
					total: quantity * price,
					reason: error.message,
					errorCode: error.code,
				};
			}
			quantity = held;
		}

		const { transaction, feedback } = ledger.sell(decision.symbol, quantity, price);
		return {
			status: "EXECUTED",
			quantity,
			total: transaction.total,
			transaction,
			feedback,
		};
	}
}
