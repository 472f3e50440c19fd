import {
	createLogger,
	EntrySignal,
	Feedback,
	InsufficientFundsError,
	InsufficientSharesError,
	LedgerInvariantError,
	PortfolioSnapshot,
	Position,
	TradeStats,
	Transaction,
} from "@tradeloop/core";

const ledgerLogger = createLogger("portfolio-ledger");

/** Money comparisons allow for float accumulation below a micro-cent. */
const EPSILON = 1e-6;

export interface LedgerOptions {
	userId: string;
	startingCash: number;
	/** |actual move| below this counts as a correct call when nothing was predicted. */
	labelThresholdPct?: number;
	/** Prediction errors under this many percentage points are within tolerance. */
	errorTolerancePct?: number;
	clock?: () => Date;
}

export interface SellOutcome {
	transaction: Transaction;
	feedback: Feedback;
}

interface Holding {
	symbol: string;
	quantity: number;
	avgBuyPrice: number;
	markPrice: number;
	openedAt: string;
	entrySignal: EntrySignal | null;
}

const assertOrder = (symbol: string, quantity: number, price: number): void => {
	if (!Number.isFinite(quantity) || quantity <= 0) {
		throw new RangeError(`Order quantity for ${symbol} must be positive, received ${quantity}`);
	}
	if (!Number.isFinite(price) || price <= 0) {
		throw new RangeError(`Order price for ${symbol} must be positive, received ${price}`);
	}
};

export const evaluatePrediction = (
	predictedChangePct: number | null,
	actualChangePct: number,
	labelThresholdPct: number
): boolean => {
	if (predictedChangePct === null || predictedChangePct === 0) {
		return Math.abs(actualChangePct) < labelThresholdPct;
	}
	return predictedChangePct > 0 ? actualChangePct > 0 : actualChangePct < 0;
};

/**
 * Cash, positions and the append-only transaction log for one user. Every
 * mutation validates first, so a rejected order leaves the ledger untouched.
 */
export class PortfolioLedger {
	readonly userId: string;
	readonly startingCash: number;
	private cash: number;
	private readonly holdings = new Map<string, Holding>();
	private readonly transactions: Transaction[] = [];
	private readonly labelThresholdPct: number;
	private readonly errorTolerancePct: number;
	private readonly clock: () => Date;

	constructor(options: LedgerOptions) {
		if (!Number.isFinite(options.startingCash) || options.startingCash < 0) {
			throw new RangeError(`Starting cash must be non-negative, received ${options.startingCash}`);
		}
		this.userId = options.userId;
		this.startingCash = options.startingCash;
		this.cash = options.startingCash;
		this.labelThresholdPct = options.labelThresholdPct ?? 2;
		this.errorTolerancePct = options.errorTolerancePct ?? 3;
		this.clock = options.clock ?? (() => new Date());
	}

	get cashBalance(): number {
		return this.cash;
	}

	buy(
		symbol: string,
		quantity: number,
		price: number,
		entrySignal: EntrySignal | null = null
	): Transaction {
		assertOrder(symbol, quantity, price);
		const total = quantity * price;
		if (total > this.cash + EPSILON) {
			throw new InsufficientFundsError(symbol, total, this.cash);
		}

		const timestamp = this.clock().toISOString();
		this.cash = this.settle(this.cash - total);
		const existing = this.holdings.get(symbol);
		if (existing) {
			const combined = existing.quantity + quantity;
			existing.avgBuyPrice =
				(existing.avgBuyPrice * existing.quantity + price * quantity) / combined;
			existing.quantity = combined;
			existing.markPrice = price;
		} else {
			this.holdings.set(symbol, {
				symbol,
				quantity,
				avgBuyPrice: price,
				markPrice: price,
				openedAt: timestamp,
				entrySignal,
			});
		}

		const transaction = this.record({ symbol, type: "BUY", quantity, price, total, timestamp });
		this.assertInvariants();
		return transaction;
	}

	sell(symbol: string, quantity: number, price: number): SellOutcome {
		assertOrder(symbol, quantity, price);
		const holding = this.holdings.get(symbol);
		const held = holding?.quantity ?? 0;
		if (!holding || quantity > held) {
			throw new InsufficientSharesError(symbol, quantity, held);
		}

		const timestamp = this.clock().toISOString();
		const total = quantity * price;
		const costBasis = holding.avgBuyPrice * quantity;
		const profitLoss = total - costBasis;
		const profitLossPct = costBasis > 0 ? (profitLoss / costBasis) * 100 : 0;

		this.cash = this.settle(this.cash + total);
		holding.quantity -= quantity;
		holding.markPrice = price;
		if (holding.quantity <= 0) {
			this.holdings.delete(symbol);
		}

		const transaction = this.record({
			symbol,
			type: "SELL",
			quantity,
			price,
			total,
			profitLoss,
			profitLossPct,
			timestamp,
		});
		const feedback = this.buildFeedback(holding, quantity, price, profitLoss, timestamp);
		this.assertInvariants();
		return { transaction, feedback };
	}

	/** Revalues holdings at `prices`; symbols without a price keep their last mark. */
	markToMarket(prices: ReadonlyMap<string, number>): PortfolioSnapshot {
		for (const holding of this.holdings.values()) {
			const price = prices.get(holding.symbol);
			if (price !== undefined && Number.isFinite(price) && price > 0) {
				holding.markPrice = price;
			}
		}
		this.assertInvariants();
		return this.snapshot();
	}

	position(symbol: string): Position | null {
		const holding = this.holdings.get(symbol);
		return holding ? this.toPosition(holding) : null;
	}

	positions(): Position[] {
		return [...this.holdings.values()].map((holding) => this.toPosition(holding));
	}

	totalValue(): number {
		return this.cash + this.positionsValue();
	}

	snapshot(): PortfolioSnapshot {
		const positions = this.positions();
		const positionsValue = positions.reduce((acc, p) => acc + p.currentValue, 0);
		const totalValue = this.cash + positionsValue;
		const totalReturn = totalValue - this.startingCash;
		return {
			userId: this.userId,
			cash: this.cash,
			startingCash: this.startingCash,
			positionsValue,
			totalValue,
			totalReturn,
			totalReturnPct: this.startingCash > 0 ? (totalReturn / this.startingCash) * 100 : 0,
			positionsCount: positions.length,
			positions,
		};
	}

	transactionLog(): readonly Transaction[] {
		return this.transactions;
	}

	stats(): TradeStats {
		const stats: TradeStats = {
			totalTrades: this.transactions.length,
			buys: 0,
			sells: 0,
			wins: 0,
			losses: 0,
			breakeven: 0,
			winRate: 0,
			realizedPnl: 0,
		};
		for (const transaction of this.transactions) {
			if (transaction.type === "BUY") {
				stats.buys += 1;
				continue;
			}
			stats.sells += 1;
			const pnl = transaction.profitLoss ?? 0;
			stats.realizedPnl += pnl;
			if (pnl > EPSILON) {
				stats.wins += 1;
			} else if (pnl < -EPSILON) {
				stats.losses += 1;
			} else {
				stats.breakeven += 1;
			}
		}
		stats.winRate = stats.sells > 0 ? (stats.wins / stats.sells) * 100 : 0;
		return stats;
	}

	private positionsValue(): number {
		let value = 0;
		for (const holding of this.holdings.values()) {
			value += holding.quantity * holding.markPrice;
		}
		return value;
	}

	private toPosition(holding: Holding): Position {
		const currentValue = holding.quantity * holding.markPrice;
		return {
			symbol: holding.symbol,
			quantity: holding.quantity,
			avgBuyPrice: holding.avgBuyPrice,
			markPrice: holding.markPrice,
			currentValue,
			unrealizedPnl: currentValue - holding.quantity * holding.avgBuyPrice,
			openedAt: holding.openedAt,
			entrySignal: holding.entrySignal,
		};
	}

	private record(entry: Omit<Transaction, "id">): Transaction {
		const transaction: Transaction = Object.freeze({
			id: this.transactions.length + 1,
			...entry,
		});
		this.transactions.push(transaction);
		ledgerLogger.info("ledger_transaction", {
			userId: this.userId,
			id: transaction.id,
			symbol: transaction.symbol,
			type: transaction.type,
			quantity: transaction.quantity,
			price: transaction.price,
			total: transaction.total,
			profitLoss: transaction.profitLoss,
			cash: this.cash,
		});
		return transaction;
	}

	private buildFeedback(
		holding: Holding,
		quantity: number,
		exitPrice: number,
		profitLoss: number,
		timestamp: string
	): Feedback {
		const entryPrice = holding.avgBuyPrice;
		const actualChangePct = ((exitPrice - entryPrice) / entryPrice) * 100;
		const predictedChangePct = holding.entrySignal?.predictedChangePct ?? null;
		const predictionError =
			predictedChangePct === null
				? Math.abs(actualChangePct)
				: Math.abs(predictedChangePct - actualChangePct);
		return {
			symbol: holding.symbol,
			tradeType: "SELL",
			entryPrice,
			exitPrice,
			quantity,
			profitLoss,
			actualChangePct,
			predictedChangePct,
			wasCorrect: evaluatePrediction(
				predictedChangePct,
				actualChangePct,
				this.labelThresholdPct
			),
			predictionError,
			withinTolerance: predictionError < this.errorTolerancePct,
			entrySignal: holding.entrySignal,
			timestamp,
		};
	}

	/** Snaps float dust around zero so cash never reads as a tiny negative. */
	private settle(cash: number): number {
		return Math.abs(cash) < EPSILON ? 0 : cash;
	}

	private assertInvariants(): void {
		if (this.cash < 0) {
			throw new LedgerInvariantError("cash >= 0", { userId: this.userId, cash: this.cash });
		}
		for (const holding of this.holdings.values()) {
			if (!(holding.quantity > 0)) {
				throw new LedgerInvariantError("position quantity > 0", {
					userId: this.userId,
					symbol: holding.symbol,
					quantity: holding.quantity,
				});
			}
		}
		let expectedCash = this.startingCash;
		for (const transaction of this.transactions) {
			expectedCash += transaction.type === "BUY" ? -transaction.total : transaction.total;
		}
		const tolerance = EPSILON * Math.max(1, this.startingCash);
		if (Math.abs(expectedCash - this.cash) > tolerance) {
			throw new LedgerInvariantError("cash matches transaction log", {
				userId: this.userId,
				cash: this.cash,
				expectedCash,
			});
		}
		const snapshot = this.snapshot();
		if (Math.abs(snapshot.totalValue - (snapshot.cash + snapshot.positionsValue)) > tolerance) {
			throw new LedgerInvariantError("total value = cash + positions value", {
				userId: this.userId,
				totalValue: snapshot.totalValue,
				cash: snapshot.cash,
				positionsValue: snapshot.positionsValue,
			});
		}
	}
}
