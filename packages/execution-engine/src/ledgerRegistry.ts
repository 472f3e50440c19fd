import PQueue from "p-queue";
import { PortfolioSnapshot } from "@tradeloop/core";
import { LedgerOptions, PortfolioLedger } from "./portfolioLedger";

export type LedgerDefaults = Omit<LedgerOptions, "userId">;

interface LedgerSlot {
	ledger: PortfolioLedger;
	queue: PQueue;
}

/**
 * Owns one ledger per user. All access goes through `withLedger`, which runs
 * callers for the same user one at a time; different users run in parallel.
 */
export class LedgerRegistry {
	private readonly slots = new Map<string, LedgerSlot>();

	constructor(private readonly defaults: LedgerDefaults) {}

	withLedger<T>(
		userId: string,
		task: (ledger: PortfolioLedger) => T | Promise<T>
	): Promise<T> {
		const slot = this.slot(userId);
		return slot.queue.add(async () => task(slot.ledger), { throwOnTimeout: true });
	}

	/** Reads a snapshot in turn with writers, so it never sees a half-applied cycle. */
	snapshot(userId: string): Promise<PortfolioSnapshot> {
		return this.withLedger(userId, (ledger) => ledger.snapshot());
	}

	has(userId: string): boolean {
		return this.slots.has(userId);
	}

	users(): string[] {
		return [...this.slots.keys()];
	}

	private slot(userId: string): LedgerSlot {
		let slot = this.slots.get(userId);
		if (!slot) {
			slot = {
				ledger: new PortfolioLedger({ ...this.defaults, userId }),
				queue: new PQueue({ concurrency: 1 }),
			};
			this.slots.set(userId, slot);
		}
		return slot;
	}
}
