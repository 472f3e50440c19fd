import { RiskConfig, TradeAction } from "@tradeloop/core";

export interface RiskPlan {
	action: Exclude<TradeAction, "HOLD">;
	/** Fraction of total portfolio value this order should represent. */
	positionFraction: number;
	stopLoss: number;
	takeProfit: number;
}

export interface ExposureSnapshot {
	/** Market value currently held in the symbol. */
	heldValue: number;
	totalValue: number;
}

const clampUnit = (value: number): number =>
	Number.isFinite(value) ? Math.min(Math.max(value, 0), 1) : 0;

export class RiskManager {
	constructor(private readonly config: RiskConfig) {}

	plan(
		action: TradeAction,
		confidence: number,
		price: number,
		exposure: ExposureSnapshot
	): RiskPlan | null {
		switch (action) {
			case "BUY":
				return {
					action,
					positionFraction: this.entryFraction(confidence),
					stopLoss: this.calculateStopLoss(price, action),
					takeProfit: this.calculateTakeProfit(price, action),
				};
			case "SELL":
				return {
					action,
					positionFraction:
						exposure.totalValue > 0
							? clampUnit(exposure.heldValue / exposure.totalValue)
							: 0,
					stopLoss: this.calculateStopLoss(price, action),
					takeProfit: this.calculateTakeProfit(price, action),
				};
			default:
				return null;
		}
	}

	/** Scales the per-position cap by confidence: half the cap at 0, all of it at 1. */
	entryFraction(confidence: number): number {
		return clampUnit(
			this.config.maxPositionFraction * (0.5 + 0.5 * clampUnit(confidence))
		);
	}

	private calculateStopLoss(price: number, action: RiskPlan["action"]): number {
		const pct = this.config.stopLossPct / 100;
		const multiplier = action === "BUY" ? 1 - pct : 1 + pct;
		return this.round(price * multiplier);
	}

	private calculateTakeProfit(price: number, action: RiskPlan["action"]): number {
		const pct = this.config.takeProfitPct / 100;
		const multiplier = action === "BUY" ? 1 + pct : 1 - pct;
		return this.round(Math.max(price * multiplier, 0));
	}

	private round(price: number): number {
		return parseFloat(price.toFixed(2));
	}
}
