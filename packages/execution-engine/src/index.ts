export { ExecutionEngine } from "./executionEngine";
export type { SizingContext } from "./executionEngine";
export { LedgerRegistry } from "./ledgerRegistry";
export type { LedgerDefaults } from "./ledgerRegistry";
export { evaluatePrediction, PortfolioLedger } from "./portfolioLedger";
export type { LedgerOptions, SellOutcome } from "./portfolioLedger";
export { analyzePortfolioHealth } from "./portfolioHealth";
export type {
	HealthOptions,
	HoldingReturn,
	PortfolioHealth,
	PortfolioHealthStatus,
	SymbolWeight,
} from "./portfolioHealth";
