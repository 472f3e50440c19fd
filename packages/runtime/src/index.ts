export { TradingCoordinator } from "./coordinator";
export type { CoordinatorOptions, SystemStatus, TrainOptions } from "./coordinator";
export { runCycle } from "./cycle/runCycle";
export type { CycleDependencies, CycleRequest } from "./cycle/runCycle";
export { CycleDeadline } from "./cycle/deadline";
export { decideStage } from "./cycle/decideStage";
export { executeStage } from "./cycle/executeStage";
export type { ExecuteStageResult } from "./cycle/executeStage";
export { feedbackStage } from "./cycle/feedbackStage";
export {
	CYCLE_TIMEOUT_CODE,
	PREDICTION_FAILED_CODE,
	predictStage,
	predictSymbol,
} from "./cycle/predictStage";
export type { PredictContext, PredictStageResult } from "./cycle/predictStage";
