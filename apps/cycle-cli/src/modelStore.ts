import fs from "node:fs";
import path from "node:path";
import { createLogger, describeError, PipelineConfig } from "@tradeloop/core";
import { LearnedDecisionModel } from "@tradeloop/decision-engine";
import { Forecaster } from "@tradeloop/models-quant";

const logger = createLogger("model-store");

export const FORECASTER_FILE = "forecaster.json";
export const DECISION_MODEL_FILE = "decision-model.json";

export interface StoredModels {
	forecaster: Forecaster | null;
	decisionModel: LearnedDecisionModel | null;
}

const readJson = (filePath: string): unknown | null => {
	if (!fs.existsSync(filePath)) {
		return null;
	}
	return JSON.parse(fs.readFileSync(filePath, "utf-8"));
};

/** A saved model that no longer parses is reported and ignored, so the caller retrains. */
export const loadModels = (modelDir: string, config: PipelineConfig): StoredModels => {
	const load = <T>(file: string, revive: (raw: unknown) => T): T | null => {
		const filePath = path.join(modelDir, file);
		try {
			const raw = readJson(filePath);
			return raw === null ? null : revive(raw);
		} catch (error) {
			logger.warn("model_load_failed", { file: filePath, error: describeError(error) });
			return null;
		}
	};
	return {
		forecaster: load(FORECASTER_FILE, (raw) => Forecaster.fromJSON(raw, config.forecast)),
		decisionModel: load(DECISION_MODEL_FILE, (raw) => LearnedDecisionModel.fromJSON(raw)),
	};
};

export const saveModels = (
	modelDir: string,
	forecaster: Forecaster,
	decisionModel: LearnedDecisionModel | null
): string[] => {
	fs.mkdirSync(modelDir, { recursive: true });
	const written: string[] = [];
	const write = (file: string, state: unknown): void => {
		const filePath = path.join(modelDir, file);
		fs.writeFileSync(filePath, JSON.stringify(state));
		written.push(filePath);
	};
	if (forecaster.isTrained) {
		write(FORECASTER_FILE, forecaster.toJSON());
	}
	if (decisionModel) {
		write(DECISION_MODEL_FILE, decisionModel.toJSON());
	}
	logger.info("models_saved", { files: written });
	return written;
};
