import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Bar, DEFAULT_PIPELINE_CONFIG, PipelineConfig } from "@tradeloop/core";
import { computeFeatures } from "@tradeloop/indicators";
import { Forecaster, trainForecaster } from "@tradeloop/models-quant";
import { afterEach, describe, expect, it } from "vitest";
import { DECISION_MODEL_FILE, FORECASTER_FILE, loadModels, saveModels } from "./modelStore";

const config: PipelineConfig = {
	...DEFAULT_PIPELINE_CONFIG,
	forecast: { ...DEFAULT_PIPELINE_CONFIG.forecast, trees: 4, maxDepth: 5 },
};

const waveBars = (symbol: string, count: number): Bar[] =>
	Array.from({ length: count }, (_, index) => {
		const close = 100 * (1 + 0.05 * Math.sin(index / 4) + index * 0.001);
		return {
			symbol,
			date: new Date(Date.UTC(2023, 0, 2) + index * 86_400_000).toISOString().slice(0, 10),
			open: close,
			high: close * 1.01,
			low: close * 0.99,
			close,
			volume: 10_000 + (index % 5) * 100,
		};
	});

const dirs: string[] = [];
const tempDir = (): string => {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cycle-cli-models-"));
	dirs.push(dir);
	return dir;
};

afterEach(() => {
	for (const dir of dirs.splice(0)) {
		fs.rmSync(dir, { recursive: true, force: true });
	}
});

describe("model store", () => {
	it("reloads a saved forecaster that predicts the same price", async () => {
		const dir = tempDir();
		const bars = waveBars("AAPL", 90);
		const forecaster = new Forecaster(config.forecast);
		await trainForecaster(forecaster, [{ symbol: "AAPL", bars }]);

		expect(saveModels(dir, forecaster, null)).toEqual([path.join(dir, FORECASTER_FILE)]);
		const loaded = loadModels(dir, config);
		expect(loaded.decisionModel).toBeNull();

		const features = computeFeatures(bars);
		expect(loaded.forecaster?.predict(features).predictedPrice).toBe(
			forecaster.predict(features).predictedPrice
		);
	});

	it("skips an untrained forecaster", () => {
		const dir = tempDir();
		expect(saveModels(dir, new Forecaster(config.forecast), null)).toEqual([]);
		expect(loadModels(dir, config)).toEqual({ forecaster: null, decisionModel: null });
	});

	it("ignores a saved file that no longer parses", () => {
		const dir = tempDir();
		fs.writeFileSync(path.join(dir, FORECASTER_FILE), "{\"kind\":\"forecaster\"}");
		fs.writeFileSync(path.join(dir, DECISION_MODEL_FILE), "not json");
		expect(loadModels(dir, config)).toEqual({ forecaster: null, decisionModel: null });
	});
});
