#!/usr/bin/env node

import path from "node:path";
import process from "node:process";
import { CycleSummary, getWorkspaceRoot, loadPipelineConfig } from "@tradeloop/core";
import { CsvBarSource } from "@tradeloop/data";
import { TradingCoordinator } from "@tradeloop/runtime";
import { parseCycleOptions } from "./cliArgs";
import { loadModels, saveModels, StoredModels } from "./modelStore";
import { formatCycleSummary, formatPortfolioHealth, formatSimilarSymbols } from "./summaryReport";

const USAGE = `Usage:
  npm run cycle -- [SYMBOL ...] [options]

Options (all optional):
  --symbols <A,B,...>      Symbols to analyse (default: every CSV in the data dir)
  --user <id>              Portfolio owner (default: "default")
  --risk <0..1>            Risk tolerance for this run
  --cycles <n>             Cycles to run back to back (default: 1)
  --timeout <ms>           Wall-clock budget per cycle
  --train                  Retrain the forecaster even if a saved one exists
  --profile <name>         Pipeline profile under config/pipeline
  --configDir <path>       Custom config directory
  --envPath <path>         Custom .env path
  --dataDir <path>         Directory of <SYMBOL>.csv files
  --modelDir <path>        Where models are saved and loaded (default: models)
  --similar <SYMBOL>       Also list the symbols trading most like SYMBOL
  --json                   Print the full cycle summaries as JSON
  --help                   Show this message
`;

const main = async (): Promise<void> => {
	const options = parseCycleOptions(process.argv.slice(2));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const { config, env, profile } = loadPipelineConfig({
		envPath: options.envPath,
		configDir: options.configDir,
		profile: options.profile,
	});
	const root = getWorkspaceRoot();
	const dataDir = path.resolve(root, options.dataDir ?? env.dataDir ?? "data/stocks");
	const modelDir = path.resolve(root, options.modelDir);
	const bars = new CsvBarSource({ directory: dataDir });
	const symbols = options.symbols.length > 0 ? options.symbols : await bars.listSymbols();
	if (symbols.length === 0) {
		throw new Error(`No symbols given and no CSV files found in ${dataDir}`);
	}

	const stored: StoredModels = options.train
		? { forecaster: null, decisionModel: null }
		: loadModels(modelDir, config);
	const coordinator = new TradingCoordinator({
		config,
		bars,
		forecaster: stored.forecaster ?? undefined,
	});
	if (stored.decisionModel) {
		coordinator.policy.adoptLearnedModel(stored.decisionModel);
	}

	console.log(`Profile ${profile}: ${symbols.length} symbols from ${dataDir}`);
	if (!coordinator.forecaster.isTrained) {
		console.log("Training forecaster...");
		const report = await coordinator.train(symbols);
		console.log(
			`Trained on ${report.samples} samples from ${report.symbols} symbols (RMSE ${report.evaluation.rmse.toFixed(
				4
			)}, MAE ${report.evaluation.mae.toFixed(4)})`
		);
		for (const failure of report.failedSymbols) {
			console.log(`  skipped ${failure.symbol}: ${failure.reason}`);
		}
	}

	const summaries: CycleSummary[] = [];
	for (let i = 0; i < options.cycles; i++) {
		const summary = await coordinator.runCycle({
			userId: options.userId,
			symbols,
			riskTolerance: options.riskTolerance,
			timeoutMs: options.timeoutMs,
		});
		summaries.push(summary);
		if (!options.json) {
			console.log(formatCycleSummary(summary).join("\n"));
		}
	}
	await coordinator.whenIdle();

	const health = await coordinator.portfolioHealth(options.userId);
	const similar = options.similarTo
		? await coordinator.similarSymbols(options.similarTo, symbols)
		: null;
	if (options.json) {
		console.log(
			JSON.stringify({ summaries, health, similar, status: coordinator.status() }, null, 2)
		);
	} else {
		console.log(formatPortfolioHealth(health).join("\n"));
		if (options.similarTo && similar) {
			console.log(formatSimilarSymbols(options.similarTo, similar).join("\n"));
		}
	}

	const written = saveModels(modelDir, coordinator.forecaster, coordinator.policy.learnedModel);
	for (const file of written) {
		console.log(`Model saved to ${path.relative(process.cwd(), file) || file}`);
	}
};

main().catch((error: unknown) => {
	console.error("Cycle failed:", error instanceof Error ? error.message : error);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
