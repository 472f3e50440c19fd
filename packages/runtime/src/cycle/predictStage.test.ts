import { Bar, createLogger } from "@tradeloop/core";
import { BarSource, InMemoryBarSource } from "@tradeloop/data";
import { afterEach, describe, expect, it } from "vitest";
import { flatBars, ScriptedForecaster } from "../__tests__/pipelineFixtures";
import { CycleDeadline } from "./deadline";
import { predictStage, predictSymbol } from "./predictStage";

/** Answers each symbol after its own delay. */
class DelayedBarSource implements BarSource {
	readonly completed: string[] = [];

	constructor(
		private readonly inner: InMemoryBarSource,
		private readonly delays: Record<string, number>
	) {}

	async loadBars(symbol: string): Promise<Bar[]> {
		await new Promise((resolve) => setTimeout(resolve, this.delays[symbol] ?? 0));
		this.completed.push(symbol);
		return this.inner.loadBars(symbol);
	}

	listSymbols(): Promise<string[]> {
		return this.inner.listSymbols();
	}
}

const logger = createLogger("predict-stage-test");
const deadlines: CycleDeadline[] = [];

const deadline = (ms: number): CycleDeadline => {
	const created = new CycleDeadline(ms);
	deadlines.push(created);
	return created;
};

afterEach(() => {
	for (const created of deadlines.splice(0)) {
		created.dispose();
	}
});

describe("predictStage", () => {
	it("keeps request order whatever order the symbols finish in", async () => {
		const source = new DelayedBarSource(
			new InMemoryBarSource({
				AAA: flatBars("AAA", 60),
				BBB: flatBars("BBB", 60),
				CCC: flatBars("CCC", 60),
			}),
			{ AAA: 30, BBB: 10, CCC: 0 }
		);

		const result = await predictStage({
			symbols: ["AAA", "BBB", "CCC"],
			bars: source,
			forecaster: new ScriptedForecaster({ AAA: 1, BBB: 2, CCC: 3 }),
			featureWindow: 120,
			concurrency: 3,
			deadline: deadline(5_000),
			logger,
		});

		expect(source.completed).toEqual(["CCC", "BBB", "AAA"]);
		expect(result.timedOut).toBe(false);
		expect(result.predictions.map((p) => [p.symbol, p.predictedChangePct])).toEqual([
			["AAA", 1],
			["BBB", 2],
			["CCC", 3],
		]);
	});
});

describe("predictSymbol", () => {
	it("normalises the symbol before loading it", async () => {
		const prediction = await predictSymbol(" aapl ", {
			bars: new InMemoryBarSource({ AAPL: flatBars("AAPL", 60) }),
			forecaster: new ScriptedForecaster({ AAPL: 2 }),
			featureWindow: 120,
			logger,
		});

		expect(prediction.symbol).toBe("AAPL");
		expect(prediction.status).toBe("predicted");
		expect(prediction.predictedPrice).toBeCloseTo(102, 9);
		expect(prediction.direction).toBe("UP");
		expect(prediction.date).toBe("2023-03-02");
	});
});

describe("CycleDeadline", () => {
	it("reports an unsettled race once the budget has passed", async () => {
		const budget = deadline(10);
		const outcome = await budget.race(new Promise<never>(() => undefined));
		expect(outcome).toEqual({ settled: false });
		expect(budget.expired).toBe(true);
		expect(budget.signal.aborted).toBe(true);
	});

	it("passes through work that finishes in time", async () => {
		const outcome = await deadline(1_000).race(Promise.resolve(7));
		expect(outcome).toEqual({ settled: true, value: 7 });
	});
});
