import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PredictorConfig } from "@slopecast/core";
import { ConfigError } from "@slopecast/core";
import type { PredictCliOptions } from "./cliArgs";
import { runPredictions, selectDatasets } from "./runPredictions";

const RISING = [100, 102, 104, 106, 108, 110, 112];
const VOLATILE = [100, 95, 105, 98, 107, 102, 109];

let tmpRoot: string;

const buildConfig = (overrides: Partial<PredictorConfig> = {}): PredictorConfig => ({
	outputDir: path.join(tmpRoot, "charts"),
	chart: { width: 300, height: 200 },
	examples: [
		{ name: "Rising Stock", prices: RISING },
		{ name: "Volatile Stock", prices: VOLATILE },
	],
	...overrides,
});

const buildOptions = (
	overrides: Partial<PredictCliOptions> = {}
): PredictCliOptions => ({
	chart: false,
	format: "text",
	zeroChangePolicy: "include",
	help: false,
	...overrides,
});

beforeEach(() => {
	tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), "slopecast-cli-"));
});

afterEach(() => {
	vi.restoreAllMocks();
	fs.rmSync(tmpRoot, { recursive: true, force: true });
});

describe("selectDatasets", () => {
	it("runs every configured example by default", () => {
		expect(
			selectDatasets(buildOptions(), buildConfig()).map((d) => d.name)
		).toEqual(["Rising Stock", "Volatile Stock"]);
	});

	it("wraps explicit prices under the given or default label", () => {
		expect(
			selectDatasets(buildOptions({ prices: [1, 2] }), buildConfig())
		).toEqual([{ name: "Custom Series", prices: [1, 2] }]);
		expect(
			selectDatasets(
				buildOptions({ prices: [1, 2], label: "Mine" }),
				buildConfig()
			)
		).toEqual([{ name: "Mine", prices: [1, 2] }]);
	});

	it("matches an example name case-insensitively", () => {
		const [dataset] = selectDatasets(
			buildOptions({ example: "volatile stock" }),
			buildConfig()
		);
		expect(dataset.prices).toEqual(VOLATILE);
	});

	it("lists the known examples for an unknown name", () => {
		expect(() =>
			selectDatasets(buildOptions({ example: "Flat" }), buildConfig())
		).toThrowError(
			'Unknown example "Flat". Known examples: Rising Stock, Volatile Stock'
		);
	});

	it("fails when nothing is configured and no prices are given", () => {
		expect(() =>
			selectDatasets(buildOptions(), buildConfig({ examples: [] }))
		).toThrow(ConfigError);
	});
});

describe("runPredictions", () => {
	it("prints one text block per dataset without touching the disk", async () => {
		const run = await runPredictions(buildOptions(), buildConfig());
		const blocks = run.output.split("\n\n");
		expect(blocks).toHaveLength(2);
		expect(blocks[1].split("\n").slice(0, 3)).toEqual([
			"Example: Volatile Stock",
			"Series: 100, 95, 105, 98, 107, 102, 109",
			"Predicted next value: 112.87",
		]);
		expect(fs.existsSync(path.join(tmpRoot, "charts"))).toBe(false);
	});

	it("saves a chart per dataset when asked", async () => {
		const outputDir = path.join(tmpRoot, "custom");
		const run = await runPredictions(
			buildOptions({ chart: true, outputDir }),
			buildConfig()
		);
		expect(run.results.map((result) => result.chartPath)).toEqual([
			path.join(outputDir, "Rising_Stock_prediction.svg"),
			path.join(outputDir, "Volatile_Stock_prediction.svg"),
		]);
		expect(fs.readdirSync(outputDir).sort()).toEqual([
			"Rising_Stock_prediction.svg",
			"Volatile_Stock_prediction.svg",
		]);
		expect(run.output).toContain(
			`Chart saved to: ${path.join(outputDir, "Rising_Stock_prediction.svg")}`
		);
	});

	it("emits JSON with null for undefined averages", async () => {
		const run = await runPredictions(
			buildOptions({ prices: [42], format: "json" }),
			buildConfig()
		);
		const parsed: unknown = JSON.parse(run.output);
		expect(parsed).toEqual([
			{
				label: "Custom Series",
				series: [42],
				report: {
					finalPrediction: 42,
					predictionMethod1: 42,
					predictionMethod2: 42,
					predictionMethod3: 42,
					lastPrice: 42,
					avgRecentTrend: null,
					confidenceScore: 0.5,
				},
				trend: {
					forwardDifferences: [null],
					backwardDifferences: [null],
					centralDifferences: [null],
					avgForwardTrend: null,
					avgBackwardTrend: null,
					avgCentralTrend: null,
				},
				chartPath: null,
			},
		]);
	});

	it("keeps JSON output parseable when charts are saved", async () => {
		const stdout: string[] = [];
		vi.spyOn(process.stdout, "write").mockImplementation((chunk) => {
			stdout.push(String(chunk));
			return true;
		});
		vi.spyOn(process.stderr, "write").mockImplementation(() => true);

		const run = await runPredictions(
			buildOptions({ chart: true, format: "json" }),
			buildConfig()
		);
		expect(stdout).toEqual([]);
		const parsed: unknown = JSON.parse(run.output);
		expect(Array.isArray(parsed)).toBe(true);
		expect(run.results.map((result) => result.chartPath)).toEqual([
			path.join(tmpRoot, "charts", "Rising_Stock_prediction.svg"),
			path.join(tmpRoot, "charts", "Volatile_Stock_prediction.svg"),
		]);
	});

	it("passes the zero change policy to the predictor", async () => {
		const run = await runPredictions(
			buildOptions({
				prices: [10, 10, 12],
				zeroChangePolicy: "exclude",
			}),
			buildConfig()
		);
		expect(run.results[0].report.avgRecentTrend).toBe(2);
	});

	it("writes CSV rows for every dataset", async () => {
		const run = await runPredictions(
			buildOptions({ format: "csv" }),
			buildConfig()
		);
		const lines = run.output.split("\n");
		expect(lines).toHaveLength(3);
		expect(lines[1].startsWith("Rising Stock,7,112,")).toBe(true);
	});
});
