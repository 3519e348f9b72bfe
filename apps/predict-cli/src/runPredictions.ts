import type { ExampleSeries, PredictorConfig } from "@slopecast/core";
import { ConfigError, createLogger } from "@slopecast/core";
import type { TrendReport } from "@slopecast/models-quant";
import { Predictor } from "@slopecast/models-quant";
import type { LabeledPrediction } from "@slopecast/reporting";
import {
	formatPredictionReport,
	formatPredictionsCsv,
	formatTrendReport,
	savePredictionChart,
} from "@slopecast/reporting";
import type { PredictCliOptions } from "./cliArgs";

export const DEFAULT_CUSTOM_LABEL = "Custom Series";

export interface DatasetResult extends LabeledPrediction {
	trend: TrendReport;
	chartPath?: string;
}

export interface PredictionRun {
	results: DatasetResult[];
	output: string;
}

const logger = createLogger("predict-cli");

export const selectDatasets = (
	options: PredictCliOptions,
	config: PredictorConfig
): ExampleSeries[] => {
	if (options.prices) {
		return [
			{ name: options.label ?? DEFAULT_CUSTOM_LABEL, prices: options.prices },
		];
	}
	if (options.example) {
		const wanted = options.example.toLowerCase();
		const match = config.examples.find(
			(example) => example.name.toLowerCase() === wanted
		);
		if (!match) {
			const known = config.examples.map((example) => example.name).join(", ");
			throw new ConfigError(
				`Unknown example "${options.example}". Known examples: ${known || "none"}`
			);
		}
		return [match];
	}
	if (!config.examples.length) {
		throw new ConfigError(
			"No datasets to run: pass --prices or add examples to predictor.json"
		);
	}
	return config.examples;
};

const renderOutput = (
	results: DatasetResult[],
	format: PredictCliOptions["format"]
): string => {
	switch (format) {
		case "json":
			return JSON.stringify(
				results.map(({ label, series, report, trend, chartPath }) => ({
					label,
					series,
					report,
					trend,
					chartPath: chartPath ?? null,
				})),
				null,
				2
			);
		case "csv":
			return formatPredictionsCsv(results);
		case "text":
		default:
			return results
				.map((result) => {
					const lines = [
						formatPredictionReport(result),
						formatTrendReport(result.trend),
					];
					if (result.chartPath) {
						lines.push(`Chart saved to: ${result.chartPath}`);
					}
					return lines.join("\n");
				})
				.join("\n\n");
	}
};

/**
 * Runs the predictor over each selected dataset. Charts are written only when
 * `options.chart` is set, into `options.outputDir` or the configured dir.
 */
export const runPredictions = async (
	options: PredictCliOptions,
	config: PredictorConfig
): Promise<PredictionRun> => {
	const datasets = selectDatasets(options, config);
	const outputDir = options.outputDir ?? config.outputDir;
	const results: DatasetResult[] = [];

	for (const dataset of datasets) {
		const predictor = new Predictor(dataset.prices, {
			zeroChangePolicy: options.zeroChangePolicy,
		});
		const report = predictor.predictNextValue();
		const result: DatasetResult = {
			label: dataset.name,
			series: predictor.getSeries(),
			report,
			trend: predictor.trendMetrics(),
		};
		logger.debug("prediction_report", {
			label: dataset.name,
			length: predictor.length,
			lastPrice: report.lastPrice,
			finalPrediction: report.finalPrediction,
			confidenceScore: report.confidenceScore,
		});
		if (options.chart) {
			result.chartPath = await savePredictionChart(
				{
					label: dataset.name,
					series: result.series,
					predictedValue: report.finalPrediction,
				},
				{ outputDir, size: config.chart }
			);
		}
		results.push(result);
	}

	return { results, output: renderOutput(results, options.format) };
};
