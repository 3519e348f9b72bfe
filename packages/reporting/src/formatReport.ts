import type { Series } from "@slopecast/core";
import type { PredictionReport, TrendReport } from "@slopecast/models-quant";

export interface LabeledPrediction {
	label: string;
	series: Series;
	report: PredictionReport;
}

export const formatValue = (value: number | null, digits = 2): string =>
	value === null ? "n/a" : value.toFixed(digits);

export const formatConfidence = (score: number): string =>
	`${(score * 100).toFixed(1)}%`;

export const formatPredictionReport = ({
	label,
	series,
	report,
}: LabeledPrediction): string =>
	[
		`Example: ${label}`,
		`Series: ${series.join(", ")}`,
		`Predicted next value: ${formatValue(report.finalPrediction)}`,
		`Confidence: ${formatConfidence(report.confidenceScore)}`,
		`Momentum (method 1): ${formatValue(report.predictionMethod1)}`,
		`Recent average (method 2): ${formatValue(report.predictionMethod2)}`,
		`Smoothed (method 3): ${formatValue(report.predictionMethod3)}`,
		`Recent trend: ${formatValue(report.avgRecentTrend)}`,
	].join("\n");

export const formatTrendReport = (report: TrendReport): string =>
	[
		`Forward slope: ${formatValue(report.avgForwardTrend)}`,
		`Backward slope: ${formatValue(report.avgBackwardTrend)}`,
		`Central slope: ${formatValue(report.avgCentralTrend)}`,
	].join("\n");

export interface FormatCsvOptions {
	includeHeader?: boolean;
}

export const formatPredictionsCsv = (
	predictions: LabeledPrediction[],
	options: FormatCsvOptions = {}
): string =>
	toCsv(
		predictions.map(({ label, series, report }) => ({
			label,
			length: series.length,
			lastPrice: report.lastPrice,
			finalPrediction: report.finalPrediction,
			predictionMethod1: report.predictionMethod1,
			predictionMethod2: report.predictionMethod2,
			predictionMethod3: report.predictionMethod3,
			avgRecentTrend: report.avgRecentTrend,
			confidenceScore: report.confidenceScore,
		})),
		options.includeHeader ?? true
	);

const toCsv = (
	rows: Record<string, unknown>[],
	includeHeader: boolean
): string => {
	if (rows.length === 0) {
		return "";
	}
	const headers = Object.keys(rows[0]);
	const lines = rows.map((row) =>
		headers.map((key) => escapeCsvValue(row[key])).join(",")
	);
	if (includeHeader) {
		lines.unshift(headers.join(","));
	}
	return lines.join("\n");
};

const escapeCsvValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	const str = String(value);
	if (/[",\n]/.test(str)) {
		return `"${str.replace(/"/g, '""')}"`;
	}
	return str;
};
