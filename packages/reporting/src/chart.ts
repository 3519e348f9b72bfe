import { promises as fs } from "node:fs";
import path from "node:path";
import type { ChartConfig, Series } from "@slopecast/core";
import { createLogger, InvalidSeriesError } from "@slopecast/core";

export interface PredictionChartInput {
	label: string;
	series: Series;
	predictedValue: number;
}

export interface SaveChartOptions {
	outputDir: string;
	size?: ChartConfig;
}

const DEFAULT_SIZE: ChartConfig = { width: 800, height: 400 };

const MARGIN = { left: 60, right: 20, top: 40, bottom: 50 };
const GRID_LINES = 5;
const SERIES_COLOR = "green";
const PREDICTION_COLOR = "red";

const logger = createLogger("reporting");

export const chartTitle = (label: string): string =>
	`Stock Market Prediction - ${label}`;

/** Whitespace becomes `_`; path separators are dropped so the file stays in outputDir. */
export const chartFileName = (label: string): string =>
	`${label.trim().replace(/[\\/]/g, "").replace(/\s+/g, "_")}_prediction.svg`;

const escapeXml = (value: string): string =>
	value
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");

const fmt = (value: number): string => value.toFixed(1);

interface Scales {
	x: (day: number) => number;
	y: (value: number) => number;
	yMin: number;
	yMax: number;
}

const buildScales = (
	days: number,
	values: readonly number[],
	size: ChartConfig
): Scales => {
	let yMin = Math.min(...values);
	let yMax = Math.max(...values);
	if (yMin === yMax) {
		yMin -= 1;
		yMax += 1;
	}
	const plotLeft = MARGIN.left;
	const plotRight = size.width - MARGIN.right;
	const plotTop = MARGIN.top;
	const plotBottom = size.height - MARGIN.bottom;
	return {
		x: (day) => plotLeft + ((day - 1) / (days - 1)) * (plotRight - plotLeft),
		y: (value) =>
			plotBottom - ((value - yMin) / (yMax - yMin)) * (plotBottom - plotTop),
		yMin,
		yMax,
	};
};

const assertChartInput = (input: PredictionChartInput): void => {
	if (input.series.length === 0) {
		throw new InvalidSeriesError("Chart needs at least one observed value");
	}
	const badIndex = input.series.findIndex((value) => !Number.isFinite(value));
	if (badIndex !== -1) {
		throw new InvalidSeriesError(
			`Chart value at index ${badIndex} must be a finite number`,
			badIndex
		);
	}
	if (!Number.isFinite(input.predictedValue)) {
		throw new InvalidSeriesError("Predicted value must be a finite number");
	}
};

/**
 * Renders the observed series (days 1..n) and the predicted point (day n+1)
 * as a standalone SVG document.
 */
export const renderPredictionChart = (
	input: PredictionChartInput,
	size: ChartConfig = DEFAULT_SIZE
): string => {
	assertChartInput(input);
	const { series, predictedValue } = input;
	const days = series.length + 1;
	const scales = buildScales(days, [...series, predictedValue], size);
	const plotLeft = MARGIN.left;
	const plotRight = size.width - MARGIN.right;

	const grid: string[] = [];
	for (let i = 0; i <= GRID_LINES; i += 1) {
		const value = scales.yMin + ((scales.yMax - scales.yMin) * i) / GRID_LINES;
		const y = fmt(scales.y(value));
		grid.push(
			`<line x1="${fmt(plotLeft)}" y1="${y}" x2="${fmt(plotRight)}" y2="${y}" stroke="#ccc" stroke-dasharray="4 4" />`,
			`<text x="${fmt(plotLeft - 8)}" y="${y}" text-anchor="end" font-size="11">${value.toFixed(2)}</text>`
		);
	}

	const points = series
		.map((value, index) => `${fmt(scales.x(index + 1))},${fmt(scales.y(value))}`)
		.join(" ");
	const markers = series.map(
		(value, index) =>
			`<circle cx="${fmt(scales.x(index + 1))}" cy="${fmt(scales.y(value))}" r="4" fill="${SERIES_COLOR}" />`
	);
	const dayLabels = Array.from({ length: days }, (_, index) => {
		const day = index + 1;
		return `<text x="${fmt(scales.x(day))}" y="${fmt(size.height - MARGIN.bottom + 18)}" text-anchor="middle" font-size="11">${day}</text>`;
	});

	return [
		`<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}" viewBox="0 0 ${size.width} ${size.height}">`,
		`<rect width="100%" height="100%" fill="white" />`,
		`<text x="${fmt(size.width / 2)}" y="24" text-anchor="middle" font-size="16">${escapeXml(chartTitle(input.label))}</text>`,
		...grid,
		`<polyline points="${points}" fill="none" stroke="${SERIES_COLOR}" stroke-width="2" />`,
		...markers,
		`<circle cx="${fmt(scales.x(days))}" cy="${fmt(scales.y(predictedValue))}" r="6" fill="${PREDICTION_COLOR}" data-role="prediction" />`,
		...dayLabels,
		`<text x="${fmt(size.width / 2)}" y="${fmt(size.height - 8)}" text-anchor="middle" font-size="12">Day</text>`,
		`<text x="14" y="${fmt(size.height / 2)}" text-anchor="middle" font-size="12" transform="rotate(-90 14 ${fmt(size.height / 2)})">Value</text>`,
		`<text x="${fmt(plotRight)}" y="24" text-anchor="end" font-size="11"><tspan fill="${SERIES_COLOR}">Actual</tspan> / <tspan fill="${PREDICTION_COLOR}">Predicted</tspan></text>`,
		`</svg>`,
	].join("\n");
};

/** Writes the chart into `outputDir`, creating it when absent, and returns the file path. */
export const savePredictionChart = async (
	input: PredictionChartInput,
	options: SaveChartOptions
): Promise<string> => {
	const svg = renderPredictionChart(input, options.size ?? DEFAULT_SIZE);
	const outputDir = path.resolve(options.outputDir);
	await fs.mkdir(outputDir, { recursive: true });
	const filePath = path.join(outputDir, chartFileName(input.label));
	await fs.writeFile(filePath, svg, "utf8");
	logger.info("chart_saved", { label: input.label, path: filePath });
	return filePath;
};
