import type { Series, ZeroChangePolicy } from "@slopecast/core";
import { createLogger, InvalidSeriesError } from "@slopecast/core";
import type { Difference } from "@slopecast/indicators";
import {
	backwardDifference,
	centralDifference,
	clamp,
	differenceSeries,
	forwardDifference,
	mean,
	populationVariance,
	usableDifferences,
} from "@slopecast/indicators";

export interface PredictorOptions {
	zeroChangePolicy?: ZeroChangePolicy;
}

export interface TrendReport {
	forwardDifferences: Difference[];
	backwardDifferences: Difference[];
	centralDifferences: Difference[];
	/** null when the direction has no usable samples (single observation). */
	avgForwardTrend: number | null;
	avgBackwardTrend: number | null;
	avgCentralTrend: number | null;
}

export interface PredictionReport {
	finalPrediction: number;
	predictionMethod1: number;
	predictionMethod2: number;
	predictionMethod3: number;
	lastPrice: number;
	avgRecentTrend: number | null;
	confidenceScore: number;
}

export const PREDICTION_WEIGHTS = {
	momentum: 0.3,
	recentAverage: 0.4,
	smoothed: 0.3,
} as const;

export const RECENT_TREND_WINDOW = 3;
export const CONFIDENCE_WINDOW = 4;
export const FALLBACK_CONFIDENCE = 0.5;
export const MIN_CONFIDENCE = 0.1;
export const MAX_CONFIDENCE = 0.9;

const logger = createLogger("predictor");

const validateSeries = (values: readonly number[]): void => {
	if (values.length === 0) {
		throw new InvalidSeriesError("Series must contain at least one value");
	}
	values.forEach((value, index) => {
		if (typeof value !== "number" || !Number.isFinite(value)) {
			throw new InvalidSeriesError(
				`Series value at index ${index} must be a finite number, got ${String(value)}`,
				index
			);
		}
	});
};

/**
 * Next-value estimator over a fixed series. The series is copied and frozen on
 * construction; every method is a pure function of it.
 */
export class Predictor {
	private readonly series: Series;
	private readonly zeroChangePolicy: ZeroChangePolicy;

	constructor(values: readonly number[], options: PredictorOptions = {}) {
		validateSeries(values);
		this.series = Object.freeze([...values]);
		this.zeroChangePolicy = options.zeroChangePolicy ?? "include";
	}

	getSeries(): Series {
		return this.series;
	}

	get length(): number {
		return this.series.length;
	}

	forwardDifference(index: number): Difference {
		return forwardDifference(this.series, index);
	}

	backwardDifference(index: number): Difference {
		return backwardDifference(this.series, index);
	}

	centralDifference(index: number): Difference {
		return centralDifference(this.series, index);
	}

	trendMetrics(): TrendReport {
		const forwardDifferences = differenceSeries(this.series, "forward");
		const backwardDifferences = differenceSeries(this.series, "backward");
		const centralDifferences = differenceSeries(this.series, "central");
		return {
			forwardDifferences,
			backwardDifferences,
			centralDifferences,
			avgForwardTrend: this.averageOf(forwardDifferences),
			avgBackwardTrend: this.averageOf(backwardDifferences),
			avgCentralTrend: this.averageOf(centralDifferences),
		};
	}

	predictNextValue(): PredictionReport {
		const lastIndex = this.series.length - 1;
		const lastPrice = this.series[lastIndex];

		const predictionMethod1 =
			lastPrice + (this.backwardDifference(lastIndex) ?? 0);

		const avgRecentTrend = this.averageOf(
			this.recentBackwardDifferences(RECENT_TREND_WINDOW)
		);
		const predictionMethod2 = lastPrice + (avgRecentTrend ?? 0);

		const smoothedSlope =
			this.series.length >= 3 ? this.centralDifference(lastIndex - 1) : null;
		const predictionMethod3 =
			smoothedSlope === null ? predictionMethod2 : lastPrice + smoothedSlope;

		const finalPrediction =
			PREDICTION_WEIGHTS.momentum * predictionMethod1 +
			PREDICTION_WEIGHTS.recentAverage * predictionMethod2 +
			PREDICTION_WEIGHTS.smoothed * predictionMethod3;

		const report: PredictionReport = Object.freeze({
			finalPrediction,
			predictionMethod1,
			predictionMethod2,
			predictionMethod3,
			lastPrice,
			avgRecentTrend,
			confidenceScore: this.confidenceScore(),
		});

		logger.debug("prediction_computed", {
			length: this.series.length,
			zeroChangePolicy: this.zeroChangePolicy,
			...report,
		});

		return report;
	}

	confidenceScore(): number {
		if (this.series.length < 3) {
			return FALLBACK_CONFIDENCE;
		}
		const samples = usableDifferences(
			this.recentBackwardDifferences(CONFIDENCE_WINDOW),
			this.zeroChangePolicy
		);
		const variance = samples.length < 2 ? null : populationVariance(samples);
		if (variance === null) {
			return FALLBACK_CONFIDENCE;
		}
		return clamp(1 / (1 + variance), MIN_CONFIDENCE, MAX_CONFIDENCE);
	}

	private recentBackwardDifferences(window: number): Difference[] {
		const count = Math.min(window, this.series.length);
		const start = this.series.length - count;
		const result: Difference[] = [];
		for (let i = start; i < this.series.length; i += 1) {
			result.push(this.backwardDifference(i));
		}
		return result;
	}

	private averageOf(differences: readonly Difference[]): number | null {
		return mean(usableDifferences(differences, this.zeroChangePolicy));
	}
}

export const createPredictor = (
	values: readonly number[],
	options?: PredictorOptions
): Predictor => new Predictor(values, options);
