export type PredictorErrorCode =
	| "INVALID_INPUT"
	| "INDEX_OUT_OF_RANGE"
	| "INVALID_CONFIG";

/**
 * Base error for every precondition the prediction stack rejects. `module`
 * names the logger module that raised it; the CLI logs it as `errorModule`.
 */
export class PredictorError extends Error {
	constructor(
		message: string,
		public readonly code: PredictorErrorCode,
		public readonly module: string
	) {
		super(message);
		this.name = "PredictorError";
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

export class InvalidSeriesError extends PredictorError {
	constructor(
		message: string,
		public readonly index: number | null = null
	) {
		super(message, "INVALID_INPUT", "predictor");
		this.name = "InvalidSeriesError";
	}
}

export class SeriesIndexError extends PredictorError {
	constructor(
		public readonly index: number,
		public readonly length: number
	) {
		super(
			`Index ${index} is outside the series (length ${length})`,
			"INDEX_OUT_OF_RANGE",
			"predictor"
		);
		this.name = "SeriesIndexError";
	}
}

export class ConfigError extends PredictorError {
	constructor(
		message: string,
		public readonly source?: string
	) {
		super(source ? `${message} (${source})` : message, "INVALID_CONFIG", "config");
		this.name = "ConfigError";
	}
}

export const describeError = (err: unknown): string =>
	err instanceof Error ? err.message : String(err);
