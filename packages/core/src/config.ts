import fs from "node:fs";
import path from "node:path";

import { ConfigError } from "./errors";

export interface ChartConfig {
	width: number;
	height: number;
}

export interface ExampleSeries {
	name: string;
	prices: number[];
}

export interface PredictorConfig {
	outputDir: string;
	chart: ChartConfig;
	examples: ExampleSeries[];
}

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
}

export interface ConfigLoadOptions {
	configDir?: string;
	env?: NodeJS.ProcessEnv;
}

export const CONFIG_FILE_NAME = "predictor.json";

export const DEFAULT_PREDICTOR_CONFIG: PredictorConfig = {
	outputDir: "output/charts",
	chart: { width: 800, height: 400 },
	examples: [],
};

const WORKSPACE_SENTINELS = [path.join("config", CONFIG_FILE_NAME), ".git"];

const metadataStore = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = metadataStore.get(config) ?? {};
	metadataStore.set(config, { ...existing, ...metadata });
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	metadataStore.get(config) ?? null;

let cachedWorkspaceRoot: string | undefined;

export const getWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigDir = (): string =>
	path.join(getWorkspaceRoot(), "config");

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readPositiveIntEnv = (
	env: NodeJS.ProcessEnv,
	key: string
): number | undefined => {
	const raw = readOptionalEnvVar(env, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
	}
	return value;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const ensurePositiveInt = (
	value: unknown,
	field: string,
	fallback: number,
	source: string
): number => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${field} must be a positive integer`, source);
	}
	return value;
};

const parseExamples = (value: unknown, source: string): ExampleSeries[] => {
	if (value === undefined) {
		return [];
	}
	if (!Array.isArray(value)) {
		throw new ConfigError("examples must be an array", source);
	}
	return value.map((entry, index) => {
		if (!isRecord(entry) || typeof entry.name !== "string" || !entry.name) {
			throw new ConfigError(`examples[${index}] must have a name`, source);
		}
		const prices = entry.prices;
		if (
			!Array.isArray(prices) ||
			prices.length === 0 ||
			!prices.every(
				(price): price is number =>
					typeof price === "number" && Number.isFinite(price)
			)
		) {
			throw new ConfigError(
				`examples[${index}].prices must be a non-empty list of finite numbers`,
				source
			);
		}
		return { name: entry.name, prices: [...prices] };
	});
};

export const parsePredictorConfig = (
	raw: unknown,
	source: string,
	baseDir: string
): PredictorConfig => {
	if (!isRecord(raw)) {
		throw new ConfigError("config root must be an object", source);
	}
	const outputDir = raw.outputDir ?? DEFAULT_PREDICTOR_CONFIG.outputDir;
	if (typeof outputDir !== "string" || !outputDir.trim()) {
		throw new ConfigError("outputDir must be a non-empty string", source);
	}
	const chart = raw.chart ?? {};
	if (!isRecord(chart)) {
		throw new ConfigError("chart must be an object", source);
	}
	return {
		outputDir: path.resolve(baseDir, outputDir),
		chart: {
			width: ensurePositiveInt(
				chart.width,
				"chart.width",
				DEFAULT_PREDICTOR_CONFIG.chart.width,
				source
			),
			height: ensurePositiveInt(
				chart.height,
				"chart.height",
				DEFAULT_PREDICTOR_CONFIG.chart.height,
				source
			),
		},
		examples: parseExamples(raw.examples, source),
	};
};

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (err) {
		throw new ConfigError(
			`invalid JSON: ${err instanceof Error ? err.message : "parse failed"}`,
			filePath
		);
	}
};

/**
 * Reads `<configDir>/predictor.json` and layers the SLOPECAST_* environment
 * overrides on top. Relative paths in the file resolve against the directory
 * that contains `configDir`; the output dir override resolves against cwd.
 */
export const loadPredictorConfig = (
	options: ConfigLoadOptions = {}
): PredictorConfig => {
	const configDir = options.configDir ?? getDefaultConfigDir();
	const env = options.env ?? process.env;
	const configPath = path.join(configDir, CONFIG_FILE_NAME);
	const baseDir = path.dirname(path.resolve(configDir));

	const fromFile = fs.existsSync(configPath);
	const parsed = fromFile
		? parsePredictorConfig(readJsonFile(configPath), configPath, baseDir)
		: {
				...DEFAULT_PREDICTOR_CONFIG,
				outputDir: path.resolve(baseDir, DEFAULT_PREDICTOR_CONFIG.outputDir),
			};

	const outputOverride = readOptionalEnvVar(env, "SLOPECAST_OUTPUT_DIR");
	const widthOverride = readPositiveIntEnv(env, "SLOPECAST_CHART_WIDTH");
	const heightOverride = readPositiveIntEnv(env, "SLOPECAST_CHART_HEIGHT");
	const overridden =
		outputOverride !== undefined ||
		widthOverride !== undefined ||
		heightOverride !== undefined;

	const config: PredictorConfig = {
		outputDir: outputOverride
			? path.resolve(outputOverride)
			: parsed.outputDir,
		chart: {
			width: widthOverride ?? parsed.chart.width,
			height: heightOverride ?? parsed.chart.height,
		},
		examples: parsed.examples,
	};

	return withConfigMetadata(config, {
		source: !fromFile ? "embedded" : overridden ? "merged" : "file",
		path: fromFile ? configPath : undefined,
	});
};
