import { Console } from "node:console";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

type Nullable<T> = T | null | undefined;

// Log lines go to stderr so stdout stays free for command output.
const logConsole = new Console({
	stdout: process.stderr,
	stderr: process.stderr,
});

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

export const parseModuleFilter = (raw?: string): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

export interface LogSettings {
	minLevel: LogLevel;
	moduleFilter: Set<string> | null;
	prettyEnabled: boolean;
	jsonEnabled: boolean;
}

/** Read on every call so values loaded from .env after import still apply. */
export const readLogSettings = (
	env: NodeJS.ProcessEnv = process.env
): LogSettings => {
	const prettyEnabled =
		env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: normalizeLevel(env.LOG_LEVEL),
		moduleFilter: parseModuleFilter(env.LOG_MODULE),
		prettyEnabled,
		jsonEnabled: env.LOG_JSON === "true" || !prettyEnabled,
	};
};

const shouldLog = (
	settings: LogSettings,
	level: LogLevel,
	moduleName: string
): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.moduleFilter && !settings.moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	const settings = readLogSettings();
	if (!shouldLog(settings, payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (settings.prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			logConsole.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.jsonEnabled) {
		try {
			const json = JSON.stringify(sanitizePayload(base));
			logConsole.log(json);
		} catch (err) {
			logConsole.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

export const sanitizePayload = (
	payload: Record<string, unknown>
): Record<string, unknown> => {
	const seen = new WeakSet<object>();
	const clone: Record<string, unknown> = {};
	for (const [key, nested] of Object.entries(payload)) {
		clone[key] = sanitizeValue(nested, seen);
	}
	return clone;
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	logConsole.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "prediction_report": {
				printPredictionReport(rest);
				break;
			}
			default: {
				if (Object.keys(rest).length > 0) {
					logConsole.log(JSON.stringify(sanitizePayload(rest)));
				}
				break;
			}
		}
	} catch (error) {
		logConsole.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const pickNumber = (value: unknown): Nullable<number> =>
	typeof value === "number" ? value : null;

const printPredictionReport = (rest: Record<string, unknown>): void => {
	logConsole.table([
		{
			label: typeof rest.label === "string" ? rest.label : "-",
			length: pickNumber(rest.length),
			lastPrice: pickNumber(rest.lastPrice),
			finalPrediction: pickNumber(rest.finalPrediction),
			confidenceScore: pickNumber(rest.confidenceScore),
		},
	]);
};
