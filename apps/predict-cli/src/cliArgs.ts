import type { ZeroChangePolicy } from "@slopecast/core";
import { InvalidSeriesError } from "@slopecast/core";

export type ArgValue = string | boolean;

export type OutputFormat = "text" | "json" | "csv";

export interface PredictCliOptions {
	configDir?: string;
	prices?: number[];
	label?: string;
	example?: string;
	outputDir?: string;
	chart: boolean;
	format: OutputFormat;
	zeroChangePolicy: ZeroChangePolicy;
	help: boolean;
}

/** Flags that never take a value, so a following token stays positional. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
	"chart",
	"json",
	"excludeZeroChanges",
	"help",
]);

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (BOOLEAN_FLAGS.has(key)) {
			args[key] = true;
		} else if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals.length && args.prices === undefined) {
		args.prices = positionals.join(",");
	}
	return args;
};

export const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

const getBooleanArg = (args: Record<string, ArgValue>, key: string): boolean => {
	const value = args[key];
	if (typeof value === "string") {
		return value !== "false" && value !== "0";
	}
	return value === true;
};

/** Splits on commas and whitespace; every token must parse to a finite number. */
export const parsePriceList = (raw: string): number[] => {
	const tokens = raw
		.split(/[\s,]+/)
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	if (!tokens.length) {
		throw new InvalidSeriesError("--prices needs at least one value");
	}
	return tokens.map((token, index) => {
		const value = Number(token);
		if (!Number.isFinite(value)) {
			throw new InvalidSeriesError(
				`--prices value "${token}" at position ${index} is not a finite number`,
				index
			);
		}
		return value;
	});
};

const parseFormat = (args: Record<string, ArgValue>): OutputFormat => {
	if (getBooleanArg(args, "json")) {
		return "json";
	}
	const raw = getStringArg(args, "format");
	if (raw === undefined || raw === "text" || raw === "json" || raw === "csv") {
		return raw ?? "text";
	}
	throw new InvalidSeriesError(
		`--format must be one of text, json, csv (got "${raw}")`
	);
};

export const resolveCliOptions = (
	args: Record<string, ArgValue>
): PredictCliOptions => {
	const rawPrices = args.prices;
	if (typeof rawPrices === "boolean") {
		throw new InvalidSeriesError("--prices needs at least one value");
	}
	return {
		configDir: getStringArg(args, "config"),
		prices: rawPrices === undefined ? undefined : parsePriceList(rawPrices),
		label: getStringArg(args, "label"),
		example: getStringArg(args, "example"),
		outputDir: getStringArg(args, "outputDir"),
		chart: getBooleanArg(args, "chart"),
		format: parseFormat(args),
		zeroChangePolicy: getBooleanArg(args, "excludeZeroChanges")
			? "exclude"
			: "include",
		help: getBooleanArg(args, "help"),
	};
};
