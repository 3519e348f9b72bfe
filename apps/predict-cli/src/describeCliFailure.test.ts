import { describe, expect, it } from "vitest";
import { ConfigError, InvalidSeriesError } from "@slopecast/core";
import { describeCliFailure } from "./describeCliFailure";

describe("describeCliFailure", () => {
	it("reports the code and raising module of a rejected input", () => {
		const error = new InvalidSeriesError("--prices needs at least one value");
		expect(describeCliFailure(error)).toEqual({
			event: "cli_rejected_input",
			data: {
				code: "INVALID_INPUT",
				errorModule: "predictor",
				message: "--prices needs at least one value",
			},
			message: "Error: --prices needs at least one value",
		});
	});

	it("names the config module for configuration failures", () => {
		const failure = describeCliFailure(new ConfigError("bad file", "x.json"));
		expect(failure.data.errorModule).toBe("config");
		expect(failure.message).toBe("Error: bad file (x.json)");
	});

	it("falls back to an unhandled error for anything else", () => {
		const failure = describeCliFailure("boom");
		expect(failure.event).toBe("cli_unhandled_error");
		expect(failure.data).toEqual({ message: "boom", stack: undefined });
		expect(failure.message).toBe("Error: boom");
	});
});
