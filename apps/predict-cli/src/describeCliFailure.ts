import { describeError, PredictorError } from "@slopecast/core";

export interface CliFailure {
	event: "cli_rejected_input" | "cli_unhandled_error";
	data: Record<string, unknown>;
	message: string;
}

export const describeCliFailure = (error: unknown): CliFailure => {
	if (error instanceof PredictorError) {
		return {
			event: "cli_rejected_input",
			data: {
				code: error.code,
				errorModule: error.module,
				message: error.message,
			},
			message: `Error: ${error.message}`,
		};
	}
	return {
		event: "cli_unhandled_error",
		data: {
			message: describeError(error),
			stack: error instanceof Error ? error.stack : undefined,
		},
		message: `Error: ${describeError(error)}`,
	};
};
