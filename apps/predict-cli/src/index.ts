#!/usr/bin/env node

import process from "node:process";
import {
	createLogger,
	getWorkspaceRoot,
	loadEnvFiles,
	loadPredictorConfig,
} from "@slopecast/core";
import { parseCliArgs, resolveCliOptions } from "./cliArgs";
import { describeCliFailure } from "./describeCliFailure";
import { runPredictions } from "./runPredictions";

const logger = createLogger("predict-cli");

const USAGE = `Usage:
  npm run predict -- [prices...] [options]

Options:
  --prices <list>          Comma separated observations, oldest first
  --label <name>           Label for --prices (default "Custom Series")
  --example <name>         Run one example from predictor.json
  --config <dir>           Directory holding predictor.json (default ./config)
  --outputDir <dir>        Where --chart writes SVG files
  --chart                  Save one SVG chart per dataset
  --format <text|json|csv> Output format (default text)
  --json                   Shorthand for --format json
  --excludeZeroChanges     Drop exact zero changes when averaging
  --help                   Show this message
`;

const main = async (): Promise<number> => {
	const workspaceRoot = getWorkspaceRoot();
	const envFiles = loadEnvFiles(workspaceRoot);
	const options = resolveCliOptions(parseCliArgs(process.argv.slice(2)));
	if (options.help) {
		console.log(USAGE);
		return 0;
	}

	const config = loadPredictorConfig({ configDir: options.configDir });
	logger.debug("cli_starting", {
		workspaceRoot,
		envFiles,
		format: options.format,
		chart: options.chart,
		zeroChangePolicy: options.zeroChangePolicy,
	});

	const run = await runPredictions(options, config);
	console.log(run.output);
	return 0;
};

main()
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		const failure = describeCliFailure(error);
		logger.error(failure.event, failure.data);
		console.error(failure.message);
		process.exit(1);
	});
