import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadEnvFiles } from "./env";
import { createLogger } from "./utils/logger";

let tmpRoot: string;
const savedLevel = process.env.LOG_LEVEL;

beforeEach(() => {
	tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), "slopecast-env-"));
	delete process.env.LOG_LEVEL;
});

afterEach(() => {
	vi.restoreAllMocks();
	fs.rmSync(tmpRoot, { recursive: true, force: true });
	if (savedLevel === undefined) {
		delete process.env.LOG_LEVEL;
	} else {
		process.env.LOG_LEVEL = savedLevel;
	}
});

describe("loadEnvFiles", () => {
	it("returns nothing when the project has no env files", () => {
		expect(loadEnvFiles(tmpRoot)).toEqual([]);
	});

	it("applies LOG_LEVEL from .env to a logger created before loading", () => {
		const logger = createLogger("env-check");
		fs.writeFileSync(path.join(tmpRoot, ".env"), "LOG_LEVEL=debug\n");

		expect(loadEnvFiles(tmpRoot)).toEqual([path.join(tmpRoot, ".env")]);
		expect(process.env.LOG_LEVEL).toBe("debug");

		const lines: string[] = [];
		vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
			lines.push(String(chunk));
			return true;
		});
		logger.debug("prediction_computed");
		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0]).event).toBe("prediction_computed");
	});
});
