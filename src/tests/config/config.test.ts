import { writeFileSync } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
	Config,
	ConfigError,
	DEFAULT_CONFIG,
	parseConfigFile,
	validateConfig,
} from "../../core/config/index";
import { createTempDir, removeTempDir } from "../fakes";

describe("Config.load()", () => {
	let dir: string;

	beforeEach(() => {
		dir = createTempDir();
	});

	afterEach(() => {
		removeTempDir(dir);
	});

	test("should fall back to the defaults without a config file", async () => {
		const result = await new Config({ workingDir: dir }).load();

		expect(result).toEqual({
			ok: true,
			value: {
				examplesDir: "examples",
				matcherPath: "./bin/spacegrep",
				patternFlag: "--pattern-file",
				documentFlag: "--doc-file",
				patternExtension: ".pat",
				documentExtension: ".doc",
				sort: true,
				dryRun: false,
			},
		});
	});

	test("should read spacegrep-demo.json from the working directory", async () => {
		writeFileSync(
			path.join(dir, "spacegrep-demo.json"),
			JSON.stringify({ matcherPath: "/opt/spacegrep", sort: false }),
		);

		const config = new Config({ workingDir: dir });
		const result = await config.load();

		expect(result.ok).toBe(true);
		expect(config.get()).toEqual({
			...DEFAULT_CONFIG,
			matcherPath: "/opt/spacegrep",
			sort: false,
		});
	});

	test("should let overrides win over the config file", async () => {
		writeFileSync(
			path.join(dir, "demo.json"),
			JSON.stringify({ examplesDir: "from-file", patternFlag: "-p" }),
		);

		const result = await new Config({ workingDir: dir, configFile: "demo.json" })
			.withOverrides({ examplesDir: "from-cli" })
			.load();

		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.examplesDir).toBe("from-cli");
			expect(result.value.patternFlag).toBe("-p");
		}
	});

	test("should fail when an explicit config file is missing", async () => {
		const result = await new Config({
			workingDir: dir,
			configFile: "missing.json",
		}).load();

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigError);
			expect(result.error.message).toBe(
				`Config file not found: ${path.join(dir, "missing.json")}`,
			);
		}
	});

	test("should fail on malformed JSON", async () => {
		writeFileSync(path.join(dir, "spacegrep-demo.json"), "{ not json");

		const result = await new Config({ workingDir: dir }).load();

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe(
				`Failed to read config file ${path.join(dir, "spacegrep-demo.json")}`,
			);
			expect(result.error.cause).toBeInstanceOf(SyntaxError);
		}
	});

	test("should reject an override that leaves a value undefined", async () => {
		const config = new Config({ workingDir: dir }).withOverrides({
			matcherPath: undefined,
		});

		const result = await config.load();

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe(
				"Configuration value 'matcherPath' is undefined or empty",
			);
		}
		expect(config.get()).toEqual(DEFAULT_CONFIG);
	});
});

describe("parseConfigFile()", () => {
	test("should accept known keys", () => {
		expect(parseConfigFile({ examplesDir: "cases", dryRun: true }, "f.json")).toEqual({
			ok: true,
			value: { examplesDir: "cases", dryRun: true },
		});
	});

	test("should reject a non-object", () => {
		const result = parseConfigFile(["examples"], "f.json");

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("f.json: expected a JSON object");
		}
	});

	test("should reject unknown keys", () => {
		const result = parseConfigFile({ timeout: 10 }, "f.json");

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("f.json: unknown option 'timeout'");
		}
	});

	test("should reject values of the wrong type", () => {
		const asNumber = parseConfigFile({ matcherPath: 1 }, "f.json");
		const asString = parseConfigFile({ sort: "yes" }, "f.json");

		expect(asNumber.ok).toBe(false);
		if (!asNumber.ok) {
			expect(asNumber.error.message).toBe("f.json: 'matcherPath' must be a string");
		}
		expect(asString.ok).toBe(false);
		if (!asString.ok) {
			expect(asString.error.message).toBe("f.json: 'sort' must be a boolean");
		}
	});
});

describe("validateConfig()", () => {
	test("should reject an empty value", () => {
		const result = validateConfig({ ...DEFAULT_CONFIG, examplesDir: "" });

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe(
				"Configuration value 'examplesDir' is undefined or empty",
			);
		}
	});

	test("should reject a missing boolean", () => {
		const { dryRun: _dryRun, ...withoutDryRun } = DEFAULT_CONFIG;

		const result = validateConfig(withoutDryRun);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("Configuration value 'dryRun' is undefined");
		}
	});

	test("should pass a complete configuration through", () => {
		expect(validateConfig(DEFAULT_CONFIG)).toEqual({ ok: true, value: DEFAULT_CONFIG });
	});
});
