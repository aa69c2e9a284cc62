import { DEFAULT_DISCOVERY_OPTIONS } from "@core/discovery";
import { DEFAULT_RUNNER_OPTIONS } from "@core/execution";
import type { BooleanConfigKey, ConfigOptions, StringConfigKey } from "./types/core";

export const DEFAULT_CONFIG_FILE = "spacegrep-demo.json";

export const DEFAULT_CONFIG: Readonly<ConfigOptions> = {
	examplesDir: "examples",
	matcherPath: DEFAULT_RUNNER_OPTIONS.matcherPath,
	patternFlag: DEFAULT_RUNNER_OPTIONS.patternFlag,
	documentFlag: DEFAULT_RUNNER_OPTIONS.documentFlag,
	patternExtension: DEFAULT_DISCOVERY_OPTIONS.patternExtension,
	documentExtension: DEFAULT_DISCOVERY_OPTIONS.documentExtension,
	sort: DEFAULT_DISCOVERY_OPTIONS.sort,
	dryRun: DEFAULT_RUNNER_OPTIONS.dryRun,
};

export const STRING_CONFIG_KEYS: readonly StringConfigKey[] = [
	"examplesDir",
	"matcherPath",
	"patternFlag",
	"documentFlag",
	"patternExtension",
	"documentExtension",
];

export const BOOLEAN_CONFIG_KEYS: readonly BooleanConfigKey[] = [
	"sort",
	"dryRun",
];
