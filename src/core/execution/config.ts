import type { RunnerOptions } from "./types";

export const DEFAULT_RUNNER_OPTIONS: RunnerOptions = {
	matcherPath: "./bin/spacegrep",
	patternFlag: "--pattern-file",
	documentFlag: "--doc-file",
	dryRun: false,
} as const;

export const ECHO_PREFIX = ">>> ";
