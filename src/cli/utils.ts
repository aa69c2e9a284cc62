import { Config, type ConfigOptions } from "@core/config";
import { type IFileSystemService, PairDiscovery } from "@core/discovery";
import type { DemoError } from "@core/errors";
import { InvocationError, type IMatcherInvoker } from "@core/execution";
import type { Logger } from "@core/logger";
import type { Command } from "commander";
import type { Result } from "../types/misc";

export interface CommandDependencies {
	logger?: Logger;
	invoker?: IMatcherInvoker;
	/** Directory the default config file is looked up in */
	workingDir?: string;
	fileSystem?: IFileSystemService;
	exit?: (code: number) => void;
}

export interface SharedOptions {
	directory?: string;
	patternExt?: string;
	documentExt?: string;
	sort: boolean;
	config?: string;
}

export interface RunOptions extends SharedOptions {
	bin?: string;
	patternFlag?: string;
	documentFlag?: string;
	dryRun?: boolean;
}

export interface ListOptions extends SharedOptions {
	json?: boolean;
}

export function addSharedOptions(command: Command): Command {
	return command
		.option("-d, --directory <dir>", "Examples directory (default: examples)")
		.option("--pattern-ext <ext>", "Pattern file suffix (default: .pat)")
		.option("--document-ext <ext>", "Document file suffix (default: .doc)")
		.option("--no-sort", "Keep directory listing order instead of sorting")
		.option(
			"-c, --config <file>",
			"JSON config file (default: spacegrep-demo.json if present)",
		);
}

/**
 * Maps the options actually given on the command line onto config keys, so
 * that anything left out falls through to the config file or the defaults.
 */
export function toConfigOverrides(
	command: Command,
	options: RunOptions,
): Partial<ConfigOptions> {
	const overrides: Partial<ConfigOptions> = {};

	if (options.directory !== undefined) overrides.examplesDir = options.directory;
	if (options.patternExt !== undefined)
		overrides.patternExtension = options.patternExt;
	if (options.documentExt !== undefined)
		overrides.documentExtension = options.documentExt;
	if (options.bin !== undefined) overrides.matcherPath = options.bin;
	if (options.patternFlag !== undefined)
		overrides.patternFlag = options.patternFlag;
	if (options.documentFlag !== undefined)
		overrides.documentFlag = options.documentFlag;
	if (command.getOptionValueSource("sort") === "cli") {
		overrides.sort = options.sort;
	}
	if (command.getOptionValueSource("dryRun") === "cli") {
		overrides.dryRun = options.dryRun;
	}

	return overrides;
}

export function loadConfig(
	command: Command,
	options: RunOptions,
	deps: CommandDependencies,
): Promise<Result<ConfigOptions, DemoError>> {
	return new Config({
		workingDir: deps.workingDir ?? process.cwd(),
		configFile: options.config,
	})
		.withOverrides(toConfigOverrides(command, options))
		.load();
}

export function createDiscovery(
	config: ConfigOptions,
	fileSystem?: IFileSystemService,
): PairDiscovery {
	return new PairDiscovery(config.examplesDir, {}, fileSystem)
		.withPatternExtension(config.patternExtension)
		.withDocumentExtension(config.documentExtension)
		.sorted(config.sort);
}

export function exitStatusFor(error: DemoError): number {
	return error instanceof InvocationError ? error.exitStatus : 1;
}

export function defaultExit(code: number): void {
	process.exit(code);
}
