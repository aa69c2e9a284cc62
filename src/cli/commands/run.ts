/**
 * Run command, launches the matcher on every example pair in order and stops
 * at the first failure
 */

import { DemoRunner, MatcherInvoker } from "@core/execution";
import { consoleLogger } from "@core/logger";
import { Command } from "commander";
import {
	addSharedOptions,
	type CommandDependencies,
	createDiscovery,
	defaultExit,
	exitStatusFor,
	loadConfig,
	type RunOptions,
} from "../utils";

export function createRunCommand(deps: CommandDependencies = {}): Command {
	const logger = deps.logger ?? consoleLogger;
	const exit = deps.exit ?? defaultExit;

	return addSharedOptions(new Command("run"))
		.description("Run the matcher on every pattern/document pair")
		.option("-b, --bin <path>", "Matcher executable (default: ./bin/spacegrep)")
		.option(
			"--pattern-flag <flag>",
			"Option that passes the pattern file (default: --pattern-file)",
		)
		.option(
			"--document-flag <flag>",
			"Option that passes the document file (default: --doc-file)",
		)
		.option("-n, --dry-run", "Print the command lines without running them")
		.option("--no-dry-run", "Run the matcher even if the config file sets dryRun")
		.action(async (options: RunOptions, command: Command) => {
			const loaded = await loadConfig(command, options, deps);
			if (!loaded.ok) {
				logger.error(`ERROR: ${loaded.error.message}`);
				exit(exitStatusFor(loaded.error));
				return;
			}

			const config = loaded.value;
			const runner = new DemoRunner(
				createDiscovery(config, deps.fileSystem),
				config,
				deps.invoker ?? new MatcherInvoker(),
				logger,
			);

			const result = await runner.run();
			if (!result.ok) {
				logger.error(`ERROR: ${result.error.message}`);
				exit(exitStatusFor(result.error));
				return;
			}

			if (result.value.pairs.length === 0) {
				logger.warn(`No example pairs found in ${config.examplesDir}`);
			}
		});
}
