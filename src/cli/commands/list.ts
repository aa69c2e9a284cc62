/**
 * List command, shows the example pairs the run command would use without
 * launching anything
 */

import { DemoError } from "@core/errors";
import { consoleLogger } from "@core/logger";
import { Command } from "commander";
import {
	addSharedOptions,
	type CommandDependencies,
	createDiscovery,
	defaultExit,
	type ListOptions,
	loadConfig,
} from "../utils";

export function createListCommand(deps: CommandDependencies = {}): Command {
	const logger = deps.logger ?? consoleLogger;
	const exit = deps.exit ?? defaultExit;

	return addSharedOptions(new Command("list"))
		.description("List the pattern/document pairs in the examples directory")
		.option("-j, --json", "Output JSON")
		.action(async (options: ListOptions, command: Command) => {
			const loaded = await loadConfig(command, options, deps);
			if (!loaded.ok) {
				logger.error(`ERROR: ${loaded.error.message}`);
				exit(1);
				return;
			}

			const discovery = createDiscovery(loaded.value, deps.fileSystem);
			try {
				const pairs = await discovery.findPairs();
				const listed = pairs.map((pair) => ({
					...pair,
					hasDocument: discovery.hasDocument(pair),
				}));

				if (options.json) {
					logger.log(JSON.stringify(listed, null, 2));
					return;
				}

				if (listed.length === 0) {
					logger.log(`No example pairs found in ${discovery.directory}`);
					return;
				}

				logger.log(`Discovered ${listed.length} example pairs:`);
				listed.forEach((pair, index) => {
					const missing = pair.hasDocument ? "" : " [missing document]";
					logger.log(
						`${index + 1}. ${pair.name} (${pair.patternPath} -> ${pair.documentPath})${missing}`,
					);
				});
			} catch (err) {
				if (!(err instanceof DemoError)) {
					throw err;
				}
				logger.error(`ERROR: ${err.message}`);
				exit(1);
			}
		});
}
