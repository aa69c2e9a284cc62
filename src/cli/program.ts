import { Command } from "commander";
import packageJson from "../../package.json";
import { createListCommand } from "./commands/list";
import { createRunCommand } from "./commands/run";
import type { CommandDependencies } from "./utils";

export function createProgram(deps: CommandDependencies = {}): Command {
	const program = new Command();

	program
		.name("spacegrep-demo")
		.description("Run the spacegrep matcher over the example pattern/document pairs")
		.version(packageJson.version);

	// run is what a bare invocation does
	program.addCommand(createRunCommand(deps), { isDefault: true });
	program.addCommand(createListCommand(deps));

	return program;
}
