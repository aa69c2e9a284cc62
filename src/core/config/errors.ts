import { DemoError } from "../errors";

export class ConfigError extends DemoError {
	constructor(message: string, cause?: Error) {
		super(message, cause);
		this.name = "ConfigError";
	}
}
