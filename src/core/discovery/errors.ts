import { DemoError } from "../errors";

export class DiscoveryError extends DemoError {
	constructor(message: string, cause?: Error) {
		super(message, cause);
		this.name = "DiscoveryError";
	}
}

export class PatternPathError extends DiscoveryError {
	constructor(
		public readonly patternPath: string,
		public readonly extension: string,
	) {
		super(`Pattern file '${patternPath}' does not end with '${extension}'`);
		this.name = "PatternPathError";
	}
}
