import type { DiscoveryOptions } from "./types/core";

export const DEFAULT_DISCOVERY_OPTIONS: Required<DiscoveryOptions> = {
	patternExtension: ".pat",
	documentExtension: ".doc",
	sort: true,
} as const;
