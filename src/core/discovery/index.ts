export { PairDiscovery, toDocumentPath } from "./pair-discovery";
export { DEFAULT_DISCOVERY_OPTIONS } from "./config";
export { DiscoveryError, PatternPathError } from "./errors";

export type { DiscoveryOptions, ExamplePair } from "./types/core";
export type { IFileSystemService } from "./services/file-system";
