/**
 * A pattern file and the document it is matched against, sharing a base name
 * and directory.
 */
export interface ExamplePair {
	name: string;
	patternPath: string;
	documentPath: string;
}

export interface DiscoveryOptions {
	patternExtension?: string;
	documentExtension?: string;
	/** Sort pairs by pattern path instead of keeping directory listing order */
	sort?: boolean;
}
