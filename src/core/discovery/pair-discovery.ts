import { basename } from "node:path";
import { DEFAULT_DISCOVERY_OPTIONS } from "./config";
import { DiscoveryError, PatternPathError } from "./errors";
import {
	FileSystemService,
	type IFileSystemService,
} from "./services/file-system";
import type { DiscoveryOptions, ExamplePair } from "./types/core";

/**
 * Derives the document path of a pair by swapping the pattern suffix for the
 * document suffix. Nothing else in the path changes.
 */
export function toDocumentPath(
	patternPath: string,
	patternExtension = DEFAULT_DISCOVERY_OPTIONS.patternExtension,
	documentExtension = DEFAULT_DISCOVERY_OPTIONS.documentExtension,
): string {
	if (!patternExtension || !patternPath.endsWith(patternExtension)) {
		throw new PatternPathError(patternPath, patternExtension);
	}

	return (
		patternPath.slice(0, patternPath.length - patternExtension.length) +
		documentExtension
	);
}

export class PairDiscovery {
	private options: Required<DiscoveryOptions>;

	constructor(
		private directoryPath: string,
		options: Partial<DiscoveryOptions> = {},
		private fileSystem: IFileSystemService = new FileSystemService(),
	) {
		this.options = { ...DEFAULT_DISCOVERY_OPTIONS, ...options };
	}

	withPatternExtension(extension: string): this {
		this.options.patternExtension = extension;
		return this;
	}

	withDocumentExtension(extension: string): this {
		this.options.documentExtension = extension;
		return this;
	}

	sorted(sort = true): this {
		this.options.sort = sort;
		return this;
	}

	get directory(): string {
		return this.directoryPath;
	}

	/**
	 * Find every pattern file in the examples directory and pair it with its
	 * document. Document existence is not checked here.
	 */
	async findPairs(): Promise<readonly ExamplePair[]> {
		const { patternExtension, documentExtension, sort } = this.options;

		if (!this.fileSystem.isDirectory(this.directoryPath)) {
			throw new DiscoveryError(
				`Examples directory not found: ${this.directoryPath}`,
			);
		}

		let patternPaths: string[];
		try {
			patternPaths = await this.fileSystem.findFilesWithExtension(
				this.directoryPath,
				patternExtension,
			);
		} catch (error) {
			throw new DiscoveryError(
				`Failed to list pattern files in ${this.directoryPath}`,
				error instanceof Error ? error : undefined,
			);
		}

		if (sort) {
			patternPaths.sort();
		}

		return patternPaths.map((patternPath) => ({
			name: basename(patternPath, patternExtension),
			patternPath,
			documentPath: toDocumentPath(
				patternPath,
				patternExtension,
				documentExtension,
			),
		}));
	}

	/**
	 * Whether the document of a pair is present on disk
	 */
	hasDocument(pair: ExamplePair): boolean {
		return this.fileSystem.exists(pair.documentPath);
	}
}
