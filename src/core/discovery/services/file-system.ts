import { existsSync, statSync } from "node:fs";
import path from "node:path";
import { escape, glob } from "glob";

export interface IFileSystemService {
	findFilesWithExtension(
		directoryPath: string,
		extension: string,
	): Promise<string[]>;
	isDirectory(path: string): boolean;
	exists(path: string): boolean;
}

export class FileSystemService implements IFileSystemService {
	/**
	 * Lists files directly inside `directoryPath` whose names end with
	 * `extension`, in the order glob returns them.
	 */
	async findFilesWithExtension(
		directoryPath: string,
		extension: string,
	): Promise<string[]> {
		const files = await glob(`*${escape(extension)}`, {
			cwd: directoryPath,
			nodir: true,
		});

		return files.map((file) => path.join(directoryPath, file));
	}

	isDirectory(dirPath: string): boolean {
		try {
			return statSync(dirPath).isDirectory();
		} catch {
			return false;
		}
	}

	exists(filePath: string): boolean {
		return existsSync(filePath);
	}
}
