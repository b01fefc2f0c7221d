import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { TEMP_DIR_PREFIX } from "../config/constants";

export interface TempFileService {
	createTempDir(): Promise<string>;
	writeFile(filePath: string, content: string): Promise<void>;
	deleteRecursive(target: string): Promise<void>;
}

/**
 * A document snapshot written to its own temp directory.
 */
export type TempInput = {
	dir: string;
	filePath: string;
};

/**
 * Temp file service on node:fs, rooted at the OS temp directory by default.
 */
export function createTempFileService(
	root: string = os.tmpdir(),
): TempFileService {
	return {
		createTempDir: () => fs.mkdtemp(path.join(root, TEMP_DIR_PREFIX)),
		writeFile: (filePath, content) => fs.writeFile(filePath, content, "utf8"),
		deleteRecursive: (target) =>
			fs.rm(target, { recursive: true, force: true }),
	};
}

/**
 * Create a fresh temp directory holding `content` as `fileName`.
 * The directory is removed again if writing fails.
 */
export async function createTempInput(
	service: TempFileService,
	fileName: string,
	content: string,
): Promise<TempInput> {
	const dir = await service.createTempDir();
	const filePath = path.join(dir, fileName);
	try {
		await service.writeFile(filePath, content);
	} catch (error) {
		await service.deleteRecursive(dir);
		throw error;
	}
	return { dir, filePath };
}
