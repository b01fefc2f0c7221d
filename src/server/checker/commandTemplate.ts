import * as path from "node:path";
import type { CommandContext, CommandTemplate } from "./types";

/**
 * Evaluate a command template into argv.
 *
 * String parts expand `${file}`, `${sourceFile}`, `${fileBasename}`,
 * `${fileDirname}`, `${tempDir}` and `${workspaceFolder}`. Placeholders
 * without a value expand to an empty string.
 */
export function evaluateCommand(
	template: CommandTemplate,
	context: CommandContext,
): string[] {
	const parts =
		typeof template === "function"
			? template(context)
			: template.map((part) => expandPlaceholders(part, context));
	const argv = [...parts];
	if (argv.length === 0 || !argv[0]) {
		throw new Error("command template produced no executable");
	}
	return argv;
}

export function expandPlaceholders(
	value: string,
	context: CommandContext,
): string {
	const { snapshot, inputFile, tempDir } = context;
	const sourceFile = snapshot.filePath ?? "";
	const file = inputFile ?? sourceFile;
	return value
		.replaceAll(`\${workspaceFolder}`, snapshot.workspaceRoot ?? snapshot.cwd)
		.replaceAll(`\${fileBasename}`, file ? path.basename(file) : "")
		.replaceAll(`\${fileDirname}`, file ? path.dirname(file) : "")
		.replaceAll(`\${sourceFile}`, sourceFile)
		.replaceAll(`\${tempDir}`, tempDir ?? "")
		.replaceAll(`\${file}`, file);
}
