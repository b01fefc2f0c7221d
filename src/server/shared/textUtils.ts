import * as path from "node:path";
import { UNTITLED_BASENAME } from "../config/constants";

/**
 * Extract the first line from a text string.
 * Returns the entire string if no newline is found.
 */
export function firstLine(text: string): string {
	const index = text.indexOf("\n");
	if (index === -1) {
		return text;
	}
	return text.slice(0, index);
}

/**
 * File name for a temp copy of a document, falling back to
 * `untitled<suffix>` when the document has no path.
 */
export function resolveTempFileName(
	filePath: string | null,
	suffix: string,
): string {
	const baseName = filePath ? path.basename(filePath) : "";
	return baseName || `${UNTITLED_BASENAME}${suffix}`;
}

/**
 * Error message for logs and notifications.
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
