import * as path from "node:path";
import { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";

/**
 * Immutable copy of a document taken when a check starts.
 */
export type DocumentSnapshot = {
	uri: string;
	languageId: string;
	version: number;
	text: string;
	lines: readonly string[];
	/** Absolute path for file: URIs, null otherwise. */
	filePath: string | null;
	workspaceRoot: string | null;
	cwd: string;
	textDocument: TextDocument;
};

export type SnapshotSource = {
	uri: string;
	languageId: string;
	version: number;
	getText(): string;
};

export function createDocumentSnapshot(
	document: SnapshotSource,
	workspaceFolders: readonly string[],
): DocumentSnapshot {
	const { uri, languageId, version } = document;
	const parsedUri = URI.parse(uri);
	const filePath = parsedUri.scheme === "file" ? parsedUri.fsPath : null;
	const workspaceRoot = resolveWorkspaceRoot(filePath, workspaceFolders);
	const cwd =
		workspaceRoot ?? (filePath ? path.dirname(filePath) : process.cwd());
	const text = document.getText();

	return Object.freeze({
		uri,
		languageId,
		version,
		text,
		lines: Object.freeze(text.split(/\r\n|\r|\n/)),
		filePath,
		workspaceRoot,
		cwd,
		textDocument: TextDocument.create(uri, languageId, version, text),
	});
}

function resolveWorkspaceRoot(
	filePath: string | null,
	workspaceFolders: readonly string[],
): string | null {
	if (!filePath) {
		return workspaceFolders[0] ?? null;
	}
	const target = comparablePath(filePath);
	const containing = workspaceFolders.find((folder) => {
		const root = comparablePath(folder);
		return target === root || target.startsWith(`${root}${path.sep}`);
	});
	return containing ?? null;
}

// Windows paths compare case-insensitively.
function comparablePath(filePath: string): string {
	const resolved = path.resolve(filePath);
	return process.platform === "win32" ? resolved.toLowerCase() : resolved;
}

/**
 * Offsets of a whole 1-based line, without its line break.
 * Lines past either end are clamped into the document.
 */
export function lineRange(
	snapshot: DocumentSnapshot,
	line: number,
): { start: number; end: number } {
	const index = clampLineIndex(snapshot, line);
	const start = snapshot.textDocument.offsetAt({ line: index, character: 0 });
	const lineText = snapshot.lines[index] ?? "";
	return { start, end: start + lineText.length };
}

/**
 * Offset of a 1-based line and column; the column is clamped to the line.
 */
export function positionOffset(
	snapshot: DocumentSnapshot,
	line: number,
	column: number,
): number {
	const index = clampLineIndex(snapshot, line);
	const start = snapshot.textDocument.offsetAt({ line: index, character: 0 });
	const lineText = snapshot.lines[index] ?? "";
	const character = Math.min(Math.max(0, column - 1), lineText.length);
	return start + character;
}

function clampLineIndex(snapshot: DocumentSnapshot, line: number): number {
	const lastIndex = Math.max(0, snapshot.lines.length - 1);
	if (!Number.isFinite(line)) {
		return 0;
	}
	return Math.min(Math.max(0, Math.floor(line) - 1), lastIndex);
}
