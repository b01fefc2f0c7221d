import { TextDocument } from "vscode-languageserver-textdocument";
import {
	type DocumentSnapshot,
	createDocumentSnapshot,
} from "../../server/shared/documentSnapshot";

export const TEST_URI = "file:///work/project/notes.txt";

/**
 * Snapshot of an in-memory document.
 */
export function createTestSnapshot(
	text: string,
	options: {
		uri?: string;
		languageId?: string;
		version?: number;
		workspaceFolders?: string[];
	} = {},
): DocumentSnapshot {
	const document = TextDocument.create(
		options.uri ?? TEST_URI,
		options.languageId ?? "plaintext",
		options.version ?? 1,
		text,
	);
	return createDocumentSnapshot(document, options.workspaceFolders ?? []);
}
