import {
	type Connection,
	type Diagnostic,
	DiagnosticSeverity,
} from "vscode-languageserver/node";
import type { CheckDiagnostic, CheckSeverity } from "../checker/types";
import type { DocumentSnapshot } from "../shared/documentSnapshot";

/**
 * Receives the final batch of one completed, current job.
 */
export interface DiagnosticsSink {
	report(
		snapshot: DocumentSnapshot,
		checkerId: string,
		diagnostics: readonly CheckDiagnostic[],
	): void;
}

function mapSeverity(severity: CheckSeverity): DiagnosticSeverity {
	switch (severity) {
		case "error":
			return DiagnosticSeverity.Error;
		case "warning":
			return DiagnosticSeverity.Warning;
		case "hint":
			return DiagnosticSeverity.Hint;
		default:
			return DiagnosticSeverity.Information;
	}
}

/**
 * Convert a diagnostic's offsets into an LSP diagnostic using the snapshot
 * the job ran against.
 */
export function toLspDiagnostic(diagnostic: CheckDiagnostic): Diagnostic {
	const textDocument = diagnostic.document.textDocument;
	return {
		range: {
			start: textDocument.positionAt(diagnostic.start),
			end: textDocument.positionAt(diagnostic.end),
		},
		severity: mapSeverity(diagnostic.severity),
		message: diagnostic.message,
		source: diagnostic.source,
		...(diagnostic.code !== undefined ? { code: diagnostic.code } : {}),
	};
}

/**
 * Publishes diagnostics over the LSP connection.
 *
 * Each checker owns one batch per document; a publish sends every batch of
 * the document, checkers in the order they first reported.
 */
export class DiagnosticsPublisher implements DiagnosticsSink {
	private readonly batchesByUri = new Map<string, Map<string, Diagnostic[]>>();

	constructor(private readonly connection: Pick<Connection, "sendDiagnostics">) {}

	report(
		snapshot: DocumentSnapshot,
		checkerId: string,
		diagnostics: readonly CheckDiagnostic[],
	): void {
		this.setBatch(snapshot.uri, checkerId, diagnostics.map(toLspDiagnostic));
	}

	/**
	 * Replace a checker's batch with diagnostics built outside a job.
	 */
	setBatch(uri: string, checkerId: string, diagnostics: Diagnostic[]): void {
		let batches = this.batchesByUri.get(uri);
		if (!batches) {
			batches = new Map();
			this.batchesByUri.set(uri, batches);
		}
		batches.set(checkerId, diagnostics);
		this.publish(uri);
	}

	/**
	 * Drop one checker's batch, or every batch of the document.
	 */
	clear(uri: string, checkerId?: string): void {
		const batches = this.batchesByUri.get(uri);
		if (checkerId === undefined) {
			this.batchesByUri.delete(uri);
			void this.connection.sendDiagnostics({ uri, diagnostics: [] });
			return;
		}
		if (!batches?.delete(checkerId)) {
			return;
		}
		this.publish(uri);
	}

	/**
	 * Drop the batches of checkers that no longer run on the document.
	 */
	retain(uri: string, checkerIds: readonly string[]): void {
		const batches = this.batchesByUri.get(uri);
		if (!batches) {
			return;
		}
		let changed = false;
		for (const checkerId of [...batches.keys()]) {
			if (!checkerIds.includes(checkerId)) {
				batches.delete(checkerId);
				changed = true;
			}
		}
		if (changed) {
			this.publish(uri);
		}
	}

	diagnosticsFor(uri: string): Diagnostic[] {
		const batches = this.batchesByUri.get(uri);
		return batches ? [...batches.values()].flat() : [];
	}

	private publish(uri: string): void {
		void this.connection.sendDiagnostics({
			uri,
			diagnostics: this.diagnosticsFor(uri),
		});
	}
}
