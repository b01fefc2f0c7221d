import {
	type Connection,
	createConnection,
	ProposedFeatures,
	TextDocumentSyncKind,
	TextDocuments,
} from "vscode-languageserver/node";
import { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";
import { checkersFromSettings } from "./checker/settingsChecker";
import type { CheckerConfig } from "./checker/types";
import {
	CHECK_DOCUMENT_REQUEST,
	CLEAR_DIAGNOSTICS_NOTIFICATION,
	MAX_CONCURRENT_RUNS,
} from "./config/constants";
import { createTempFileService } from "./job/tempFiles";
import {
	type CheckOperationDeps,
	CheckerHost,
	executeCheck,
} from "./lint/checkOperations";
import { DiagnosticsPublisher } from "./lint/diagnosticsPublisher";
import {
	type CheckReason,
	CheckScheduler,
	type PendingCheck,
} from "./lint/scheduler";
import { createDocumentSnapshot } from "./shared/documentSnapshot";
import { runHandlerSafely } from "./shared/errorHandling";
import { describeError } from "./shared/textUtils";
import { clearExecutableCache, NodeProcessService } from "./shared/processRunner";
import type { ProcessService } from "./shared/types";
import { DocumentStateManager } from "./state/documentStateManager";
import { NotificationManager } from "./state/notificationManager";
import { SettingsManager } from "./state/settingsManager";

export type ServerOptions = {
	/** Checkers available in addition to those from configuration. */
	checkers?: readonly CheckerConfig[];
	connection?: Connection;
	processService?: ProcessService;
};

/**
 * Start the language server on the given (or a stdio/IPC) connection.
 */
export function startServer(options: ServerOptions = {}): CheckerHost {
	const connection = options.connection ?? createConnection(ProposedFeatures.all);
	const documents = new TextDocuments(TextDocument);

	const notificationManager = new NotificationManager(connection);
	const settingsManager = new SettingsManager(connection, notificationManager);
	const documentState = new DocumentStateManager();
	const publisher = new DiagnosticsPublisher(connection);
	const host = new CheckerHost();
	for (const checker of options.checkers ?? []) {
		host.register(checker);
	}

	const deps: CheckOperationDeps = {
		processService: options.processService ?? new NodeProcessService(),
		tempFiles: createTempFileService(),
		publisher,
		notificationManager,
		documentState,
	};

	let workspaceFolders: string[] = [];

	const scheduler = new CheckScheduler({
		maxConcurrentRuns: MAX_CONCURRENT_RUNS,
		getDocumentVersion: (uri) => documents.get(uri)?.version ?? null,
		runCheck: (uri, pending) => runCheckNow(uri, pending),
	});

	connection.onInitialize((params) => {
		workspaceFolders =
			params.workspaceFolders?.map((folder) => URI.parse(folder.uri).fsPath) ??
			[];
		return {
			capabilities: {
				textDocumentSync: {
					openClose: true,
					change: TextDocumentSyncKind.Incremental,
					save: { includeText: false },
				},
			},
		};
	});

	connection.onInitialized(() => {
		void runHandlerSafely(notificationManager, "initialization", refreshSettings);
	});

	connection.onDidChangeConfiguration(() => {
		void runHandlerSafely(notificationManager, "configuration change", async () => {
			await refreshSettings();
			clearExecutableCache();
			for (const document of documents.all()) {
				void requestCheck(document.uri, "open", document.version);
			}
		});
	});

	documents.onDidOpen((change) => {
		void runHandlerSafely(notificationManager, "open", async () => {
			const settings = await settingsManager.getSettingsForDocument(
				change.document.uri,
			);
			if (settings.runOnOpen) {
				void requestCheck(change.document.uri, "open", change.document.version);
			}
		});
	});

	documents.onDidChangeContent((change) => {
		void runHandlerSafely(notificationManager, "change", async () => {
			const settings = await settingsManager.getSettingsForDocument(
				change.document.uri,
			);
			if (settings.runOnType) {
				void requestCheck(
					change.document.uri,
					"change",
					change.document.version,
					settings.debounceMs,
				);
			}
		});
	});

	documents.onDidSave((change) => {
		void runHandlerSafely(notificationManager, "save", async () => {
			const settings = await settingsManager.getSettingsForDocument(
				change.document.uri,
			);
			if (settings.runOnSave) {
				void requestCheck(change.document.uri, "save", change.document.version);
			}
		});
	});

	documents.onDidClose((change) => {
		releaseDocument(change.document.uri);
	});

	connection.onRequest(
		CHECK_DOCUMENT_REQUEST,
		async (params: { uri: string }) => {
			const issues = await requestCheck(params.uri, "manual", null);
			return { ok: issues >= 0, issues: Math.max(0, issues) };
		},
	);

	connection.onNotification(
		CLEAR_DIAGNOSTICS_NOTIFICATION,
		(params: { uris: string[] }) => {
			for (const uri of params.uris) {
				releaseDocument(uri);
			}
		},
	);

	connection.onShutdown(() => {
		scheduler.dispose();
		documentState.releaseAll();
	});

	documents.listen(connection);
	connection.listen();
	return host;

	async function refreshSettings(): Promise<void> {
		await settingsManager.refreshSettings();
		host.setConfiguredCheckers(
			checkersFromSettings(
				settingsManager.getSettings().checkers,
				notificationManager,
			),
		);
	}

	function releaseDocument(uri: string): void {
		scheduler.clear(uri);
		documentState.releaseDocument(uri);
		publisher.clear(uri);
	}

	async function requestCheck(
		uri: string,
		reason: CheckReason,
		version: number | null,
		debounceMs?: number,
	): Promise<number> {
		const document = documents.get(uri);
		if (!document) {
			return 0;
		}
		return await scheduler.requestCheck(
			uri,
			reason,
			version ?? document.version,
			debounceMs,
		);
	}

	async function runCheckNow(uri: string, pending: PendingCheck): Promise<number> {
		if (!documents.get(uri)) {
			return 0;
		}
		try {
			const settings = await settingsManager.getSettingsForDocument(uri);
			// The document may have been closed while settings were fetched.
			const document = documents.get(uri);
			if (!document) {
				return 0;
			}
			documentState.registryFor(uri);
			const checkers = host.checkersFor(document.languageId, settings);
			const snapshot = createDocumentSnapshot(document, workspaceFolders);
			const result = await executeCheck(
				snapshot,
				checkers,
				pending.reason,
				settings,
				deps,
			);
			return result.success ? result.diagnosticsCount : -1;
		} catch (error) {
			notificationManager.error(
				`lint-supervisor: check of ${uri} failed (${describeError(error)})`,
			);
			return -1;
		}
	}
}
