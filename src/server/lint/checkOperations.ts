import type { Diagnostic } from "vscode-languageserver/node";
import { DiagnosticSeverity } from "vscode-languageserver/node";
import { appliesTo } from "../checker/defineChecker";
import type { CheckerConfig } from "../checker/types";
import type { SupervisorSettings } from "../config/settings";
import type { JobOutcome } from "../job/completion";
import { type JobDeps, launchJob } from "../job/jobLauncher";
import type { TempFileService } from "../job/tempFiles";
import type { DocumentSnapshot } from "../shared/documentSnapshot";
import type { JobNotifier } from "../shared/logging";
import type { ProcessService } from "../shared/types";
import type { DocumentStateManager } from "../state/documentStateManager";
import type { NotificationManager } from "../state/notificationManager";
import type { DiagnosticsPublisher } from "./diagnosticsPublisher";
import type { CheckReason } from "./scheduler";

/** Batch id for diagnostics the supervisor publishes itself. */
export const SUPERVISOR_BATCH_ID = "lint-supervisor";

export type CheckOperationDeps = {
	processService: ProcessService;
	tempFiles: TempFileService;
	publisher: DiagnosticsPublisher;
	notificationManager: JobNotifier &
		Pick<NotificationManager, "maybeNotifyCheckerDisabled">;
	documentState: DocumentStateManager;
};

export type CheckResult = {
	diagnosticsCount: number;
	success: boolean;
};

/**
 * The checkers known to a server: registered from code and built from
 * configuration. Registered checkers win on id clashes.
 */
export class CheckerHost {
	private readonly registered: CheckerConfig[] = [];
	private configured: CheckerConfig[] = [];

	register(checker: CheckerConfig): void {
		if (this.registered.some((existing) => existing.id === checker.id)) {
			throw new Error(`checker ${checker.id} is already registered`);
		}
		this.registered.push(checker);
	}

	unregister(checkerId: string): boolean {
		const index = this.registered.findIndex(
			(checker) => checker.id === checkerId,
		);
		if (index < 0) {
			return false;
		}
		this.registered.splice(index, 1);
		return true;
	}

	setConfiguredCheckers(checkers: readonly CheckerConfig[]): void {
		this.configured = checkers.filter(
			(checker) =>
				!this.registered.some((existing) => existing.id === checker.id),
		);
	}

	all(): CheckerConfig[] {
		return [...this.registered, ...this.configured];
	}

	/**
	 * Checkers that run on a document of `languageId` under `settings`.
	 */
	checkersFor(
		languageId: string,
		settings: Pick<SupervisorSettings, "disabledCheckers">,
	): CheckerConfig[] {
		return this.all().filter(
			(checker) =>
				appliesTo(checker, languageId) &&
				!settings.disabledCheckers.includes(checker.id),
		);
	}
}

export function registerChecker(
	host: CheckerHost,
	checker: CheckerConfig,
): CheckerConfig {
	host.register(checker);
	return checker;
}

/**
 * Run every checker on a snapshot and wait until all jobs completed.
 * A document without a registry in `documentState` is not checked.
 *
 * @returns Number of reported diagnostics and whether every checker ran
 */
export async function executeCheck(
	snapshot: DocumentSnapshot,
	checkers: readonly CheckerConfig[],
	reason: CheckReason,
	settings: SupervisorSettings,
	deps: CheckOperationDeps,
): Promise<CheckResult> {
	const { publisher, notificationManager, documentState } = deps;
	const { uri } = snapshot;
	const registry = documentState.getRegistry(uri);
	if (!registry) {
		return { diagnosticsCount: 0, success: true };
	}
	publisher.retain(uri, [
		...checkers.map((checker) => checker.id),
		SUPERVISOR_BATCH_ID,
	]);

	const maxBytes = maxFileSizeBytes(settings.maxFileSizeKb);
	if (maxBytes !== null && reason !== "manual") {
		const sizeBytes = Buffer.byteLength(snapshot.text, "utf8");
		if (sizeBytes > maxBytes) {
			const sizeKb = Math.ceil(sizeBytes / 1024);
			notificationManager.log(
				`[executeCheck] Skipping ${uri}: ${sizeKb}KB > maxFileSizeKb=${settings.maxFileSizeKb}`,
			);
			for (const checker of checkers) {
				publisher.clear(uri, checker.id);
			}
			publisher.setBatch(uri, SUPERVISOR_BATCH_ID, [
				createFileTooLargeDiagnostic(sizeKb, settings.maxFileSizeKb),
			]);
			return { diagnosticsCount: 0, success: true };
		}
	}
	publisher.clear(uri, SUPERVISOR_BATCH_ID);

	const jobDeps: JobDeps = {
		processService: deps.processService,
		tempFiles: deps.tempFiles,
		sink: publisher,
		notifier: notificationManager,
		timeoutMs: settings.timeoutMs,
	};

	const launches = await Promise.all(
		checkers.map(async (checker) => ({
			checker,
			launch: await launchJob(snapshot, checker, registry, jobDeps),
		})),
	);

	const completions: Promise<JobOutcome>[] = [];
	let success = true;
	for (const { checker, launch } of launches) {
		switch (launch.status) {
			case "started":
				completions.push(launch.completion);
				break;
			case "disabled":
				publisher.clear(uri, checker.id);
				void notificationManager.maybeNotifyCheckerDisabled(
					checker.id,
					launch.reason,
				);
				break;
			case "failed":
				success = false;
				notificationManager.notifyRunFailure(checker.id, launch.error);
				publisher.report(snapshot, checker.id, []);
				break;
			case "superseded":
				break;
		}
	}

	let diagnosticsCount = 0;
	for (const outcome of await Promise.all(completions)) {
		if (outcome.kind === "reported") {
			diagnosticsCount += outcome.diagnostics.length;
		} else if (outcome.kind === "failed") {
			success = false;
		}
	}
	return { diagnosticsCount, success };
}

function maxFileSizeBytes(maxFileSizeKb: number): number | null {
	if (!Number.isFinite(maxFileSizeKb) || maxFileSizeKb <= 0) {
		return null;
	}
	return Math.floor(maxFileSizeKb * 1024);
}

function createFileTooLargeDiagnostic(
	sizeKb: number,
	maxFileSizeKb: number,
): Diagnostic {
	return {
		message: `Checks skipped (file too large: ${sizeKb}KB > maxFileSizeKb=${maxFileSizeKb}). Run a manual check or increase the limit.`,
		severity: DiagnosticSeverity.Information,
		range: {
			start: { line: 0, character: 0 },
			end: { line: 0, character: 0 },
		},
		source: SUPERVISOR_BATCH_ID,
		code: "check-skipped-file-too-large",
	};
}
