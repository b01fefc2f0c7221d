import { evaluateCommand } from "../checker/commandTemplate";
import type { CheckerConfig, PreflightResult } from "../checker/types";
import type { DiagnosticsSink } from "../lint/diagnosticsPublisher";
import type { DocumentSnapshot } from "../shared/documentSnapshot";
import { type JobNotifier, type Logger, logJobContext } from "../shared/logging";
import { describeError, resolveTempFileName, toError } from "../shared/textUtils";
import type { ProcessHandle, ProcessService } from "../shared/types";
import { type JobOutcome, completeJob } from "./completion";
import { Job } from "./job";
import type { JobRegistry } from "./jobRegistry";
import {
	type TempFileService,
	type TempInput,
	createTempInput,
} from "./tempFiles";

export type JobDeps = {
	processService: ProcessService;
	tempFiles: TempFileService;
	sink: DiagnosticsSink;
	notifier: JobNotifier;
	/** 0 disables the timeout. */
	timeoutMs: number;
};

export type LaunchResult =
	| { status: "started"; job: Job; completion: Promise<JobOutcome> }
	| { status: "disabled"; reason: string }
	| { status: "superseded" }
	| { status: "failed"; error: Error };

/**
 * Start a checker on a document snapshot.
 *
 * A running job of the same checker in `registry` is terminated and replaced.
 * Pre-flight failures return `disabled` before any file or process exists.
 */
export async function launchJob(
	snapshot: DocumentSnapshot,
	checker: CheckerConfig,
	registry: JobRegistry,
	deps: JobDeps,
): Promise<LaunchResult> {
	const { notifier, tempFiles } = deps;
	const prefix = `[${checker.id}]`;
	const generation = registry.nextGeneration(checker.id);

	if (checker.preflight) {
		const preflight = await runPreflight(checker, snapshot);
		if (!preflight.ok) {
			return { status: "disabled", reason: preflight.reason };
		}
	}

	let tempInput: TempInput | null = null;
	if (checker.inputMode === "file") {
		try {
			tempInput = await createTempInput(
				tempFiles,
				resolveTempFileName(snapshot.filePath, checker.tempFileSuffix),
				snapshot.text,
			);
		} catch (error) {
			return { status: "failed", error: toError(error) };
		}
	}

	if (!registry.isLatestGeneration(checker.id, generation)) {
		notifier.log(`${prefix} Launch for ${snapshot.uri} superseded before start`);
		await removeTempInput(tempInput, tempFiles, notifier, prefix);
		return { status: "superseded" };
	}

	let argv: string[];
	try {
		argv = evaluateCommand(checker.command, {
			snapshot,
			inputFile: tempInput?.filePath ?? snapshot.filePath,
			tempDir: tempInput?.dir ?? null,
		});
	} catch (error) {
		await removeTempInput(tempInput, tempFiles, notifier, prefix);
		return { status: "failed", error: toError(error) };
	}

	// Nothing below awaits until the new job is registered.
	const previous = registry.get(checker.id);
	if (previous?.terminate()) {
		notifier.log(`${prefix} Terminating superseded job #${previous.id}`);
	}

	let handle: ProcessHandle;
	try {
		handle = deps.processService.start({
			argv,
			stdin: checker.inputMode === "pipe" ? "pipe" : "ignore",
			cwd: snapshot.cwd,
			timeoutMs: deps.timeoutMs,
			...(checker.encoding ? { encoding: checker.encoding } : {}),
		});
	} catch (error) {
		registry.delete(checker.id);
		await removeTempInput(tempInput, tempFiles, notifier, prefix);
		return { status: "failed", error: toError(error) };
	}

	const job = new Job(snapshot.uri, checker.id, handle, tempInput);
	registry.set(checker.id, job);
	logJobContext(notifier, {
		checkerId: checker.id,
		jobId: job.id,
		uri: snapshot.uri,
		inputMode: checker.inputMode,
		argv,
		cwd: snapshot.cwd,
		...(tempInput ? { inputFile: tempInput.filePath } : {}),
	});

	const completion = new Promise<JobOutcome>((resolve) => {
		handle.onExit((status, output) => {
			resolve(
				completeJob(
					{
						job,
						checker,
						snapshot,
						registry,
						sink: deps.sink,
						notifier,
						tempFiles,
					},
					status,
					output,
				),
			);
		});
	});

	if (checker.inputMode === "pipe") {
		handle.write(Buffer.from(snapshot.text, "utf8"));
		handle.closeInput();
	}

	return { status: "started", job, completion };
}

async function runPreflight(
	checker: CheckerConfig,
	snapshot: DocumentSnapshot,
): Promise<PreflightResult> {
	if (!checker.preflight) {
		return { ok: true };
	}
	try {
		return await checker.preflight(snapshot);
	} catch (error) {
		return { ok: false, reason: describeError(error) };
	}
}

async function removeTempInput(
	tempInput: TempInput | null,
	tempFiles: TempFileService,
	logger: Logger,
	prefix: string,
): Promise<void> {
	if (!tempInput) {
		return;
	}
	try {
		await tempFiles.deleteRecursive(tempInput.dir);
	} catch (error) {
		logger.warn(
			`${prefix} Failed to remove temp dir ${tempInput.dir} (${describeError(error)})`,
		);
	}
}
