import type { CheckDiagnostic, CheckerConfig } from "../checker/types";
import type { DiagnosticsSink } from "../lint/diagnosticsPublisher";
import { parseOutput } from "../lint/parseOutput";
import type { DocumentSnapshot } from "../shared/documentSnapshot";
import type { JobNotifier, Logger } from "../shared/logging";
import { describeError, toError } from "../shared/textUtils";
import type { CapturedOutput, ExitStatus } from "../shared/types";
import type { Job } from "./job";
import type { JobRegistry } from "./jobRegistry";
import type { TempFileService } from "./tempFiles";

export type JobOutcome =
	| { kind: "reported"; diagnostics: CheckDiagnostic[] }
	| { kind: "obsolete" }
	| { kind: "failed"; error: Error };

export type CompletionContext = {
	job: Job;
	checker: CheckerConfig;
	snapshot: DocumentSnapshot;
	registry: JobRegistry;
	sink: DiagnosticsSink;
	notifier: JobNotifier;
	tempFiles: TempFileService;
};

/**
 * Handle the exit of a job's process.
 *
 * Currency is decided from the registry at the moment this runs. Only a
 * current job reports; cleanup runs on every path.
 */
export async function completeJob(
	context: CompletionContext,
	status: ExitStatus,
	output: CapturedOutput,
): Promise<JobOutcome> {
	const { job, checker, registry, notifier } = context;
	job.markExited();
	try {
		if (!registry.clearIfCurrent(checker.id, job)) {
			notifier.warn(
				`[${checker.id}] Discarding obsolete job #${job.id} for ${job.uri}`,
			);
			return { kind: "obsolete" };
		}
		return reportResults(context, status, output);
	} catch (error) {
		notifier.error(
			`[${checker.id}] Job #${job.id} completion failed (${describeError(error)})`,
		);
		return { kind: "failed", error: toError(error) };
	} finally {
		await cleanupJob(job, context.tempFiles, notifier);
	}
}

function reportResults(
	context: CompletionContext,
	status: ExitStatus,
	output: CapturedOutput,
): JobOutcome {
	const { job, checker, snapshot, sink, notifier } = context;
	const prefix = `[${checker.id}]`;

	if (status.inputError) {
		notifier.log(
			`${prefix} Writing input failed (${describeError(status.inputError)})`,
		);
	}

	if (status.error) {
		notifier.notifyRunFailure(checker.id, status.error);
		sink.report(snapshot, checker.id, []);
		return { kind: "failed", error: status.error };
	}

	if (status.timedOut || status.outputLimitExceeded) {
		const error = new Error(
			status.timedOut
				? `${checker.id} timed out`
				: `${checker.id} produced too much output`,
		);
		notifier.warn(`${prefix} ${error.message}`);
		sink.report(snapshot, checker.id, []);
		return { kind: "failed", error };
	}

	if (checker.outputStream === "stdout" && output.stderr.trim()) {
		notifier.notifyStderr(checker.id, output.stderr);
	}

	const diagnostics = parseOutput({
		output: selectOutput(checker, output),
		checker,
		snapshot,
		logger: notifier,
	});
	sink.report(snapshot, checker.id, diagnostics);
	notifier.log(
		`${prefix} Job #${job.id} exited (code ${status.exitCode ?? "none"}) with ${diagnostics.length} diagnostic(s)`,
	);
	return { kind: "reported", diagnostics };
}

function selectOutput(checker: CheckerConfig, output: CapturedOutput): string {
	switch (checker.outputStream) {
		case "stdout":
			return output.stdout;
		case "stderr":
			return output.stderr;
		default:
			if (!output.stdout || !output.stderr || output.stdout.endsWith("\n")) {
				return output.stdout + output.stderr;
			}
			return `${output.stdout}\n${output.stderr}`;
	}
}

/**
 * Release the output buffer and delete the temp directory.
 * Each step is attempted even if the other fails.
 */
export async function cleanupJob(
	job: Job,
	tempFiles: TempFileService,
	logger: Logger,
): Promise<void> {
	try {
		job.handle.dispose();
	} catch (error) {
		logger.warn(
			`[${job.checkerId}] Failed to release output of job #${job.id} (${describeError(error)})`,
		);
	}
	if (job.tempInput) {
		try {
			await tempFiles.deleteRecursive(job.tempInput.dir);
		} catch (error) {
			logger.warn(
				`[${job.checkerId}] Failed to remove temp dir ${job.tempInput.dir} (${describeError(error)})`,
			);
		}
	}
}
