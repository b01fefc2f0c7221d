/**
 * Recording fakes for the notifier and diagnostics sink.
 */

import type { CheckDiagnostic } from "../../server/checker/types";
import type { DiagnosticsSink } from "../../server/lint/diagnosticsPublisher";
import type { JobNotifier } from "../../server/shared/logging";

export interface NotifierCalls {
	log: string[];
	warn: string[];
	error: string[];
	runFailures: Array<{ checkerId: string; error: unknown }>;
	stderr: Array<{ checkerId: string; stderr: string }>;
	disabled: Array<{ checkerId: string; reason: string }>;
}

export function createRecordingNotifier(): {
	notifier: JobNotifier & {
		maybeNotifyCheckerDisabled: (
			checkerId: string,
			reason: string,
		) => Promise<void>;
	};
	calls: NotifierCalls;
} {
	const calls: NotifierCalls = {
		log: [],
		warn: [],
		error: [],
		runFailures: [],
		stderr: [],
		disabled: [],
	};
	return {
		calls,
		notifier: {
			log: (message) => {
				calls.log.push(message);
			},
			warn: (message) => {
				calls.warn.push(message);
			},
			error: (message) => {
				calls.error.push(message);
			},
			notifyRunFailure: (checkerId, error) => {
				calls.runFailures.push({ checkerId, error });
			},
			notifyStderr: (checkerId, stderr) => {
				calls.stderr.push({ checkerId, stderr });
			},
			maybeNotifyCheckerDisabled: async (checkerId, reason) => {
				calls.disabled.push({ checkerId, reason });
			},
		},
	};
}

export type SinkReport = {
	uri: string;
	checkerId: string;
	diagnostics: readonly CheckDiagnostic[];
};

export function createRecordingSink(): {
	sink: DiagnosticsSink;
	reports: SinkReport[];
} {
	const reports: SinkReport[] = [];
	return {
		reports,
		sink: {
			report: (snapshot, checkerId, diagnostics) => {
				reports.push({ uri: snapshot.uri, checkerId, diagnostics });
			},
		},
	};
}
