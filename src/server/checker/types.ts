import type { DocumentSnapshot } from "../shared/documentSnapshot";

export type InputMode = "pipe" | "file";

export type OutputStream = "stdout" | "stderr" | "both";

export type CheckSeverity = "error" | "warning" | "information" | "hint";

/**
 * What an extraction function returns for one match.
 * A candidate whose severity is null or undefined is dropped.
 */
export type DiagnosticCandidate = {
	start: number;
	end: number;
	severity: CheckSeverity | null | undefined;
	message: string;
	code?: string;
};

export type ExtractFn = (
	match: RegExpMatchArray,
	snapshot: DocumentSnapshot,
) => DiagnosticCandidate | null;

export type PreflightResult = { ok: true } | { ok: false; reason: string };

export type PreflightFn = (
	snapshot: DocumentSnapshot,
) => PreflightResult | Promise<PreflightResult>;

/**
 * Values available to a command template.
 */
export type CommandContext = {
	snapshot: DocumentSnapshot;
	/** File the checker reads: the temp file in file mode, the document path otherwise. */
	inputFile: string | null;
	tempDir: string | null;
};

export type CommandTemplate =
	| readonly string[]
	| ((context: CommandContext) => readonly string[]);

export type CheckerConfig = {
	readonly id: string;
	/** Label put on published diagnostics. */
	readonly source: string;
	readonly command: CommandTemplate;
	readonly inputMode: InputMode;
	readonly matcher: RegExp;
	readonly extract: ExtractFn;
	readonly preflight?: PreflightFn;
	/** Language ids this checker applies to; empty means every language. */
	readonly languages: readonly string[];
	readonly outputStream: OutputStream;
	readonly tempFileSuffix: string;
	readonly encoding?: string;
};

/**
 * One reported issue, produced by the output parser.
 */
export type CheckDiagnostic = {
	document: DocumentSnapshot;
	start: number;
	end: number;
	severity: CheckSeverity;
	message: string;
	code?: string;
	source: string;
};
