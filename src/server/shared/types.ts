/**
 * How a process ended.
 */
export type ExitStatus = {
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	/** Set when the process could not be started or failed at the OS level. */
	error?: Error;
	/** Set when writing to the process's input failed (e.g. EPIPE). */
	inputError?: Error;
	timedOut: boolean;
	outputLimitExceeded: boolean;
};

/**
 * Decoded output captured from a finished process.
 */
export type CapturedOutput = {
	stdout: string;
	stderr: string;
};

export type ExitCallback = (status: ExitStatus, output: CapturedOutput) => void;

export type StartProcessOptions = {
	argv: readonly string[];
	stdin: "pipe" | "ignore";
	cwd: string;
	/** 0 disables the timeout. */
	timeoutMs: number;
	/** Explicit output encoding; detected when absent. */
	encoding?: string;
};

/**
 * A started external process.
 */
export interface ProcessHandle {
	readonly pid: number | undefined;
	readonly exited: boolean;
	write(data: Buffer): void;
	closeInput(): void;
	/** Best-effort, non-blocking termination request. */
	terminate(): void;
	/** Registers a callback invoked exactly once when the process has ended. */
	onExit(callback: ExitCallback): void;
	/** Drops captured output buffers. */
	dispose(): void;
}

export interface ProcessService {
	start(options: StartProcessOptions): ProcessHandle;
}
