import type { InputMode } from "../checker/types";

export type Logger = {
	log(message: string): void;
	warn(message: string): void;
	error(message: string): void;
};

/**
 * What job code needs from the notification layer.
 */
export type JobNotifier = Logger & {
	notifyRunFailure(checkerId: string, error: unknown): void;
	notifyStderr(checkerId: string, stderr: string): void;
};

export type JobLogContext = {
	checkerId: string;
	jobId: number;
	uri: string;
	inputMode: InputMode;
	argv: readonly string[];
	cwd: string;
	/** Temp file path (file mode only) */
	inputFile?: string;
};

/**
 * Log launch details with consistent formatting.
 */
export function logJobContext(logger: Logger, context: JobLogContext): void {
	const prefix = `[${context.checkerId}]`;

	logger.log(`${prefix} Job #${context.jobId} for ${context.uri}`);
	logger.log(`${prefix} Command: ${JSON.stringify(context.argv)}`);
	logger.log(`${prefix} CWD: ${context.cwd}`);

	if (context.inputFile !== undefined) {
		logger.log(`${prefix} Input file: ${context.inputFile}`);
	} else {
		logger.log(`${prefix} Input: ${context.inputMode}`);
	}
}
