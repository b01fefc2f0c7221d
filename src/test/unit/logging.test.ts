import * as assert from "node:assert";
import { type Logger, logJobContext } from "../../server/shared/logging";

function createRecordingLogger(): { logger: Logger; lines: string[] } {
	const lines: string[] = [];
	return {
		lines,
		logger: {
			log: (message) => lines.push(message),
			warn: (message) => lines.push(`warn: ${message}`),
			error: (message) => lines.push(`error: ${message}`),
		},
	};
}

suite("logJobContext", () => {
	test("logs a pipe-mode launch", () => {
		const { logger, lines } = createRecordingLogger();

		logJobContext(logger, {
			checkerId: "diag",
			jobId: 4,
			uri: "file:///work/a.txt",
			inputMode: "pipe",
			argv: ["diag-tool", "--stdin"],
			cwd: "/work",
		});

		assert.deepStrictEqual(lines, [
			"[diag] Job #4 for file:///work/a.txt",
			'[diag] Command: ["diag-tool","--stdin"]',
			"[diag] CWD: /work",
			"[diag] Input: pipe",
		]);
	});

	test("logs the temp file of a file-mode launch", () => {
		const { logger, lines } = createRecordingLogger();

		logJobContext(logger, {
			checkerId: "diag",
			jobId: 5,
			uri: "file:///work/a.txt",
			inputMode: "file",
			argv: ["diag-tool", "/tmp/x/a.txt"],
			cwd: "/work",
			inputFile: "/tmp/x/a.txt",
		});

		assert.strictEqual(lines.length, 4);
		assert.strictEqual(lines[3], "[diag] Input file: /tmp/x/a.txt");
	});
});
