import { type ChildProcess, spawn } from "node:child_process";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { COMMAND_CACHE_TTL_MS, MAX_OUTPUT_BYTES } from "../config/constants";
import { decodeOutput } from "../lint/decodeOutput";
import type {
	CapturedOutput,
	ExitCallback,
	ExitStatus,
	ProcessHandle,
	ProcessService,
	StartProcessOptions,
} from "./types";

/**
 * Executable lookup cache (shared by every checker).
 */
const executableCache = new Map<
	string,
	{ resolved: string | null; checkedAt: number }
>();

/**
 * Resolve spawn command for Windows (wrap .cmd/.bat with cmd.exe /c).
 */
export function resolveSpawn(
	command: string,
	args: readonly string[],
): { command: string; args: string[] } {
	if (process.platform !== "win32") {
		return { command, args: [...args] };
	}
	const normalized = command.toLowerCase();
	if (normalized.endsWith(".cmd") || normalized.endsWith(".bat")) {
		const env = process.env as NodeJS.ProcessEnv & { ComSpec?: string };
		const comspec = env.ComSpec ?? "cmd.exe";
		return { command: comspec, args: ["/c", command, ...args] };
	}
	return { command, args: [...args] };
}

async function isExecutableFile(filePath: string): Promise<boolean> {
	try {
		const stat = await fs.stat(filePath);
		if (!stat.isFile()) {
			return false;
		}
		if (process.platform !== "win32") {
			await fs.access(filePath, fs.constants.X_OK);
		}
		return true;
	} catch {
		return false;
	}
}

function candidatePaths(command: string): string[] {
	if (command.includes("/") || command.includes("\\")) {
		return [path.resolve(command)];
	}
	const dirs = (process.env["PATH"] ?? "").split(path.delimiter).filter(Boolean);
	const extensions =
		process.platform === "win32"
			? ["", ...(process.env["PATHEXT"] ?? ".EXE;.CMD;.BAT").split(";")]
			: [""];
	return dirs.flatMap((dir) =>
		extensions.map((extension) => path.join(dir, `${command}${extension}`)),
	);
}

/**
 * Resolve a command to an executable file, searching PATH for bare names.
 * Results are cached for COMMAND_CACHE_TTL_MS.
 */
export async function findExecutable(command: string): Promise<string | null> {
	const cached = executableCache.get(command);
	if (cached && Date.now() - cached.checkedAt < COMMAND_CACHE_TTL_MS) {
		return cached.resolved;
	}
	let resolved: string | null = null;
	for (const candidate of candidatePaths(command)) {
		if (await isExecutableFile(candidate)) {
			resolved = candidate;
			break;
		}
	}
	executableCache.set(command, { resolved, checkedAt: Date.now() });
	return resolved;
}

/**
 * Forget cached executable lookups, e.g. after the configuration changed.
 */
export function clearExecutableCache(): void {
	executableCache.clear();
}

type Settled = { status: ExitStatus; output: CapturedOutput };

class NodeProcessHandle implements ProcessHandle {
	private readonly child: ChildProcess;
	private readonly encoding: string | undefined;
	private stdoutChunks: Buffer[] = [];
	private stderrChunks: Buffer[] = [];
	private outputBytes = 0;
	private callbacks: ExitCallback[] = [];
	private settled: Settled | null = null;
	private timer: NodeJS.Timeout | null = null;
	private inputClosed = false;
	private inputError: Error | undefined;

	constructor(options: StartProcessOptions) {
		const [command, ...args] = options.argv;
		if (!command) {
			throw new Error("cannot start a process without a command");
		}
		this.encoding = options.encoding;
		const spawnSpec = resolveSpawn(command, args);

		this.child = spawn(spawnSpec.command, spawnSpec.args, {
			cwd: options.cwd,
			stdio: [options.stdin, "pipe", "pipe"],
		});

		this.child.stdin?.on("error", (error) => {
			this.inputError = error;
		});
		this.child.stdout?.on("data", (data: Buffer) => {
			this.collect(this.stdoutChunks, data);
		});
		this.child.stderr?.on("data", (data: Buffer) => {
			this.collect(this.stderrChunks, data);
		});
		this.child.on("error", (error) => {
			this.settle({ exitCode: null, signal: null, error });
		});
		this.child.on("close", (exitCode, signal) => {
			this.settle({ exitCode, signal });
		});

		if (options.timeoutMs > 0) {
			this.timer = setTimeout(() => {
				this.child.kill();
				this.settle({ exitCode: null, signal: null, timedOut: true });
			}, options.timeoutMs);
		}
	}

	get pid(): number | undefined {
		return this.child.pid;
	}

	get exited(): boolean {
		return this.settled !== null;
	}

	write(data: Buffer): void {
		if (this.inputClosed) {
			throw new Error("process input is already closed");
		}
		this.child.stdin?.write(data);
	}

	closeInput(): void {
		if (this.inputClosed) {
			return;
		}
		this.inputClosed = true;
		this.child.stdin?.end();
	}

	terminate(): void {
		if (this.settled) {
			return;
		}
		this.child.kill();
	}

	onExit(callback: ExitCallback): void {
		const settled = this.settled;
		if (settled) {
			queueMicrotask(() => callback(settled.status, settled.output));
			return;
		}
		this.callbacks.push(callback);
	}

	dispose(): void {
		this.stdoutChunks = [];
		this.stderrChunks = [];
		this.callbacks = [];
	}

	private collect(chunks: Buffer[], data: Buffer): void {
		if (this.settled) {
			return;
		}
		this.outputBytes += data.length;
		if (this.outputBytes > MAX_OUTPUT_BYTES) {
			this.child.kill();
			this.settle({
				exitCode: null,
				signal: null,
				outputLimitExceeded: true,
			});
			return;
		}
		chunks.push(data);
	}

	private settle(
		partial: Pick<ExitStatus, "exitCode" | "signal"> &
			Partial<Pick<ExitStatus, "error" | "timedOut" | "outputLimitExceeded">>,
	): void {
		if (this.settled) {
			return;
		}
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		const stdout = decodeOutput(Buffer.concat(this.stdoutChunks), this.encoding);
		let stderr = decodeOutput(Buffer.concat(this.stderrChunks), this.encoding);
		if (partial.outputLimitExceeded) {
			stderr += `\nOutput exceeded ${MAX_OUTPUT_BYTES} bytes; process terminated`;
		}
		const status: ExitStatus = {
			exitCode: partial.exitCode,
			signal: partial.signal,
			timedOut: partial.timedOut ?? false,
			outputLimitExceeded: partial.outputLimitExceeded ?? false,
			...(partial.error ? { error: partial.error } : {}),
			...(this.inputError ? { inputError: this.inputError } : {}),
		};
		const settled: Settled = { status, output: { stdout, stderr } };
		this.settled = settled;

		const callbacks = this.callbacks;
		this.callbacks = [];
		for (const callback of callbacks) {
			callback(settled.status, settled.output);
		}
	}
}

/**
 * Process service backed by node:child_process.
 */
export class NodeProcessService implements ProcessService {
	start(options: StartProcessOptions): ProcessHandle {
		return new NodeProcessHandle(options);
	}
}
