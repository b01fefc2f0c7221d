/**
 * In-process stand-in for the process service.
 * Handles never exit on their own; tests end them with `finish`.
 */

import type {
	CapturedOutput,
	ExitCallback,
	ExitStatus,
	ProcessHandle,
	ProcessService,
	StartProcessOptions,
} from "../../server/shared/types";

export class FakeProcessHandle implements ProcessHandle {
	/** Ordered record of input and termination calls. */
	readonly events: string[] = [];
	readonly written: Buffer[] = [];
	inputClosed = false;
	terminated = false;
	disposed = false;
	disposeError: Error | null = null;
	private readonly callbacks: ExitCallback[] = [];
	private finished = false;

	constructor(
		readonly options: StartProcessOptions,
		readonly pid: number,
	) {}

	get exited(): boolean {
		return this.finished;
	}

	get input(): string {
		return Buffer.concat(this.written).toString("utf8");
	}

	write(data: Buffer): void {
		if (this.inputClosed) {
			throw new Error("write after closeInput");
		}
		this.events.push("write");
		this.written.push(data);
	}

	closeInput(): void {
		this.inputClosed = true;
		this.events.push("close");
	}

	terminate(): void {
		this.terminated = true;
		this.events.push("terminate");
	}

	onExit(callback: ExitCallback): void {
		this.callbacks.push(callback);
	}

	dispose(): void {
		if (this.disposeError) {
			throw this.disposeError;
		}
		this.disposed = true;
	}

	/**
	 * Simulate the process ending.
	 */
	finish(
		output: Partial<CapturedOutput> = {},
		status: Partial<ExitStatus> = {},
	): void {
		if (this.finished) {
			return;
		}
		this.finished = true;
		const fullStatus: ExitStatus = {
			exitCode: 0,
			signal: null,
			timedOut: false,
			outputLimitExceeded: false,
			...status,
		};
		const fullOutput: CapturedOutput = {
			stdout: output.stdout ?? "",
			stderr: output.stderr ?? "",
		};
		for (const callback of this.callbacks) {
			callback(fullStatus, fullOutput);
		}
	}
}

export class FakeProcessService implements ProcessService {
	readonly handles: FakeProcessHandle[] = [];
	startError: Error | null = null;

	start(options: StartProcessOptions): FakeProcessHandle {
		if (this.startError) {
			throw this.startError;
		}
		const handle = new FakeProcessHandle(options, this.handles.length + 1);
		this.handles.push(handle);
		return handle;
	}

	handle(index: number): FakeProcessHandle {
		const handle = this.handles[index];
		if (!handle) {
			throw new Error(`no process was started at index ${index}`);
		}
		return handle;
	}
}
