import type { ProcessHandle } from "../shared/types";
import type { TempInput } from "./tempFiles";

export type JobState = "running" | "exited";

let nextJobId = 1;

/**
 * One run of a checker against a document snapshot.
 */
export class Job {
	readonly id: number;
	private currentState: JobState = "running";
	private terminationRequested = false;

	constructor(
		readonly uri: string,
		readonly checkerId: string,
		readonly handle: ProcessHandle,
		readonly tempInput: TempInput | null,
	) {
		this.id = nextJobId++;
	}

	get state(): JobState {
		return this.currentState;
	}

	get isRunning(): boolean {
		return this.currentState === "running" && !this.handle.exited;
	}

	get wasTerminated(): boolean {
		return this.terminationRequested;
	}

	/**
	 * Ask the process to stop. Returns false when it had already exited.
	 */
	terminate(): boolean {
		if (!this.isRunning) {
			return false;
		}
		this.terminationRequested = true;
		this.handle.terminate();
		return true;
	}

	markExited(): void {
		this.currentState = "exited";
	}
}
