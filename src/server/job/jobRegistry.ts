import type { Job } from "./job";

/**
 * Current job per checker for one document.
 *
 * Every access happens on the event loop, so a launch that reads, terminates
 * and replaces an entry without awaiting in between is atomic with respect to
 * completion handlers.
 */
export class JobRegistry {
	private readonly jobs = new Map<string, Job>();
	private readonly generations = new Map<string, number>();

	/**
	 * Install `job` as current and return the job it replaced.
	 */
	set(checkerId: string, job: Job): Job | undefined {
		const previous = this.jobs.get(checkerId);
		this.jobs.set(checkerId, job);
		return previous;
	}

	get(checkerId: string): Job | undefined {
		return this.jobs.get(checkerId);
	}

	isCurrent(checkerId: string, job: Job): boolean {
		return this.jobs.get(checkerId) === job;
	}

	/**
	 * Remove the entry only if `job` is still the current one.
	 */
	clearIfCurrent(checkerId: string, job: Job): boolean {
		if (!this.isCurrent(checkerId, job)) {
			return false;
		}
		this.jobs.delete(checkerId);
		return true;
	}

	delete(checkerId: string): void {
		this.jobs.delete(checkerId);
	}

	/**
	 * Start a launch attempt for a checker. A later call supersedes it.
	 */
	nextGeneration(checkerId: string): number {
		const generation = (this.generations.get(checkerId) ?? 0) + 1;
		this.generations.set(checkerId, generation);
		return generation;
	}

	isLatestGeneration(checkerId: string, generation: number): boolean {
		return this.generations.get(checkerId) === generation;
	}

	/**
	 * Terminate the current job of a checker and forget it.
	 */
	cancel(checkerId: string): void {
		const job = this.jobs.get(checkerId);
		if (job) {
			job.terminate();
			this.jobs.delete(checkerId);
		}
		this.nextGeneration(checkerId);
	}

	/**
	 * Terminate every job; pending launches become superseded.
	 */
	cancelAll(): void {
		const checkerIds = new Set([...this.jobs.keys(), ...this.generations.keys()]);
		for (const checkerId of checkerIds) {
			this.cancel(checkerId);
		}
	}

	get size(): number {
		return this.jobs.size;
	}

	checkerIds(): string[] {
		return [...this.jobs.keys()];
	}
}
