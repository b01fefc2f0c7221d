export type CheckReason = "save" | "change" | "manual" | "open";

export type PendingCheck = {
	reason: CheckReason;
	version: number | null;
};

type SchedulerOptions = {
	maxConcurrentRuns: number;
	getDocumentVersion: (uri: string) => number | null;
	/** Resolves with the number of reported diagnostics, or -1 on failure. */
	runCheck: (uri: string, pending: PendingCheck) => Promise<number>;
};

/**
 * Decides when documents are checked.
 *
 * Change-triggered requests are debounced per document and at most
 * `maxConcurrentRuns` checks run at once. Requests arriving while every slot
 * is taken are queued; a queued request whose document moved on meanwhile is
 * re-queued with the newer version. Manual requests wait for a slot ahead of
 * the queue and always check the latest version.
 */
export class CheckScheduler {
	private readonly options: SchedulerOptions;
	private readonly maxRuns: number;
	private running = 0;
	private readonly manualWaiters: Array<() => void> = [];
	private readonly pendingByUri = new Map<string, PendingCheck>();
	private readonly debounceTimerByUri = new Map<string, NodeJS.Timeout>();
	private readonly queuedUris: string[] = [];

	constructor(options: SchedulerOptions) {
		this.options = options;
		this.maxRuns = Math.max(1, options.maxConcurrentRuns);
	}

	clear(uri: string): void {
		this.clearDebounce(uri);
		this.pendingByUri.delete(uri);
		this.removeFromQueue(uri);
	}

	/**
	 * Drop every pending request. Waiting manual requests resolve with 0.
	 */
	dispose(): void {
		for (const timer of this.debounceTimerByUri.values()) {
			clearTimeout(timer);
		}
		this.debounceTimerByUri.clear();
		this.pendingByUri.clear();
		this.queuedUris.length = 0;
		for (const wake of this.manualWaiters.splice(0)) {
			this.running += 1;
			wake();
		}
	}

	requestCheck(
		uri: string,
		reason: CheckReason,
		version: number | null,
		debounceMs?: number,
	): Promise<number> {
		this.pendingByUri.set(uri, { reason, version });
		if (reason === "manual") {
			return this.runManual(uri);
		}
		this.clearDebounce(uri);
		if (reason !== "change") {
			this.startOrQueue(uri);
			return Promise.resolve(0);
		}
		const timer = setTimeout(
			() => {
				this.debounceTimerByUri.delete(uri);
				this.startOrQueue(uri);
			},
			Math.max(0, debounceMs ?? 0),
		);
		this.debounceTimerByUri.set(uri, timer);
		return Promise.resolve(0);
	}

	private clearDebounce(uri: string): void {
		const timer = this.debounceTimerByUri.get(uri);
		if (timer) {
			clearTimeout(timer);
			this.debounceTimerByUri.delete(uri);
		}
	}

	private startOrQueue(uri: string): void {
		if (this.takeSlot()) {
			void this.runInSlot(uri, false);
		} else {
			this.queueUri(uri);
		}
	}

	private async runManual(uri: string): Promise<number> {
		this.clearDebounce(uri);
		this.removeFromQueue(uri);
		if (!this.takeSlot()) {
			// freeSlot hands its slot to the waiter.
			await new Promise<void>((resolve) => {
				this.manualWaiters.push(resolve);
			});
		}
		return await this.runInSlot(uri, true);
	}

	private takeSlot(): boolean {
		if (this.running >= this.maxRuns) {
			return false;
		}
		this.running += 1;
		return true;
	}

	private freeSlot(): void {
		const wake = this.manualWaiters.shift();
		if (wake) {
			wake();
			return;
		}
		this.running -= 1;
		this.startQueued();
	}

	/**
	 * Start queued requests until the queue is empty or every slot is taken.
	 */
	private startQueued(): void {
		while (this.queuedUris.length > 0 && this.takeSlot()) {
			const uri = this.queuedUris.shift();
			if (uri === undefined || !this.pendingByUri.has(uri)) {
				this.running -= 1;
				continue;
			}
			void this.runInSlot(uri, false);
		}
	}

	/**
	 * Run the pending request of `uri` in a slot the caller already holds.
	 */
	private async runInSlot(uri: string, latestVersion: boolean): Promise<number> {
		try {
			const pending = this.pendingByUri.get(uri);
			if (!pending) {
				return 0;
			}
			this.pendingByUri.delete(uri);

			const currentVersion = this.options.getDocumentVersion(uri);
			if (currentVersion === null) {
				return 0;
			}
			if (pending.version !== null && pending.version !== currentVersion) {
				if (!latestVersion) {
					this.pendingByUri.set(uri, { ...pending, version: currentVersion });
					this.queueUri(uri);
					return 0;
				}
				pending.version = currentVersion;
			}

			return await this.options.runCheck(uri, pending);
		} finally {
			this.freeSlot();
		}
	}

	private queueUri(uri: string): void {
		if (!this.queuedUris.includes(uri)) {
			this.queuedUris.push(uri);
		}
	}

	private removeFromQueue(uri: string): void {
		const index = this.queuedUris.indexOf(uri);
		if (index >= 0) {
			this.queuedUris.splice(index, 1);
		}
	}
}
