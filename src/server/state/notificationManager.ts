import type { Connection } from "vscode-languageserver/node";
import { CHECKER_DISABLED_NOTICE_COOLDOWN_MS } from "../config/constants";
import type { JobNotifier } from "../shared/logging";
import { describeError, firstLine } from "../shared/textUtils";

/**
 * Logging through the client console plus user notifications with cooldown.
 */
export class NotificationManager implements JobNotifier {
	private readonly lastDisabledNoticeAtMs = new Map<string, number>();

	constructor(
		private readonly connection: Pick<Connection, "window" | "console">,
	) {}

	/**
	 * Tell the user a checker was skipped, at most once per cooldown per checker.
	 */
	async maybeNotifyCheckerDisabled(
		checkerId: string,
		reason: string,
	): Promise<void> {
		const message = `${checkerId}: disabled (${firstLine(reason)})`;
		this.warn(message);
		const now = Date.now();
		const lastNoticeAt = this.lastDisabledNoticeAtMs.get(checkerId);
		if (
			lastNoticeAt !== undefined &&
			now - lastNoticeAt < CHECKER_DISABLED_NOTICE_COOLDOWN_MS
		) {
			return;
		}
		this.lastDisabledNoticeAtMs.set(checkerId, now);
		await this.connection.window.showWarningMessage(message);
	}

	/**
	 * Notify about a checker that failed to run.
	 */
	notifyRunFailure(checkerId: string, error: unknown): void {
		const message = `${checkerId}: failed to run (${firstLine(describeError(error))})`;
		// Don't await - warning message may block in some environments
		void this.connection.window.showWarningMessage(message);
		this.connection.console.warn(message);
	}

	/**
	 * Surface stderr output of a checker whose diagnostics come from stdout.
	 */
	notifyStderr(checkerId: string, stderr: string): void {
		const trimmed = stderr.trim();
		if (!trimmed) {
			return;
		}
		void this.connection.window.showWarningMessage(
			`${checkerId}: ${firstLine(trimmed)}`,
		);
		this.connection.console.warn(`[${checkerId}] ${trimmed}`);
	}

	log(message: string): void {
		this.connection.console.log(message);
	}

	warn(message: string): void {
		this.connection.console.warn(message);
	}

	error(message: string): void {
		this.connection.console.error(message);
	}
}
