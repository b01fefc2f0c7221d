import type { Logger } from "./logging";
import { describeError, firstLine } from "./textUtils";

/**
 * Run an event handler, logging instead of rejecting when it fails.
 * Used for document events, whose promises nobody awaits.
 */
export async function runHandlerSafely(
	logger: Pick<Logger, "error">,
	action: string,
	handler: () => Promise<void>,
): Promise<void> {
	try {
		await handler();
	} catch (error) {
		logger.error(
			`lint-supervisor: failed to react to ${action} (${firstLine(describeError(error))})`,
		);
	}
}
