import { findExecutable } from "../shared/processRunner";
import type { PreflightFn } from "./types";

/**
 * Pre-flight check that fails when `command` does not resolve to an
 * executable file.
 */
export function requireExecutable(command: string): PreflightFn {
	return async () => {
		const resolved = await findExecutable(command);
		if (!resolved) {
			return { ok: false, reason: `${command} not found` };
		}
		return { ok: true };
	};
}
