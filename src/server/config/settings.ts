import type { CheckSeverity, InputMode, OutputStream } from "../checker/types";

/**
 * Declarative checker definition as it arrives from the client configuration.
 */
export type CheckerSettings = {
	id: string;
	command: string[];
	inputMode?: InputMode;
	pattern: string;
	flags?: string;
	languages?: string[];
	severityMap?: Record<string, CheckSeverity | null>;
	defaultSeverity?: CheckSeverity | null;
	outputStream?: OutputStream;
	tempFileSuffix?: string;
	encoding?: string;
};

export type SupervisorSettings = {
	runOnSave: boolean;
	runOnType: boolean;
	runOnOpen: boolean;
	debounceMs: number;
	/** Per-job timeout; 0 disables it. */
	timeoutMs: number;
	maxFileSizeKb: number;
	disabledCheckers: string[];
	checkers: CheckerSettings[];
};

export const defaultSettings: SupervisorSettings = {
	runOnSave: true,
	runOnType: true,
	runOnOpen: true,
	debounceMs: 500,
	timeoutMs: 10000,
	maxFileSizeKb: 0,
	disabledCheckers: [],
	checkers: [],
};
