import type { CheckerSettings } from "../config/settings";
import {
	type DocumentSnapshot,
	lineRange,
	positionOffset,
} from "../shared/documentSnapshot";
import type { Logger } from "../shared/logging";
import { describeError } from "../shared/textUtils";
import { defineChecker } from "./defineChecker";
import { requireExecutable } from "./preflight";
import type {
	CheckSeverity,
	CheckerConfig,
	DiagnosticCandidate,
	ExtractFn,
} from "./types";

const severityNames: Record<string, CheckSeverity> = {
	error: "error",
	fatal: "error",
	warning: "warning",
	warn: "warning",
	info: "information",
	information: "information",
	note: "information",
	hint: "hint",
};

/**
 * Build a checker from a declarative settings entry.
 *
 * The pattern uses named groups: `line` and `message` are required;
 * `column`, `endLine`, `endColumn`, `severity` and `code` are optional.
 */
export function checkerFromSettings(settings: CheckerSettings): CheckerConfig {
	const flags = settings.flags ?? "gm";
	const matcher = new RegExp(settings.pattern, flags);
	const [executable] = settings.command;
	if (!executable) {
		throw new Error(`checker ${settings.id}: command must not be empty`);
	}

	return defineChecker({
		id: settings.id,
		command: settings.command,
		matcher,
		extract: createGroupExtractor(settings),
		preflight: executable.includes("${")
			? undefined
			: requireExecutable(executable),
		...(settings.inputMode ? { inputMode: settings.inputMode } : {}),
		...(settings.languages ? { languages: settings.languages } : {}),
		...(settings.outputStream ? { outputStream: settings.outputStream } : {}),
		...(settings.tempFileSuffix
			? { tempFileSuffix: settings.tempFileSuffix }
			: {}),
		...(settings.encoding ? { encoding: settings.encoding } : {}),
	});
}

/**
 * Build every valid configured checker; invalid entries are logged and skipped.
 */
export function checkersFromSettings(
	entries: readonly CheckerSettings[],
	logger: Pick<Logger, "warn">,
): CheckerConfig[] {
	const checkers: CheckerConfig[] = [];
	for (const entry of entries) {
		try {
			checkers.push(checkerFromSettings(entry));
		} catch (error) {
			logger.warn(
				`Ignoring checker ${entry.id}: ${describeError(error)}`,
			);
		}
	}
	return checkers;
}

export function createGroupExtractor(
	settings: Pick<CheckerSettings, "severityMap" | "defaultSeverity">,
): ExtractFn {
	const defaultSeverity =
		settings.defaultSeverity === undefined ? "error" : settings.defaultSeverity;

	return (match, snapshot): DiagnosticCandidate | null => {
		const groups = match.groups ?? {};
		const line = toNumber(groups["line"]);
		const message = groups["message"]?.trim();
		if (line === null || !message) {
			return null;
		}

		const code = groups["code"]?.trim() || undefined;
		const { start, end } = resolveOffsets(snapshot, line, groups);
		return {
			start,
			end,
			severity: resolveSeverity(groups["severity"], settings, defaultSeverity),
			message: code ? `${message} (${code})` : message,
			...(code ? { code } : {}),
		};
	};
}

function resolveOffsets(
	snapshot: DocumentSnapshot,
	line: number,
	groups: Record<string, string | undefined>,
): { start: number; end: number } {
	const column = toNumber(groups["column"]);
	if (column === null) {
		return lineRange(snapshot, line);
	}
	const start = positionOffset(snapshot, line, column);
	const endLine = toNumber(groups["endLine"]);
	const endColumn = toNumber(groups["endColumn"]);
	if (endColumn !== null) {
		return { start, end: positionOffset(snapshot, endLine ?? line, endColumn) };
	}
	return { start, end: lineRange(snapshot, line).end };
}

function resolveSeverity(
	raw: string | undefined,
	settings: Pick<CheckerSettings, "severityMap">,
	defaultSeverity: CheckSeverity | null,
): CheckSeverity | null {
	if (raw === undefined) {
		return defaultSeverity;
	}
	const severityMap = settings.severityMap ?? {};
	if (Object.hasOwn(severityMap, raw)) {
		return severityMap[raw] ?? null;
	}
	const lowered = raw.toLowerCase();
	if (Object.hasOwn(severityMap, lowered)) {
		return severityMap[lowered] ?? null;
	}
	if (Object.hasOwn(severityNames, lowered)) {
		return severityNames[lowered] ?? defaultSeverity;
	}
	return defaultSeverity;
}

function toNumber(value: string | undefined): number | null {
	if (value === undefined || value.trim() === "") {
		return null;
	}
	const parsed = Number(value);
	return Number.isFinite(parsed) ? parsed : null;
}
