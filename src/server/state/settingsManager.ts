import type { Connection } from "vscode-languageserver/node";
import type { CheckSeverity, InputMode, OutputStream } from "../checker/types";
import { SETTINGS_SECTION } from "../config/constants";
import {
	type CheckerSettings,
	type SupervisorSettings,
	defaultSettings,
} from "../config/settings";
import type { Logger } from "../shared/logging";

type RawRecord = Record<string, unknown>;

const inputModes: readonly InputMode[] = ["pipe", "file"];
const outputStreams: readonly OutputStream[] = ["stdout", "stderr", "both"];
const severities: readonly CheckSeverity[] = [
	"error",
	"warning",
	"information",
	"hint",
];

/**
 * Manages settings retrieval and normalization.
 */
export class SettingsManager {
	private settings: SupervisorSettings = defaultSettings;

	constructor(
		private readonly connection: Pick<Connection, "workspace">,
		private readonly logger?: Pick<Logger, "warn">,
	) {}

	/**
	 * Get the current global settings.
	 */
	getSettings(): SupervisorSettings {
		return this.settings;
	}

	/**
	 * Refresh settings from the workspace configuration.
	 */
	async refreshSettings(): Promise<void> {
		const config: unknown = await this.connection.workspace.getConfiguration({
			section: SETTINGS_SECTION,
		});
		this.settings = normalizeSettings(config, defaultSettings, this.logger);
	}

	/**
	 * Get settings for a specific document, merging global and scoped settings.
	 */
	async getSettingsForDocument(uri: string): Promise<SupervisorSettings> {
		const scopedConfig: unknown =
			await this.connection.workspace.getConfiguration({
				scopeUri: uri,
				section: SETTINGS_SECTION,
			});
		return normalizeSettings(scopedConfig, this.settings, this.logger);
	}
}

/**
 * Overlay raw configuration on `base`, keeping base values for missing or
 * invalid entries.
 */
export function normalizeSettings(
	raw: unknown,
	base: SupervisorSettings = defaultSettings,
	logger?: Pick<Logger, "warn">,
): SupervisorSettings {
	const value: RawRecord = isRecord(raw) ? raw : {};
	const disabledCheckers = value["disabledCheckers"];
	const checkers = value["checkers"];
	return {
		runOnSave: readBoolean(value["runOnSave"], base.runOnSave),
		runOnType: readBoolean(value["runOnType"], base.runOnType),
		runOnOpen: readBoolean(value["runOnOpen"], base.runOnOpen),
		debounceMs: readNonNegative(value["debounceMs"], base.debounceMs),
		timeoutMs: readNonNegative(value["timeoutMs"], base.timeoutMs),
		maxFileSizeKb: readNonNegative(value["maxFileSizeKb"], base.maxFileSizeKb),
		disabledCheckers: Array.isArray(disabledCheckers)
			? disabledCheckers.filter(
					(item): item is string => typeof item === "string",
				)
			: base.disabledCheckers,
		checkers: Array.isArray(checkers)
			? parseCheckerSettings(checkers, logger)
			: base.checkers,
	};
}

/**
 * Validate declarative checker entries; invalid ones are logged and dropped.
 */
export function parseCheckerSettings(
	entries: readonly unknown[],
	logger?: Pick<Logger, "warn">,
): CheckerSettings[] {
	const parsed: CheckerSettings[] = [];
	entries.forEach((entry, index) => {
		const result = parseCheckerEntry(entry);
		if (typeof result === "string") {
			logger?.warn(`Ignoring checkers[${index}]: ${result}`);
			return;
		}
		parsed.push(result);
	});
	return parsed;
}

function parseCheckerEntry(entry: unknown): CheckerSettings | string {
	if (!isRecord(entry)) {
		return "not an object";
	}
	const id = entry["id"];
	const command = entry["command"];
	const pattern = entry["pattern"];
	if (typeof id !== "string" || !id.trim()) {
		return "id must be a non-empty string";
	}
	if (!isStringArray(command) || command.length === 0) {
		return `${id}: command must be a non-empty list of strings`;
	}
	if (typeof pattern !== "string" || !pattern) {
		return `${id}: pattern must be a non-empty string`;
	}

	const settings: CheckerSettings = { id: id.trim(), command, pattern };
	const inputMode = entry["inputMode"];
	if (isOneOf(inputMode, inputModes)) {
		settings.inputMode = inputMode;
	}
	const outputStream = entry["outputStream"];
	if (isOneOf(outputStream, outputStreams)) {
		settings.outputStream = outputStream;
	}
	const flags = entry["flags"];
	if (typeof flags === "string") {
		settings.flags = flags;
	}
	const languages = entry["languages"];
	if (isStringArray(languages)) {
		settings.languages = languages;
	}
	const defaultSeverity = entry["defaultSeverity"];
	if (defaultSeverity === null || isOneOf(defaultSeverity, severities)) {
		settings.defaultSeverity = defaultSeverity;
	}
	const severityMap = entry["severityMap"];
	if (isRecord(severityMap)) {
		const map: Record<string, CheckSeverity | null> = {};
		for (const [key, mapped] of Object.entries(severityMap)) {
			if (mapped === null || isOneOf(mapped, severities)) {
				map[key] = mapped;
			}
		}
		settings.severityMap = map;
	}
	const tempFileSuffix = entry["tempFileSuffix"];
	if (typeof tempFileSuffix === "string") {
		settings.tempFileSuffix = tempFileSuffix;
	}
	const encoding = entry["encoding"];
	if (typeof encoding === "string" && encoding.trim()) {
		settings.encoding = encoding.trim();
	}
	return settings;
}

function isRecord(value: unknown): value is RawRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
	return (
		Array.isArray(value) && value.every((item) => typeof item === "string")
	);
}

function isOneOf<T extends string>(
	value: unknown,
	allowed: readonly T[],
): value is T {
	return allowed.some((item) => item === value);
}

function readBoolean(value: unknown, fallback: boolean): boolean {
	return typeof value === "boolean" ? value : fallback;
}

function readNonNegative(value: unknown, fallback: number): number {
	return typeof value === "number" && Number.isFinite(value) && value >= 0
		? value
		: fallback;
}
