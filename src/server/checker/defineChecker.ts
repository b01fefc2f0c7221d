import type {
	CheckerConfig,
	CommandTemplate,
	ExtractFn,
	InputMode,
	OutputStream,
	PreflightFn,
} from "./types";

export type DefineCheckerOptions = {
	id: string;
	command: CommandTemplate;
	matcher: RegExp;
	extract: ExtractFn;
	inputMode?: InputMode;
	source?: string;
	preflight?: PreflightFn;
	languages?: readonly string[];
	outputStream?: OutputStream;
	tempFileSuffix?: string;
	encoding?: string;
};

/**
 * Build a frozen checker configuration.
 *
 * Defaults: pipe input, both output streams parsed, `.txt` temp suffix and
 * the checker id as diagnostic source.
 */
export function defineChecker(options: DefineCheckerOptions): CheckerConfig {
	const id = options.id.trim();
	if (!id) {
		throw new Error("checker id must not be empty");
	}
	if (typeof options.command !== "function" && options.command.length === 0) {
		throw new Error(`checker ${id}: command must not be empty`);
	}

	const config: CheckerConfig = {
		id,
		source: options.source ?? id,
		command:
			typeof options.command === "function"
				? options.command
				: Object.freeze([...options.command]),
		inputMode: options.inputMode ?? "pipe",
		matcher: options.matcher,
		extract: options.extract,
		languages: Object.freeze([...(options.languages ?? [])]),
		outputStream: options.outputStream ?? "both",
		tempFileSuffix: options.tempFileSuffix ?? ".txt",
		...(options.preflight ? { preflight: options.preflight } : {}),
		...(options.encoding ? { encoding: options.encoding } : {}),
	};
	return Object.freeze(config);
}

/**
 * Whether a checker applies to documents of the given language.
 */
export function appliesTo(checker: CheckerConfig, languageId: string): boolean {
	return checker.languages.length === 0 || checker.languages.includes(languageId);
}
