import type { CheckDiagnostic, CheckerConfig } from "../checker/types";
import type { DocumentSnapshot } from "../shared/documentSnapshot";
import type { Logger } from "../shared/logging";

export type ParseOutputOptions = {
	output: string;
	checker: CheckerConfig;
	snapshot: DocumentSnapshot;
	logger?: Pick<Logger, "log">;
};

/**
 * Scan raw checker output for matches and turn each into a diagnostic.
 *
 * Matches are visited from the start of the output without overlapping and
 * the result keeps their order. Candidates without a severity are dropped.
 */
export function parseOutput(options: ParseOutputOptions): CheckDiagnostic[] {
	const { output, checker, snapshot } = options;
	const diagnostics: CheckDiagnostic[] = [];
	const matcher = globalCopy(checker.matcher);
	const textLength = snapshot.text.length;

	for (const match of output.matchAll(matcher)) {
		const candidate = checker.extract(match, snapshot);
		if (!candidate || candidate.severity == null) {
			options.logger?.log(
				`[${checker.id}] Ignoring match: ${JSON.stringify(match[0])}`,
			);
			continue;
		}

		const start = clamp(candidate.start, textLength);
		const end = clamp(candidate.end, textLength);
		diagnostics.push({
			document: snapshot,
			start: Math.min(start, end),
			end: Math.max(start, end),
			severity: candidate.severity,
			message: candidate.message,
			source: checker.source,
			...(candidate.code !== undefined ? { code: candidate.code } : {}),
		});
	}

	return diagnostics;
}

function globalCopy(matcher: RegExp): RegExp {
	const flags = matcher.flags.includes("g")
		? matcher.flags
		: `${matcher.flags}g`;
	return new RegExp(matcher.source, flags);
}

function clamp(offset: number, max: number): number {
	if (!Number.isFinite(offset)) {
		return 0;
	}
	return Math.min(Math.max(0, Math.floor(offset)), max);
}
