import * as chardet from "chardet";
import * as iconv from "iconv-lite";

/**
 * Decodes process output into a string.
 *
 * An explicit encoding from the checker wins. Otherwise UTF-8 is tried first;
 * if it produces too many replacement characters the encoding is detected
 * with chardet, and the locale default is the last fallback.
 */
export function decodeOutput(buffer: Buffer, encoding?: string): string {
	if (buffer.length === 0) {
		return "";
	}

	if (encoding) {
		const normalized = normalizeEncoding(encoding);
		if (iconv.encodingExists(normalized)) {
			return iconv.decode(buffer, normalized);
		}
	}

	const utf8Result = buffer.toString("utf8");
	const replacementCount = (utf8Result.match(/\uFFFD/g) ?? []).length;

	// Up to 1% replacement characters is treated as corrupted data, not a wrong encoding
	if (replacementCount === 0 || replacementCount / utf8Result.length < 0.01) {
		return utf8Result;
	}

	const detected = chardet.detect(buffer);
	if (detected) {
		const detectedEncoding = normalizeEncoding(detected);
		if (iconv.encodingExists(detectedEncoding)) {
			return iconv.decode(buffer, detectedEncoding);
		}
	}

	const fallbackEncoding = getFallbackEncoding();
	if (iconv.encodingExists(fallbackEncoding)) {
		return iconv.decode(buffer, fallbackEncoding);
	}
	return utf8Result;
}

/**
 * Maps encoding names from chardet and settings to iconv-lite names.
 */
export function normalizeEncoding(name: string): string {
	const normalized = name.trim().toLowerCase();

	const encodingMap: Record<string, string> = {
		"shift-jis": "shift_jis",
		sjis: "shift_jis",
		"windows-31j": "shift_jis",
		"windows-932": "cp932",
		"utf-8": "utf8",
		"iso-8859-1": "latin1",
		cp1252: "windows-1252",
	};

	return encodingMap[normalized] ?? normalized;
}

function getFallbackEncoding(): string {
	if (process.platform !== "win32") {
		return "utf8";
	}

	const env = process.env as NodeJS.ProcessEnv & {
		LANG?: string;
		LC_ALL?: string;
	};
	const locale = (env.LANG || env.LC_ALL || "").toLowerCase();

	if (locale.includes("ja") || locale.includes("jp")) {
		return "cp932";
	}
	return "windows-1252";
}
