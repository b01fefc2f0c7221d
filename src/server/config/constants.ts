/**
 * Centralized constants for the server.
 */

/** Cache TTL for executable lookups (30 seconds) */
export const COMMAND_CACHE_TTL_MS = 30000;

/** Maximum concurrent document checks */
export const MAX_CONCURRENT_RUNS = 4;

/** Cooldown between "checker disabled" notifications for one checker (5 minutes) */
export const CHECKER_DISABLED_NOTICE_COOLDOWN_MS = 5 * 60 * 1000;

/** Maximum combined stdout+stderr buffer size (10 MB) */
export const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

/** Prefix for temp directories created for file-mode checkers */
export const TEMP_DIR_PREFIX = "lint-supervisor-";

/** Base name used when a document has no file path */
export const UNTITLED_BASENAME = "untitled";

/** Configuration section read from the client */
export const SETTINGS_SECTION = "lintSupervisor";

/** Custom LSP methods */
export const CHECK_DOCUMENT_REQUEST = "lintSupervisor/checkDocument";
export const CLEAR_DIAGNOSTICS_NOTIFICATION = "lintSupervisor/clearDiagnostics";
