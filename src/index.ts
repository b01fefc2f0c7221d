export { evaluateCommand } from "./server/checker/commandTemplate";
export { appliesTo, defineChecker } from "./server/checker/defineChecker";
export type { DefineCheckerOptions } from "./server/checker/defineChecker";
export { requireExecutable } from "./server/checker/preflight";
export {
	checkerFromSettings,
	createGroupExtractor,
} from "./server/checker/settingsChecker";
export type * from "./server/checker/types";
export type { CheckerSettings, SupervisorSettings } from "./server/config/settings";
export type { JobOutcome } from "./server/job/completion";
export { Job } from "./server/job/job";
export { launchJob } from "./server/job/jobLauncher";
export type { JobDeps, LaunchResult } from "./server/job/jobLauncher";
export { JobRegistry } from "./server/job/jobRegistry";
export { createTempFileService } from "./server/job/tempFiles";
export type { TempFileService, TempInput } from "./server/job/tempFiles";
export {
	CheckerHost,
	executeCheck,
	registerChecker,
} from "./server/lint/checkOperations";
export { DiagnosticsPublisher } from "./server/lint/diagnosticsPublisher";
export type { DiagnosticsSink } from "./server/lint/diagnosticsPublisher";
export { parseOutput } from "./server/lint/parseOutput";
export {
	createDocumentSnapshot,
	lineRange,
	positionOffset,
} from "./server/shared/documentSnapshot";
export type { DocumentSnapshot } from "./server/shared/documentSnapshot";
export { NodeProcessService } from "./server/shared/processRunner";
export type * from "./server/shared/types";
export { startServer } from "./server/server";
export type { ServerOptions } from "./server/server";
