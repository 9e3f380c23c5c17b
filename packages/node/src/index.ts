export * from "@bugline/core";
export { createReportBuilder as initHandle } from "@bugline/core";

export type { AmbientBuilder, AmbientHandle, BugOptions } from "./ambient.js";
export { init, initFromEnv, getAmbientHandle, isInitialized, bug, bugWithHandle } from "./ambient.js";

export { UNKNOWN_CALL_SITE, parseStackFrame, captureCallSite } from "./call-site.js";

export type { ReportEnvConfig, LoadConfigOptions } from "./config.js";
export { ENV_KEYS, parseHyperlinkMode, loadReportConfig } from "./config.js";

export type { TerminalStream } from "./environment.js";
export { supportsHyperlinks } from "./environment.js";

export { createStreamSink, stderrSink } from "./sink.js";

export type { LoadTemplateFileOptions } from "./template-file.js";
export { loadTemplateFile } from "./template-file.js";
