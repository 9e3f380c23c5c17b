export type {
  IssueTemplate,
  TemplateFile,
  RenderedIssue,
  HyperlinkMode,
  ParameterValue,
  ReportParameters,
  ParametersFor,
  ParametersOf,
  TemplateMap,
  EmptyTemplateMap,
  WithTemplate,
  CallSite,
  BugReport,
  ReportSink,
} from "./types.js";
export { HYPERLINK_MODES } from "./types.js";

export type {
  ReportError,
  ReportErrorKind,
  DuplicateTemplateNameError,
  EmptyOwnerOrRepoError,
  AlreadyInitializedError,
  NotInitializedError,
  UnknownTemplateError,
  MissingParameterError,
  InvalidTemplateFileError,
  TemplateFileUnreadableError,
  Ok,
  Err,
  Result,
} from "./errors.js";
export { ok, err, formatReportError } from "./errors.js";

export type { Placeholders } from "./placeholders.js";
export { extractPlaceholders, findMissingParameters, substitute, toParameterMap } from "./placeholders.js";

export { defineTemplate, withLabels, createTemplateFile, parseTemplateFile } from "./template.js";

export type { TemplateRegistry } from "./registry.js";
export { createTemplateRegistry } from "./registry.js";

export type { IssueUrlInput } from "./url.js";
export { GITHUB_BASE_URL, encodeQueryComponent, buildIssueUrl } from "./url.js";

export { createTerminalHyperlink, shouldUseHyperlinks, present } from "./hyperlink.js";

export type { DiagnosticInput, MemorySink } from "./diagnostic.js";
export {
  REPORT_ACTION_TEXT,
  formatDiagnostic,
  formatDiagnosticFailure,
  createMemorySink,
  nullSink,
} from "./diagnostic.js";

export type { ReportConfig, GenerateOptions, ReportOptions, ReportHandle, ReportBuilder } from "./handle.js";
export { createReportHandle, createReportBuilder } from "./handle.js";
