export interface DuplicateTemplateNameError {
  kind: "DuplicateTemplateName";
  name: string;
}

export interface EmptyOwnerOrRepoError {
  kind: "EmptyOwnerOrRepo";
  owner: string;
  repo: string;
}

export interface AlreadyInitializedError {
  kind: "AlreadyInitialized";
}

export interface NotInitializedError {
  kind: "NotInitialized";
}

export interface UnknownTemplateError {
  kind: "UnknownTemplate";
  name: string;
}

export interface MissingParameterError {
  kind: "MissingParameter";
  /** First placeholder without a value, in pattern order. */
  name: string;
  template: string;
  missing: readonly string[];
}

export interface InvalidTemplateFileError {
  kind: "InvalidTemplateFile";
  name: string;
  reason: string;
}

export interface TemplateFileUnreadableError {
  kind: "TemplateFileUnreadable";
  path: string;
  reason: string;
}

export type ReportError =
  | DuplicateTemplateNameError
  | EmptyOwnerOrRepoError
  | AlreadyInitializedError
  | NotInitializedError
  | UnknownTemplateError
  | MissingParameterError
  | InvalidTemplateFileError
  | TemplateFileUnreadableError;

export type ReportErrorKind = ReportError["kind"];

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

export type Result<T, E = ReportError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err(error: ReportError): Err<ReportError> {
  return { ok: false, error };
}

export function formatReportError(error: ReportError): string {
  switch (error.kind) {
    case "DuplicateTemplateName":
      return `Template '${error.name}' is already registered`;
    case "EmptyOwnerOrRepo":
      return `GitHub owner and repository must not be empty (owner: '${error.owner}', repo: '${error.repo}')`;
    case "AlreadyInitialized":
      return "Bug reporting already initialized";
    case "NotInitialized":
      return "Bug reporting not initialized. Call init() first.";
    case "UnknownTemplate":
      return `Template '${error.name}' not found`;
    case "MissingParameter":
      return error.missing.length > 1
        ? `Missing required parameters for template '${error.template}': ${error.missing.join(", ")}`
        : `Missing required parameter for template '${error.template}': ${error.name}`;
    case "InvalidTemplateFile":
      return `Invalid template file '${error.name}': ${error.reason}`;
    case "TemplateFileUnreadable":
      return `Cannot read template file ${error.path}: ${error.reason}`;
  }
}
