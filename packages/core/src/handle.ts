import { formatDiagnostic, formatDiagnosticFailure, nullSink } from "./diagnostic.js";
import { err, ok } from "./errors.js";
import type { ReportError, Result } from "./errors.js";
import { substitute, toParameterMap } from "./placeholders.js";
import { createTemplateRegistry } from "./registry.js";
import type { TemplateRegistry } from "./registry.js";
import { parseTemplateFile } from "./template.js";
import type {
  BugReport,
  CallSite,
  EmptyTemplateMap,
  HyperlinkMode,
  IssueTemplate,
  ReportParameters,
  ParametersOf,
  RenderedIssue,
  ReportSink,
  TemplateFile,
  TemplateMap,
  WithTemplate,
} from "./types.js";
import { buildIssueUrl } from "./url.js";

export interface ReportConfig {
  readonly owner: string;
  readonly repo: string;
  readonly registry: TemplateRegistry;
  readonly hyperlinkMode: HyperlinkMode;
}

export interface GenerateOptions {
  /** Environment hyperlink support, consulted in `auto` mode. */
  supportsHyperlinks?: boolean | undefined;
}

export interface ReportOptions extends GenerateOptions {
  sink?: ReportSink | undefined;
}

/**
 * Explicitly owned bundle of repository, templates and hyperlink mode.
 * Holds no shared state; any number of handles can coexist.
 */
export interface ReportHandle<M = TemplateMap> {
  readonly config: ReportConfig;
  templateNames: () => string[];
  render: <N extends string>(name: N, parameters: ParametersOf<M, N>) => Result<RenderedIssue>;
  generateUrl: <N extends string>(name: N, parameters: ParametersOf<M, N>) => Result<string>;
  generate: <N extends string>(
    name: N,
    parameters: ParametersOf<M, N>,
    site: CallSite,
    options?: GenerateOptions,
  ) => Result<BugReport>;
  /** Writes the diagnostic (or the failure) to `options.sink` and returns the URL. */
  report: <N extends string>(
    name: N,
    parameters: ParametersOf<M, N>,
    site: CallSite,
    options?: ReportOptions,
  ) => Result<string>;
}

export function createReportHandle<M = TemplateMap>(config: ReportConfig): Result<ReportHandle<M>> {
  if (config.owner.trim() === "" || config.repo.trim() === "") {
    return err({ kind: "EmptyOwnerOrRepo", owner: config.owner, repo: config.repo });
  }

  const frozen: ReportConfig = Object.freeze({ ...config });

  function render(name: string, parameters: ReportParameters): Result<RenderedIssue> {
    const template = frozen.registry.get(name);
    if (!template) {
      return err({ kind: "UnknownTemplate", name });
    }
    return substitute(template, parameters, name);
  }

  function generateUrl(name: string, parameters: ReportParameters): Result<string> {
    const rendered = render(name, parameters);
    if (!rendered.ok) return rendered;
    return ok(buildIssueUrl({ owner: frozen.owner, repo: frozen.repo, ...rendered.value }));
  }

  function generate(
    name: string,
    parameters: ReportParameters,
    site: CallSite,
    options: GenerateOptions = {},
  ): Result<BugReport> {
    const url = generateUrl(name, parameters);
    if (!url.ok) return url;

    const diagnostic = formatDiagnostic({
      site,
      templateName: name,
      parameters: toParameterMap(parameters),
      url: url.value,
      hyperlinkMode: frozen.hyperlinkMode,
      supportsHyperlinks: options.supportsHyperlinks,
    });
    return ok({ url: url.value, diagnostic });
  }

  function report(
    name: string,
    parameters: ReportParameters,
    site: CallSite,
    options: ReportOptions = {},
  ): Result<string> {
    const sink = options.sink ?? nullSink;
    const generated = generate(name, parameters, site, options);
    if (!generated.ok) {
      sink.write(formatDiagnosticFailure(site, generated.error));
      return generated;
    }
    sink.write(generated.value.diagnostic);
    return ok(generated.value.url);
  }

  const handle: ReportHandle<M> = {
    config: frozen,
    templateNames: () => frozen.registry.names(),
    render,
    generateUrl,
    generate,
    report,
  };
  return ok(Object.freeze(handle));
}

interface BuilderState {
  owner: string;
  repo: string;
  registry: TemplateRegistry;
  hyperlinkMode: HyperlinkMode;
  errors: readonly ReportError[];
}

/**
 * Immutable builder: every call returns a new builder. Registration
 * problems are recorded as they happen and the first one is returned by
 * `build()`.
 */
export interface ReportBuilder<M = EmptyTemplateMap> {
  addTemplate: <N extends string, P extends string>(
    name: N,
    template: IssueTemplate<P>,
  ) => ReportBuilder<WithTemplate<M, N, P>>;
  addTemplateFile: <N extends string>(name: N, file: TemplateFile) => ReportBuilder<WithTemplate<M, N, string>>;
  hyperlinks: (mode: HyperlinkMode) => ReportBuilder<M>;
  build: () => Result<ReportHandle<M>>;
}

function register(state: BuilderState, name: string, template: Result<IssueTemplate>): BuilderState {
  if (!template.ok) {
    return { ...state, errors: [...state.errors, template.error] };
  }
  const registry = state.registry.register(name, template.value);
  if (!registry.ok) {
    return { ...state, errors: [...state.errors, registry.error] };
  }
  return { ...state, registry: registry.value };
}

function makeBuilder<M>(state: BuilderState): ReportBuilder<M> {
  return {
    addTemplate<N extends string, P extends string>(name: N, template: IssueTemplate<P>) {
      return makeBuilder<WithTemplate<M, N, P>>(register(state, name, ok(template)));
    },

    addTemplateFile<N extends string>(name: N, file: TemplateFile) {
      return makeBuilder<WithTemplate<M, N, string>>(register(state, name, parseTemplateFile(file, name)));
    },

    hyperlinks(mode: HyperlinkMode) {
      return makeBuilder<M>({ ...state, hyperlinkMode: mode });
    },

    build() {
      const [first] = state.errors;
      if (first !== undefined) {
        return err(first);
      }
      return createReportHandle<M>({
        owner: state.owner,
        repo: state.repo,
        registry: state.registry,
        hyperlinkMode: state.hyperlinkMode,
      });
    },
  };
}

export function createReportBuilder(owner: string, repo: string): ReportBuilder {
  return makeBuilder<EmptyTemplateMap>({
    owner,
    repo,
    registry: createTemplateRegistry(),
    hyperlinkMode: "auto",
    errors: [],
  });
}
