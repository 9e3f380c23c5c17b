import { createReportBuilder, err, formatDiagnosticFailure } from "@bugline/core";
import type {
  BugReport,
  CallSite,
  EmptyTemplateMap,
  GenerateOptions,
  HyperlinkMode,
  IssueTemplate,
  ParametersOf,
  RenderedIssue,
  ReportBuilder,
  ReportConfig,
  ReportHandle,
  ReportOptions,
  ReportParameters,
  ReportSink,
  Result,
  TemplateFile,
  WithTemplate,
} from "@bugline/core";

import { captureCallSite } from "./call-site.js";
import { loadReportConfig } from "./config.js";
import type { LoadConfigOptions } from "./config.js";
import { supportsHyperlinks } from "./environment.js";
import { stderrSink } from "./sink.js";

/**
 * The installed handle seen without its template map: any name and any
 * parameters are accepted and checked at run time.
 */
export interface AmbientHandle {
  readonly config: ReportConfig;
  templateNames(): string[];
  render(name: string, parameters: ReportParameters): Result<RenderedIssue>;
  generateUrl(name: string, parameters: ReportParameters): Result<string>;
  generate(name: string, parameters: ReportParameters, site: CallSite, options?: GenerateOptions): Result<BugReport>;
  report(name: string, parameters: ReportParameters, site: CallSite, options?: ReportOptions): Result<string>;
}

// Written once by a successful build(); never replaced or cleared.
let ambient: AmbientHandle | undefined;

export interface AmbientBuilder<M = EmptyTemplateMap> {
  addTemplate: <N extends string, P extends string>(
    name: N,
    template: IssueTemplate<P>,
  ) => AmbientBuilder<WithTemplate<M, N, P>>;
  addTemplateFile: <N extends string>(name: N, file: TemplateFile) => AmbientBuilder<WithTemplate<M, N, string>>;
  hyperlinks: (mode: HyperlinkMode) => AmbientBuilder<M>;
  /** Installs the handle process-wide. Only the first successful call wins. */
  build: () => Result<ReportHandle<M>>;
}

function wrapBuilder<M>(builder: ReportBuilder<M>): AmbientBuilder<M> {
  return {
    addTemplate<N extends string, P extends string>(name: N, template: IssueTemplate<P>) {
      return wrapBuilder(builder.addTemplate(name, template));
    },

    addTemplateFile<N extends string>(name: N, file: TemplateFile) {
      return wrapBuilder(builder.addTemplateFile(name, file));
    },

    hyperlinks(mode: HyperlinkMode) {
      return wrapBuilder(builder.hyperlinks(mode));
    },

    build() {
      const built = builder.build();
      if (!built.ok) return built;
      if (ambient) {
        return err({ kind: "AlreadyInitialized" });
      }

      ambient = built.value;
      return built;
    },
  };
}

export function init(owner: string, repo: string): AmbientBuilder {
  return wrapBuilder(createReportBuilder(owner, repo));
}

/** Like {@link init}, with owner, repository and hyperlink mode read by {@link loadReportConfig}. */
export function initFromEnv(options: LoadConfigOptions = {}): AmbientBuilder {
  const config = loadReportConfig(options);
  return init(config.owner, config.repo).hyperlinks(config.hyperlinkMode);
}

export function getAmbientHandle(): AmbientHandle | undefined {
  return ambient;
}

export function isInitialized(): boolean {
  return ambient !== undefined;
}

export interface BugOptions {
  sink?: ReportSink;
  supportsHyperlinks?: boolean;
}

function reportOptions(options: BugOptions): { sink: ReportSink; supportsHyperlinks: boolean } {
  return {
    sink: options.sink ?? stderrSink,
    supportsHyperlinks: options.supportsHyperlinks ?? supportsHyperlinks(process.env, process.stderr),
  };
}

/**
 * Reports a bug through the ambient configuration and returns the issue
 * URL, or `""` when bug reporting is not initialized or the report cannot
 * be generated. Never throws.
 */
export function bug(
  name: string,
  parameters: ReportParameters = {},
  site: CallSite = captureCallSite(1),
  options: BugOptions = {},
): string {
  const { sink, supportsHyperlinks: supported } = reportOptions(options);
  if (!ambient) {
    sink.write(formatDiagnosticFailure(site, { kind: "NotInitialized" }));
    return "";
  }

  const result = ambient.report(name, parameters, site, { sink, supportsHyperlinks: supported });
  return result.ok ? result.value : "";
}

/** Reports a bug through an explicit handle; failures come back as the result. */
export function bugWithHandle<M, N extends string>(
  handle: ReportHandle<M>,
  name: N,
  parameters: ParametersOf<M, N>,
  site: CallSite = captureCallSite(1),
  options: BugOptions = {},
): Result<string> {
  return handle.report(name, parameters, site, reportOptions(options));
}
