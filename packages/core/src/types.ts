declare const placeholderNames: unique symbol;

/**
 * Title and body patterns with `{name}` placeholders, plus the labels the
 * issue is opened with. `P` is the union of placeholder names when the
 * patterns are string literals, and `string` otherwise.
 */
export interface IssueTemplate<P extends string = string> {
  readonly title: string;
  readonly body: string;
  readonly labels: readonly string[];
  readonly [placeholderNames]?: P;
}

/** Raw template file text: the first line is the title. */
export interface TemplateFile {
  readonly content: string;
  readonly labels: readonly string[];
}

export interface RenderedIssue {
  title: string;
  body: string;
  labels: string[];
}

export type HyperlinkMode = "auto" | "always" | "never";

export const HYPERLINK_MODES: readonly HyperlinkMode[] = ["auto", "always", "never"];

export type ParameterValue = string | number | boolean | bigint;

/**
 * Values are listed in iteration order. Plain objects list integer-like
 * keys such as `"1"` first in ascending order, so use a `Map` when
 * numeric placeholder names must keep the caller's order.
 */
export type ReportParameters =
  | ReadonlyMap<string, ParameterValue>
  | Readonly<Record<string, ParameterValue>>;

type RequiredParameters<P> = [P] extends [never]
  ? unknown
  : [string] extends [P]
    ? unknown
    : { readonly [K in Extract<P, string>]: ParameterValue };

/** Parameters that must name every placeholder in `P` when `P` is known. */
export type ParametersFor<P> = ReportParameters & RequiredParameters<P>;

/**
 * Template name → placeholder names, carried by typed builders and
 * handles. Names are wrapped in a tuple so templates without placeholders
 * stay distinguishable from unknown names.
 */
export type TemplateMap = Readonly<Record<string, readonly [string]>>;

export type EmptyTemplateMap = Record<never, never>;

export type WithTemplate<M, N extends string, P extends string> = string extends N
  ? M
  : M & { readonly [K in N]: readonly [P] };

type PlaceholdersOf<E> = E extends readonly [infer P] ? P : string;

export type ParametersOf<M, N extends string> = ReportParameters &
  (N extends keyof M ? RequiredParameters<PlaceholdersOf<M[N]>> : unknown);

export interface CallSite {
  file: string;
  line: number;
}

export interface BugReport {
  url: string;
  diagnostic: string;
}

export interface ReportSink {
  write: (text: string) => void;
}
