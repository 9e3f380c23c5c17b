import { err, ok } from "./errors.js";
import type { Result } from "./errors.js";
import type { IssueTemplate, ParameterValue, ReportParameters, ParametersFor, RenderedIssue } from "./types.js";

const PLACEHOLDER_PATTERN = /\{([\p{L}\p{N}_]+)\}/gu;

type NonIdentifierChar =
  | " " | "\t" | "\n" | "\r" | "-" | "." | "," | ":" | ";" | "\"" | "'" | "`"
  | "/" | "\\" | "(" | ")" | "[" | "]" | "<" | ">" | "=" | "+" | "*" | "!"
  | "?" | "#" | "@" | "$" | "%" | "&" | "|" | "~" | "^";

type PlaceholderName<Body extends string> = Body extends ""
  ? never
  : Body extends `${string}${NonIdentifierChar}${string}`
    ? never
    : Body;

type CollectPlaceholders<S extends string, Acc extends string> =
  S extends `${string}{${infer Body}}${infer Rest}`
    ? Body extends `${string}{${infer Inner}`
      ? CollectPlaceholders<`{${Inner}}${Rest}`, Acc>
      : CollectPlaceholders<Rest, Acc | PlaceholderName<Body>>
    : Acc;

/** Placeholder names of a literal pattern, e.g. `Placeholders<"{a} {b}">` is `"a" | "b"`. */
export type Placeholders<S extends string> = CollectPlaceholders<S, never>;

/** Distinct placeholder names in order of first appearance. */
export function extractPlaceholders(pattern: string): string[] {
  const names: string[] = [];
  for (const match of pattern.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

function isParameterMap(parameters: ReportParameters): parameters is ReadonlyMap<string, ParameterValue> {
  return parameters instanceof Map;
}

/** Normalizes either parameter shape to string values, keeping insertion order. */
export function toParameterMap(parameters?: ReportParameters): Map<string, string> {
  const values = new Map<string, string>();
  if (!parameters) return values;

  const entries = isParameterMap(parameters) ? parameters.entries() : Object.entries(parameters);
  for (const [key, value] of entries) {
    values.set(key, String(value));
  }
  return values;
}

function fill(pattern: string, values: ReadonlyMap<string, string>): string {
  return pattern.replace(PLACEHOLDER_PATTERN, (match: string, name: string) => values.get(name) ?? match);
}

export function findMissingParameters(
  template: IssueTemplate,
  values: ReadonlyMap<string, string>,
): string[] {
  const required = extractPlaceholders(template.title);
  for (const name of extractPlaceholders(template.body)) {
    if (!required.includes(name)) required.push(name);
  }
  return required.filter((name) => !values.has(name));
}

export function substitute<P extends string>(
  template: IssueTemplate<P>,
  parameters: ParametersFor<P>,
  templateName: string,
): Result<RenderedIssue> {
  const values = toParameterMap(parameters);
  const missing = findMissingParameters(template, values);
  const [first] = missing;
  if (first !== undefined) {
    return err({ kind: "MissingParameter", name: first, template: templateName, missing });
  }

  return ok({
    title: fill(template.title, values),
    body: fill(template.body, values),
    labels: [...template.labels],
  });
}
