import { err, ok } from "./errors.js";
import type { Result } from "./errors.js";
import type { Placeholders } from "./placeholders.js";
import type { IssueTemplate, TemplateFile } from "./types.js";

export function defineTemplate<T extends string, B extends string>(
  title: T,
  body: B,
  labels: readonly string[] = [],
): IssueTemplate<Placeholders<T> | Placeholders<B>> {
  return Object.freeze({ title, body, labels: Object.freeze([...labels]) });
}

export function withLabels<P extends string>(
  template: IssueTemplate<P>,
  labels: readonly string[],
): IssueTemplate<P> {
  return Object.freeze({ ...template, labels: Object.freeze([...labels]) });
}

export function createTemplateFile(content: string, labels: readonly string[] = []): TemplateFile {
  return Object.freeze({ content, labels: Object.freeze([...labels]) });
}

/** The first line, trimmed, is the title; everything after it, trimmed, is the body. */
export function parseTemplateFile(file: TemplateFile, name: string): Result<IssueTemplate> {
  if (file.content.length === 0) {
    return err({ kind: "InvalidTemplateFile", name, reason: "Template file is empty" });
  }

  const [titleLine = "", ...rest] = file.content.split(/\r?\n/);
  const title = titleLine.trim();
  if (title === "") {
    return err({ kind: "InvalidTemplateFile", name, reason: "Template must have a title on the first line" });
  }

  return ok(Object.freeze({
    title,
    body: rest.join("\n").trim(),
    labels: Object.freeze([...file.labels]),
  }));
}
