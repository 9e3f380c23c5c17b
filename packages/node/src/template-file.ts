import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { createTemplateFile, err, ok } from "@bugline/core";
import type { Result, TemplateFile } from "@bugline/core";

export interface LoadTemplateFileOptions {
  labels?: readonly string[];
  /** Directory relative paths resolve against; defaults to the working directory. */
  baseDir?: string;
}

export function loadTemplateFile(path: string | URL, options: LoadTemplateFileOptions = {}): Result<TemplateFile> {
  const filePath = typeof path === "string"
    ? resolve(options.baseDir ?? process.cwd(), path)
    : fileURLToPath(path);

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    return err({ kind: "TemplateFileUnreadable", path: filePath, reason });
  }

  return ok(createTemplateFile(content, options.labels ?? []));
}
