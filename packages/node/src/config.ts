import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { parse } from "dotenv";
import { HYPERLINK_MODES } from "@bugline/core";
import type { HyperlinkMode } from "@bugline/core";

export const ENV_KEYS = {
  owner: "BUGLINE_GITHUB_OWNER",
  repo: "BUGLINE_GITHUB_REPO",
  hyperlinks: "BUGLINE_HYPERLINKS",
} as const;

export interface ReportEnvConfig {
  owner: string;
  repo: string;
  hyperlinkMode: HyperlinkMode;
}

export interface LoadConfigOptions {
  /** `.env` file to read; relative to the working directory. Defaults to `.env`. */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

function readDotenv(path: string): Record<string, string> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && (err as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`Could not read ${path}, ignoring it: ${reason}`);
    return {};
  }
  return parse(raw);
}

function isHyperlinkMode(value: string): value is HyperlinkMode {
  return HYPERLINK_MODES.some((mode) => mode === value);
}

export function parseHyperlinkMode(raw: string | undefined): HyperlinkMode {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (normalized === "") return "auto";
  if (isHyperlinkMode(normalized)) return normalized;

  console.warn(`Unrecognized ${ENV_KEYS.hyperlinks} value "${raw}", falling back to "auto"`);
  return "auto";
}

/**
 * Reads the repository and hyperlink settings. Variables already set in
 * `env` take precedence over the `.env` file, which is never written back.
 */
export function loadReportConfig(options: LoadConfigOptions = {}): ReportEnvConfig {
  const env = options.env ?? process.env;
  const fileValues = readDotenv(resolve(options.path ?? ".env"));
  const read = (key: string): string | undefined => env[key] ?? fileValues[key];

  return {
    owner: (read(ENV_KEYS.owner) ?? "").trim(),
    repo: (read(ENV_KEYS.repo) ?? "").trim(),
    hyperlinkMode: parseHyperlinkMode(read(ENV_KEYS.hyperlinks)),
  };
}
