import { fileURLToPath } from "node:url";

import type { CallSite } from "@bugline/core";

const FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

export const UNKNOWN_CALL_SITE: Readonly<CallSite> = Object.freeze({ file: "<unknown>", line: 0 });

/** Parses one V8 stack frame line such as `    at fn (/src/app.ts:10:5)`. */
export function parseStackFrame(frame: string): CallSite | undefined {
  const match = frame.match(FRAME_PATTERN);
  if (!match) return undefined;

  const location = match[1] ?? "";
  const file = location.startsWith("file://") ? fileURLToPath(location) : location;
  return { file, line: parseInt(match[2] ?? "0", 10) };
}

/**
 * `captureCallSite()` names the line that calls it; `captureCallSite(1)`
 * names the line that called the enclosing function, and so on.
 */
export function captureCallSite(depth = 0): CallSite {
  const frames = (new Error().stack ?? "").split("\n").filter((line) => /^\s*at /.test(line));
  const frame = frames[depth + 1];
  const site = frame === undefined ? undefined : parseStackFrame(frame);
  return site ?? { ...UNKNOWN_CALL_SITE };
}
