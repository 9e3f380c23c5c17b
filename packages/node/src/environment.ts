const HYPERLINK_TERM_PATTERNS = ["xterm", "screen", "tmux"];
const HYPERLINK_TERMINAL_PROGRAMS = ["iTerm.app", "WezTerm", "Alacritty", "Windows Terminal", "vscode"];

export interface TerminalStream {
  isTTY?: boolean;
}

/**
 * Best-effort detection of OSC 8 support from environment variables.
 * `FORCE_HYPERLINK` wins; otherwise a non-TTY stream never gets links.
 */
export function supportsHyperlinks(env: NodeJS.ProcessEnv = process.env, stream?: TerminalStream): boolean {
  const forced = env["FORCE_HYPERLINK"];
  if (forced !== undefined) {
    const normalized = forced.trim().toLowerCase();
    return normalized !== "0" && normalized !== "false";
  }

  if (stream && !stream.isTTY) return false;

  const term = env["TERM"] ?? "";
  if (HYPERLINK_TERM_PATTERNS.some((pattern) => term.includes(pattern))) return true;

  const program = env["TERM_PROGRAM"];
  if (program !== undefined && HYPERLINK_TERMINAL_PROGRAMS.includes(program)) return true;

  return env["VSCODE_INJECTION"] !== undefined || env["WT_SESSION"] !== undefined;
}
