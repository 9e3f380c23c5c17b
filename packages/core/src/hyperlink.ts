import type { HyperlinkMode } from "./types.js";

const OSC_8 = "\x1b]8;;";
const STRING_TERMINATOR = "\x1b\\";

/** OSC 8 hyperlink: `ESC ] 8 ; ; url ESC \ text ESC ] 8 ; ; ESC \`. */
export function createTerminalHyperlink(url: string, text: string): string {
  return `${OSC_8}${url}${STRING_TERMINATOR}${text}${OSC_8}${STRING_TERMINATOR}`;
}

/** `auto` only links when the environment positively reports support. */
export function shouldUseHyperlinks(mode: HyperlinkMode, supported?: boolean): boolean {
  switch (mode) {
    case "always":
      return true;
    case "never":
      return false;
    case "auto":
      return supported === true;
  }
}

export function present(
  mode: HyperlinkMode,
  url: string,
  displayText: string,
  supported?: boolean,
): string {
  return shouldUseHyperlinks(mode, supported)
    ? createTerminalHyperlink(url, displayText)
    : `${displayText}: ${url}`;
}
