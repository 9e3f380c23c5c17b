import { formatReportError } from "./errors.js";
import type { ReportError } from "./errors.js";
import { present } from "./hyperlink.js";
import type { CallSite, HyperlinkMode, ReportSink } from "./types.js";

export const REPORT_ACTION_TEXT = "File a bug report";

const MARKER = "🐛 BUG ENCOUNTERED in";
const INDENT = "   ";
const ENTRY_INDENT = "     ";

export interface DiagnosticInput {
  site: CallSite;
  templateName: string;
  parameters: ReadonlyMap<string, string>;
  url: string;
  hyperlinkMode: HyperlinkMode;
  supportsHyperlinks?: boolean | undefined;
}

function markerLine(site: CallSite): string {
  return `${MARKER} ${site.file}:${site.line}\n`;
}

export function formatDiagnostic(input: DiagnosticInput): string {
  let text = markerLine(input.site);
  text += `${INDENT}Template: ${input.templateName}\n`;
  if (input.parameters.size > 0) {
    text += `${INDENT}Parameters:\n`;
    for (const [key, value] of input.parameters) {
      text += `${ENTRY_INDENT}${key}: ${value}\n`;
    }
  }
  const action = present(input.hyperlinkMode, input.url, REPORT_ACTION_TEXT, input.supportsHyperlinks);
  text += `${INDENT}${action}\n`;
  return text + "\n";
}

export function formatDiagnosticFailure(site: CallSite, error: ReportError): string {
  return `${markerLine(site)}${INDENT}Error generating bug report: ${formatReportError(error)}\n\n`;
}

export interface MemorySink extends ReportSink {
  text: () => string;
  clear: () => void;
}

export function createMemorySink(): MemorySink {
  const chunks: string[] = [];

  return {
    write(text) {
      chunks.push(text);
    },

    text() {
      return chunks.join("");
    },

    clear() {
      chunks.length = 0;
    },
  };
}

/** Discards everything; the default where no error stream exists. */
export const nullSink: ReportSink = {
  write: () => {},
};
