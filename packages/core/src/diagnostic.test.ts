import { describe, expect, test } from "vitest";

import { createMemorySink, formatDiagnostic, formatDiagnosticFailure, nullSink } from "./diagnostic.js";

const site = { file: "src/app.ts", line: 45 };
const url = "https://github.com/u/r/issues/new?title=t&body=b";

describe("formatDiagnostic", () => {
  test("lists template, parameters and the report link", () => {
    const text = formatDiagnostic({
      site,
      templateName: "crash",
      parameters: new Map([["error_type", "NullPointerException"], ["line", "42"]]),
      url,
      hyperlinkMode: "never",
    });

    expect(text).toBe(
      "🐛 BUG ENCOUNTERED in src/app.ts:45\n" +
        "   Template: crash\n" +
        "   Parameters:\n" +
        "     error_type: NullPointerException\n" +
        "     line: 42\n" +
        `   File a bug report: ${url}\n` +
        "\n",
    );
  });

  test("omits the parameters block when none were supplied", () => {
    const text = formatDiagnostic({ site, templateName: "simple", parameters: new Map(), url, hyperlinkMode: "never" });

    expect(text).toBe(
      "🐛 BUG ENCOUNTERED in src/app.ts:45\n" +
        "   Template: simple\n" +
        `   File a bug report: ${url}\n` +
        "\n",
    );
  });

  test("uses a terminal hyperlink when the mode allows it", () => {
    const text = formatDiagnostic({
      site,
      templateName: "simple",
      parameters: new Map(),
      url,
      hyperlinkMode: "auto",
      supportsHyperlinks: true,
    });

    expect(text.split("\n")[2]).toBe(`   \x1b]8;;${url}\x1b\\File a bug report\x1b]8;;\x1b\\`);
  });
});

describe("formatDiagnosticFailure", () => {
  test("names the call site and the error", () => {
    const text = formatDiagnosticFailure(site, { kind: "UnknownTemplate", name: "missing" });

    expect(text).toBe(
      "🐛 BUG ENCOUNTERED in src/app.ts:45\n" +
        "   Error generating bug report: Template 'missing' not found\n" +
        "\n",
    );
  });
});

describe("sinks", () => {
  test("memory sink collects and clears text", () => {
    const sink = createMemorySink();
    sink.write("a");
    sink.write("b\n");

    expect(sink.text()).toBe("ab\n");

    sink.clear();
    expect(sink.text()).toBe("");
  });

  test("null sink accepts writes", () => {
    expect(() => nullSink.write("ignored")).not.toThrow();
  });
});
