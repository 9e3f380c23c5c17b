import { describe, expect, test } from "vitest";

import { createMemorySink } from "./diagnostic.js";
import type { Result } from "./errors.js";
import { createReportBuilder, createReportHandle } from "./handle.js";
import { createTemplateRegistry } from "./registry.js";
import { createTemplateFile, defineTemplate } from "./template.js";
import type { IssueTemplate } from "./types.js";

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`BAIL: unexpected ${result.error.kind}`);
  }
  return result.value;
}

const site = { file: "src/main.ts", line: 12 };
const crash = defineTemplate("Crash: {err}", "Err: {err}");
const CRASH_URL = "https://github.com/u/r/issues/new?title=Crash%3A%20NPE&body=Err%3A%20NPE";

describe("createReportBuilder", () => {
  test("builds a handle for the repository", () => {
    const handle = unwrap(createReportBuilder("u", "r").addTemplate("crash", crash).build());

    expect(handle.config.owner).toBe("u");
    expect(handle.config.repo).toBe("r");
    expect(handle.config.hyperlinkMode).toBe("auto");
    expect(handle.templateNames()).toEqual(["crash"]);
  });

  test("rejects an empty owner", () => {
    expect(createReportBuilder("", "r").build()).toEqual({
      ok: false,
      error: { kind: "EmptyOwnerOrRepo", owner: "", repo: "r" },
    });
  });

  test("rejects a blank repository", () => {
    expect(createReportBuilder("u", "  ").build()).toEqual({
      ok: false,
      error: { kind: "EmptyOwnerOrRepo", owner: "u", repo: "  " },
    });
  });

  test("rejects a duplicate template name", () => {
    const result = createReportBuilder("u", "r")
      .addTemplate("crash", crash)
      .addTemplate("crash", defineTemplate("Other", "Other"))
      .build();

    expect(result).toEqual({ ok: false, error: { kind: "DuplicateTemplateName", name: "crash" } });
  });

  test("rejects a template file name that is already taken", () => {
    const result = createReportBuilder("u", "r")
      .addTemplate("crash", crash)
      .addTemplateFile("crash", createTemplateFile("Title\nBody"))
      .build();

    expect(result).toEqual({ ok: false, error: { kind: "DuplicateTemplateName", name: "crash" } });
  });

  test("rejects an invalid template file", () => {
    const result = createReportBuilder("u", "r").addTemplateFile("empty", createTemplateFile("")).build();

    expect(result).toEqual({
      ok: false,
      error: { kind: "InvalidTemplateFile", name: "empty", reason: "Template file is empty" },
    });
  });

  test("rejects a template file whose first line is blank", () => {
    const result = createReportBuilder("u", "r")
      .addTemplateFile("crash", createTemplateFile("\n\nCrash: {e}\nBody {e}"))
      .build();

    expect(result).toEqual({
      ok: false,
      error: { kind: "InvalidTemplateFile", name: "crash", reason: "Template must have a title on the first line" },
    });
  });

  test("reports the first recorded problem", () => {
    const result = createReportBuilder("", "r")
      .addTemplateFile("empty", createTemplateFile(""))
      .addTemplate("crash", crash)
      .addTemplate("crash", crash)
      .build();

    expect(result.ok ? undefined : result.error.kind).toBe("InvalidTemplateFile");
  });

  test("each step returns a new builder", () => {
    const base = createReportBuilder("u", "r");
    const withCrash = base.addTemplate("crash", crash);

    expect(unwrap(base.build()).templateNames()).toEqual([]);
    expect(unwrap(withCrash.build()).templateNames()).toEqual(["crash"]);
  });

  test("sets the hyperlink mode", () => {
    const handle = unwrap(createReportBuilder("u", "r").hyperlinks("never").build());
    expect(handle.config.hyperlinkMode).toBe("never");
  });
});

describe("ReportHandle", () => {
  const handle = unwrap(
    createReportBuilder("u", "r")
      .addTemplate("crash", crash)
      .addTemplate("labelled", defineTemplate("Slow {op}", "Took {ms}ms", ["bug", "perf"]))
      .addTemplateFile("file", createTemplateFile("From file: {what}\n\nDetails: {what}"))
      .hyperlinks("never")
      .build(),
  );

  test("generateUrl fills the template and encodes it", () => {
    expect(handle.generateUrl("crash", { err: "NPE" })).toEqual({ ok: true, value: CRASH_URL });
  });

  test("generateUrl adds labels", () => {
    expect(handle.generateUrl("labelled", { op: "query", ms: 1500 })).toEqual({
      ok: true,
      value: "https://github.com/u/r/issues/new?title=Slow%20query&body=Took%201500ms&labels=bug%2Cperf",
    });
  });

  test("generateUrl works with templates loaded from files", () => {
    expect(handle.generateUrl("file", { what: "x" })).toEqual({
      ok: true,
      value: "https://github.com/u/r/issues/new?title=From%20file%3A%20x&body=Details%3A%20x",
    });
  });

  test("render returns the substituted issue", () => {
    expect(handle.render("labelled", { op: "io", ms: 3 })).toEqual({
      ok: true,
      value: { title: "Slow io", body: "Took 3ms", labels: ["bug", "perf"] },
    });
  });

  test("unknown template names fail", () => {
    expect(handle.generateUrl("nope", {})).toEqual({
      ok: false,
      error: { kind: "UnknownTemplate", name: "nope" },
    });
  });

  test("missing parameters fail before a URL is built", () => {
    const loose = unwrap(createReportHandle(handle.config));

    expect(loose.generateUrl("crash", {})).toEqual({
      ok: false,
      error: { kind: "MissingParameter", name: "err", template: "crash", missing: ["err"] },
    });
  });

  test("generate returns the plain URL and the diagnostic", () => {
    const report = unwrap(handle.generate("crash", { err: "NPE" }, site));

    expect(report.url).toBe(CRASH_URL);
    expect(report.diagnostic).toBe(
      "🐛 BUG ENCOUNTERED in src/main.ts:12\n" +
        "   Template: crash\n" +
        "   Parameters:\n" +
        "     err: NPE\n" +
        `   File a bug report: ${CRASH_URL}\n` +
        "\n",
    );
  });

  test("generate keeps the URL plain when the diagnostic is hyperlinked", () => {
    const linked = unwrap(createReportBuilder("u", "r").addTemplate("crash", crash).hyperlinks("always").build());
    const report = unwrap(linked.generate("crash", { err: "NPE" }, site));

    expect(report.url).toBe(CRASH_URL);
    expect(report.diagnostic).toContain(`   \x1b]8;;${CRASH_URL}\x1b\\File a bug report\x1b]8;;\x1b\\\n`);
  });

  test("generate follows the environment signal in auto mode", () => {
    const auto = unwrap(createReportBuilder("u", "r").addTemplate("crash", crash).build());

    const supported = unwrap(auto.generate("crash", { err: "NPE" }, site, { supportsHyperlinks: true }));
    const unsupported = unwrap(auto.generate("crash", { err: "NPE" }, site, { supportsHyperlinks: false }));

    expect(supported.diagnostic).toContain("\x1b]8;;");
    expect(unsupported.diagnostic).toContain(`   File a bug report: ${CRASH_URL}\n`);
  });

  test("report writes the diagnostic to the sink", () => {
    const sink = createMemorySink();

    const url = handle.report("crash", { err: "NPE" }, site, { sink });

    expect(url).toEqual({ ok: true, value: CRASH_URL });
    expect(sink.text()).toBe(unwrap(handle.generate("crash", { err: "NPE" }, site)).diagnostic);
  });

  test("report writes the failure to the sink and returns the error", () => {
    const sink = createMemorySink();

    const result = handle.report("nope", {}, site, { sink });

    expect(result).toEqual({ ok: false, error: { kind: "UnknownTemplate", name: "nope" } });
    expect(sink.text()).toBe(
      "🐛 BUG ENCOUNTERED in src/main.ts:12\n" +
        "   Error generating bug report: Template 'nope' not found\n" +
        "\n",
    );
  });

  test("report without a sink still returns the URL", () => {
    expect(handle.report("crash", { err: "NPE" }, site)).toEqual({ ok: true, value: CRASH_URL });
  });

  test("handles are frozen", () => {
    expect(Object.isFrozen(handle)).toBe(true);
    expect(Object.isFrozen(handle.config)).toBe(true);
  });
});

describe("createReportHandle", () => {
  test("independent handles do not share templates", () => {
    const loose: IssueTemplate = crash;
    const registry = unwrap(createTemplateRegistry().register("crash", loose));
    const a = unwrap(createReportHandle({ owner: "a", repo: "one", registry, hyperlinkMode: "never" }));
    const b = unwrap(createReportHandle({ owner: "b", repo: "two", registry: createTemplateRegistry(), hyperlinkMode: "never" }));

    expect(a.generateUrl("crash", { err: "NPE" }).ok).toBe(true);
    expect(b.generateUrl("crash", { err: "NPE" })).toEqual({
      ok: false,
      error: { kind: "UnknownTemplate", name: "crash" },
    });
  });
});
