import { join } from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { pathToFileURL } from "node:url";

import { test as base, expect } from "vitest";
import { parseTemplateFile } from "@bugline/core";

import { loadTemplateFile } from "./template-file.js";

interface TemplateFixtures {
  dir: string;
}

const test = base.extend<TemplateFixtures>({
  dir: async ({ }, use) => {
    const dir = await mkdtemp(join(tmpdir(), "bugline-template-test-"));
    await writeFile(join(dir, "crash.md"), "Crash in {module}\n\nError: {error}\n");
    await use(dir);
    await rm(dir, { recursive: true, force: true });
  },
});

test("loads a template file by path", ({ dir }) => {
  expect(loadTemplateFile(join(dir, "crash.md"), { labels: ["bug"] })).toEqual({
    ok: true,
    value: { content: "Crash in {module}\n\nError: {error}\n", labels: ["bug"] },
  });
});

test("resolves relative paths against baseDir", ({ dir }) => {
  const result = loadTemplateFile("crash.md", { baseDir: dir });

  expect(result.ok && result.value.labels).toEqual([]);
  expect(result.ok && result.value.content).toBe("Crash in {module}\n\nError: {error}\n");
});

test("loads a template file by URL", ({ dir }) => {
  const result = loadTemplateFile(pathToFileURL(join(dir, "crash.md")));

  expect(result.ok).toBe(true);
});

test("the loaded file parses into a template", ({ dir }) => {
  const loaded = loadTemplateFile(join(dir, "crash.md"));
  if (!loaded.ok) throw new Error("BAIL: template file must load");

  expect(parseTemplateFile(loaded.value, "crash")).toEqual({
    ok: true,
    value: { title: "Crash in {module}", body: "Error: {error}", labels: [] },
  });
});

test("a missing file is reported as unreadable", ({ dir }) => {
  const path = join(dir, "missing.md");
  const result = loadTemplateFile(path);

  expect(result.ok).toBe(false);
  if (result.ok) return;
  expect(result.error.kind).toBe("TemplateFileUnreadable");
  expect(result.error).toMatchObject({ path });
  expect(result.error).toHaveProperty("reason", expect.stringContaining("ENOENT"));
});
