import { bug, formatReportError, init, loadTemplateFile } from "@bugline/node";

const file = loadTemplateFile(new URL("./templates/crash_report.md", import.meta.url), {
  labels: ["bug", "crash"],
});
if (!file.ok) {
  console.error(formatReportError(file.error));
  process.exit(1);
}

const initialized = init("my-org", "my-app").addTemplateFile("crash_report", file.value).build();
if (!initialized.ok) {
  console.error(formatReportError(initialized.error));
  process.exit(1);
}

const url = bug("crash_report", {
  module: "auth",
  error_type: "TokenExpired",
  version: "1.4.2",
  os: process.platform,
});
console.log(url);
