import { bugWithHandle, captureCallSite, defineTemplate, formatReportError, initHandle, stderrSink } from "@bugline/node";

const built = initHandle("my-org", "billing")
  .addTemplate(
    "invoice_mismatch",
    defineTemplate("Invoice {invoice} total mismatch", "Expected {expected}, computed {actual}.", ["billing"]),
  )
  .hyperlinks("never")
  .build();

if (!built.ok) {
  console.error(formatReportError(built.error));
  process.exit(1);
}
const handle = built.value;

// The URL alone, without writing a diagnostic.
const url = handle.generateUrl("invoice_mismatch", { invoice: "INV-7", expected: 120, actual: 112 });
if (url.ok) {
  console.log(url.value);
}

// Diagnostic and URL, written wherever the caller chooses.
const report = handle.generate("invoice_mismatch", { invoice: "INV-8", expected: 10, actual: 9 }, captureCallSite());
if (report.ok) {
  process.stdout.write(report.value.diagnostic);
}

const reported = bugWithHandle(handle, "invoice_mismatch", { invoice: "INV-9", expected: 5, actual: 50 });
if (!reported.ok) {
  stderrSink.write(`${formatReportError(reported.error)}\n`);
}
