import { bug, defineTemplate, formatReportError, init } from "@bugline/node";

const initialized = init("my-org", "my-service")
  .addTemplate(
    "crash",
    defineTemplate(
      "Crash: {error_type}",
      "The application crashed with {error_type} at line {line}.",
      ["bug", "crash"],
    ),
  )
  .addTemplate(
    "slow_query",
    defineTemplate("Slow query on {table}", "A query on `{table}` took {duration_ms}ms."),
  )
  .build();

if (!initialized.ok) {
  console.error(formatReportError(initialized.error));
  process.exit(1);
}

function loadUser(id: number): string | undefined {
  if (id < 0) {
    bug("crash", { error_type: "NegativeId", line: 24 });
    return undefined;
  }
  return `user-${id}`;
}

loadUser(-1);

const url = bug("slow_query", { table: "users", duration_ms: 1500 });
console.log(`Issue URL: ${url}`);

// Reported as a diagnostic; the returned URL is empty.
bug("not_registered");
