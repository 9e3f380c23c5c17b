import type { ReportSink } from "@bugline/core";

export function createStreamSink(stream: NodeJS.WritableStream): ReportSink {
  return {
    write(text) {
      stream.write(text);
    },
  };
}

/** Looks up `process.stderr` on every write so redirected streams are honoured. */
export const stderrSink: ReportSink = {
  write(text) {
    process.stderr.write(text);
  },
};
