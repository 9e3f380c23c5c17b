import { HYPERLINK_MODES, REPORT_ACTION_TEXT, present, supportsHyperlinks } from "@bugline/node";

const url = "https://github.com/my-org/my-app/issues/new?title=Demo&body=Demo";
const supported = supportsHyperlinks(process.env, process.stdout);

console.log(`Hyperlinks supported here: ${supported}`);
for (const mode of HYPERLINK_MODES) {
  console.log(`${mode.padEnd(6)} ${present(mode, url, REPORT_ACTION_TEXT, supported)}`);
}
