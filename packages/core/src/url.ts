export const GITHUB_BASE_URL = "https://github.com";

export interface IssueUrlInput {
  owner: string;
  repo: string;
  title: string;
  body: string;
  labels?: readonly string[];
}

const encoder = new TextEncoder();

function isUnreserved(byte: number): boolean {
  return (
    (byte >= 0x41 && byte <= 0x5a) || // A-Z
    (byte >= 0x61 && byte <= 0x7a) || // a-z
    (byte >= 0x30 && byte <= 0x39) || // 0-9
    byte === 0x2d || // -
    byte === 0x2e || // .
    byte === 0x5f || // _
    byte === 0x7e // ~
  );
}

/**
 * Percent-encodes the UTF-8 bytes of `value`, leaving only RFC 3986
 * unreserved characters as-is. Space becomes `%20`.
 */
export function encodeQueryComponent(value: string): string {
  let encoded = "";
  for (const byte of encoder.encode(value)) {
    encoded += isUnreserved(byte)
      ? String.fromCharCode(byte)
      : `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return encoded;
}

/**
 * Labels are joined with `,` and encoded as a single value; an empty list
 * omits the parameter.
 */
export function buildIssueUrl({ owner, repo, title, body, labels = [] }: IssueUrlInput): string {
  const query = [
    `title=${encodeQueryComponent(title)}`,
    `body=${encodeQueryComponent(body)}`,
  ];
  if (labels.length > 0) {
    query.push(`labels=${encodeQueryComponent(labels.join(","))}`);
  }
  return `${GITHUB_BASE_URL}/${owner}/${repo}/issues/new?${query.join("&")}`;
}
