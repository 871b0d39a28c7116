import { HttpRequestParseError } from "./errors.js";
import type { RequestToken } from "./types.js";

const CRLF = "\r\n";
const VERSION_PREFIX = "HTTP/";

/**
 * Split a complete request head into structural tokens: the three request
 * line tokens, a name/value pair per header line in source order, and a
 * closing `EndOfText`.
 */
export function tokenizeRequest(text: string): RequestToken[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new HttpRequestParseError("EMPTY_REQUEST", "Empty request");
  }

  const [requestLine, ...headerLines] = trimmed.split(CRLF);
  const tokens: RequestToken[] = tokenizeRequestLine(requestLine);

  for (const line of headerLines) {
    if (line.length === 0) continue;
    tokens.push(...tokenizeHeaderLine(line));
  }

  tokens.push({ type: "EndOfText" });
  return tokens;
}

export function tokenizeRequestLine(line: string): RequestToken[] {
  const parts = line.split(" ");
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: ${JSON.stringify(line)}`,
    );
  }

  const [method, url, rawVersion] = parts;
  const version = rawVersion.startsWith(VERSION_PREFIX)
    ? rawVersion.slice(VERSION_PREFIX.length)
    : "";
  if (version.length === 0) {
    throw new HttpRequestParseError(
      "MALFORMED_VERSION",
      `Malformed protocol version: ${JSON.stringify(rawVersion)}`,
    );
  }

  return [
    { type: "Method", text: method },
    { type: "Url", text: url },
    { type: "Version", text: version },
  ];
}

export function tokenizeHeaderLine(line: string): RequestToken[] {
  const colonIdx = line.indexOf(":");
  if (colonIdx === -1) {
    throw new HttpRequestParseError(
      "MALFORMED_HEADER_LINE",
      `Header line without colon: ${JSON.stringify(line)}`,
    );
  }

  return [
    { type: "HeaderName", text: line.substring(0, colonIdx).trim() },
    { type: "HeaderValue", text: line.substring(colonIdx + 1).trim() },
  ];
}
