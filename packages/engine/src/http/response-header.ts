export type ResponseHeader =
  | { readonly kind: "Allow"; readonly value: string }
  | { readonly kind: "Server"; readonly value: string }
  | { readonly kind: "AcceptRanges"; readonly value: string }
  | { readonly kind: "ContentType"; readonly value: string }
  | { readonly kind: "ContentLength"; readonly value: number }
  | { readonly kind: "Date"; readonly value: string };

export type ResponseHeaderKind = ResponseHeader["kind"];

const HEADER_NAMES: Readonly<Record<ResponseHeaderKind, string>> = {
  Allow: "Allow",
  Server: "Server",
  AcceptRanges: "Accept-Ranges",
  ContentType: "Content-Type",
  ContentLength: "Content-Length",
  Date: "Date",
};

/**
 * Throws a `TypeError` unless the header can be written as a single line:
 * text values without CR or LF, `Content-Length` as a non-negative integer.
 * Applies to literals as well as factory-built headers.
 */
export function validateResponseHeader(header: ResponseHeader): ResponseHeader {
  if (header.kind === "ContentLength") {
    if (!Number.isSafeInteger(header.value) || header.value < 0) {
      throw new TypeError(`Content-Length must be a non-negative integer`);
    }
  } else if (/[\r\n]/.test(header.value)) {
    throw new TypeError(
      `${HEADER_NAMES[header.kind]} value must not contain CR or LF`,
    );
  }
  return header;
}

/** Constructors for the supported response headers. */
export const ResponseHeader = {
  allow: (value: string): ResponseHeader =>
    validateResponseHeader({ kind: "Allow", value }),
  server: (value: string): ResponseHeader =>
    validateResponseHeader({ kind: "Server", value }),
  acceptRanges: (value: string): ResponseHeader =>
    validateResponseHeader({ kind: "AcceptRanges", value }),
  contentType: (value: string): ResponseHeader =>
    validateResponseHeader({ kind: "ContentType", value }),
  contentLength: (value: number): ResponseHeader =>
    validateResponseHeader({ kind: "ContentLength", value }),
  date: (value: string): ResponseHeader =>
    validateResponseHeader({ kind: "Date", value }),
};

/** `"Name: value"`, without the trailing CRLF. */
export function formatResponseHeader(header: ResponseHeader): string {
  validateResponseHeader(header);
  return `${HEADER_NAMES[header.kind]}: ${header.value}`;
}
