/** HTTP version spoken in every response the server writes. */
export const HTTP_VERSION = "1.1";

/** Methods the server answers; also the value of the `Allow` header. */
export const ALLOWED_METHODS = "GET, POST, HEAD";

/**
 * Structural units of a request as produced by the tokenizer.
 * Only the tokenizer and assembler ever see these.
 */
export type RequestToken =
  | { type: "Method"; text: string }
  | { type: "Url"; text: string }
  | { type: "Version"; text: string }
  | { type: "HeaderName"; text: string }
  | { type: "HeaderValue"; text: string }
  | { type: "EndOfText" };

export type RequestTokenType = RequestToken["type"];
