export type HttpRequestParseErrorCode =
  | "EMPTY_REQUEST"
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_VERSION"
  | "MALFORMED_HEADER_LINE"
  | "DANGLING_HEADER_NAME";

/** Malformed client input. Answer with a 4xx, never crash on it. */
export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
    readonly headerName?: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

/**
 * The tokenizer and assembler disagree about the token stream. This is a
 * defect in the engine, not bad input, and must not be reported as a 4xx.
 */
export class InternalConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalConsistencyError";
  }
}
