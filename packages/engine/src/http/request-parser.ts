import type { Logger } from "../logging/logger.js";
import { HttpRequestParseError, InternalConsistencyError } from "./errors.js";
import {
  createHttpRequest,
  type HttpRequest,
  REQUEST_HEADER_FIELDS,
  type RequestHeaderField,
} from "./request.js";
import { tokenizeRequest } from "./tokenizer.js";
import type { RequestToken, RequestTokenType } from "./types.js";

export interface ParseRequestOptions {
  /** Receives a debug line for every header outside the allow-list. */
  logger?: Logger;
}

/**
 * Parse a complete request head (request line plus header lines, CRLF
 * separated) into an immutable request.
 *
 * Throws `HttpRequestParseError` for malformed input and
 * `InternalConsistencyError` if the token stream breaks its own contract.
 */
export function parseRequest(
  text: string,
  options?: ParseRequestOptions,
): HttpRequest {
  return assembleRequest(tokenizeRequest(text), options?.logger);
}

function requestLineText(
  tokens: readonly RequestToken[],
  index: number,
  type: Exclude<RequestTokenType, "EndOfText">,
): string {
  const token = tokens[index];
  if (token?.type === type && "text" in token) {
    return token.text;
  }
  throw new InternalConsistencyError(
    `Expected ${type} token at position ${index}, got ${token?.type ?? "end of stream"}`,
  );
}

/** Build a request from a token stream in emission order. */
export function assembleRequest(
  tokens: readonly RequestToken[],
  logger?: Logger,
): HttpRequest {
  const method = requestLineText(tokens, 0, "Method");
  const url = requestLineText(tokens, 1, "Url");
  const version = requestLineText(tokens, 2, "Version");
  const headers: Partial<Record<RequestHeaderField, string>> = {};

  let i = 3;
  while (i < tokens.length) {
    const token = tokens[i];
    switch (token.type) {
      case "HeaderName": {
        const next = tokens[i + 1];
        if (next?.type !== "HeaderValue") {
          throw new HttpRequestParseError(
            "DANGLING_HEADER_NAME",
            `Expected a value for header '${token.text}'`,
            token.text,
          );
        }
        const field = REQUEST_HEADER_FIELDS.get(token.text);
        if (field) {
          headers[field] = next.text;
        } else {
          logger?.debug(`Unexpected header name '${token.text}'`);
        }
        i += 2;
        break;
      }
      case "EndOfText":
        if (i !== tokens.length - 1) {
          throw new InternalConsistencyError(
            `${tokens.length - i - 1} token(s) after EndOfText`,
          );
        }
        return createHttpRequest({ method, url, version, ...headers });
      case "HeaderValue":
        throw new InternalConsistencyError(
          `HeaderValue token at position ${i} without a HeaderName`,
        );
      case "Method":
      case "Url":
      case "Version":
        throw new InternalConsistencyError(
          `${token.type} token at position ${i} after the request line`,
        );
    }
  }

  throw new InternalConsistencyError("Token stream ended without EndOfText");
}
