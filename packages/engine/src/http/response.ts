import { concat, fromString } from "../utils/buffer.js";
import {
  formatResponseHeader,
  type ResponseHeader,
  validateResponseHeader,
} from "./response-header.js";
import { type Status, statusText } from "./status.js";

const CRLF = "\r\n";
const VERSION_PATTERN = /^\d+\.\d+$/;

export class HttpResponse {
  readonly version: string;
  readonly status: Status;
  readonly body: Uint8Array;
  private readonly headerList: ResponseHeader[] = [];

  constructor(version: string, status: Status, body?: Uint8Array | string) {
    if (!VERSION_PATTERN.test(version)) {
      throw new TypeError(`Invalid HTTP version: ${JSON.stringify(version)}`);
    }
    this.version = version;
    this.status = status;
    this.body =
      typeof body === "string" ? fromString(body) : (body ?? new Uint8Array(0));
  }

  /** Headers in emission order. Duplicates are kept and all rendered. */
  get headers(): readonly ResponseHeader[] {
    return this.headerList;
  }

  addHeader(header: ResponseHeader): this {
    this.headerList.push(validateResponseHeader(header));
    return this;
  }

  /**
   * Serialize to wire bytes: status line, header lines, blank line, body.
   * No header is added implicitly, `Content-Length` included.
   */
  render(): Uint8Array {
    let head = `HTTP/${this.version} ${statusText(this.status)}${CRLF}`;
    for (const header of this.headerList) {
      head += `${formatResponseHeader(header)}${CRLF}`;
    }
    head += CRLF;
    return concat([fromString(head), this.body]);
  }
}
