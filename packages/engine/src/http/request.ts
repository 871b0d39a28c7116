/**
 * A parsed HTTP request. Frozen at construction.
 *
 * `method`, `url` and `version` come from the request line and are never
 * empty. Each header field is `""` when the header was absent, otherwise
 * the trimmed value of its last occurrence.
 */
export interface HttpRequest {
  readonly method: string;
  readonly url: string;
  /** Protocol version without the `HTTP/` prefix, e.g. `"1.1"`. */
  readonly version: string;
  readonly host: string;
  readonly userAgent: string;
  readonly accept: string;
  readonly upgradeInsecureRequests: string;
  readonly acceptLanguage: string;
  readonly acceptEncoding: string;
  readonly cookie: string;
  readonly connection: string;
  readonly referer: string;
  readonly cacheControl: string;
}

export type RequestLineField = "method" | "url" | "version";
export type RequestHeaderField = Exclude<keyof HttpRequest, RequestLineField>;

/** The header allow-list: wire name (case-sensitive) to request field. */
export const REQUEST_HEADER_FIELDS: ReadonlyMap<string, RequestHeaderField> =
  new Map<string, RequestHeaderField>([
    ["Host", "host"],
    ["User-Agent", "userAgent"],
    ["Accept", "accept"],
    ["Accept-Language", "acceptLanguage"],
    ["Accept-Encoding", "acceptEncoding"],
    ["Cookie", "cookie"],
    ["Connection", "connection"],
    ["Upgrade-Insecure-Requests", "upgradeInsecureRequests"],
    ["Referer", "referer"],
    ["Cache-Control", "cacheControl"],
  ]);

export type HttpRequestFields = Pick<HttpRequest, RequestLineField> &
  Partial<Pick<HttpRequest, RequestHeaderField>>;

export function createHttpRequest(fields: HttpRequestFields): HttpRequest {
  return Object.freeze({
    method: fields.method,
    url: fields.url,
    version: fields.version,
    host: fields.host ?? "",
    userAgent: fields.userAgent ?? "",
    accept: fields.accept ?? "",
    upgradeInsecureRequests: fields.upgradeInsecureRequests ?? "",
    acceptLanguage: fields.acceptLanguage ?? "",
    acceptEncoding: fields.acceptEncoding ?? "",
    cookie: fields.cookie ?? "",
    connection: fields.connection ?? "",
    referer: fields.referer ?? "",
    cacheControl: fields.cacheControl ?? "",
  });
}
