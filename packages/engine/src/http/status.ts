/**
 * Closed set of response statuses the engine can render.
 *
 * Supporting a new status means adding a variant here together with its
 * fixed status-line text; callers never pass free-form status strings.
 */
export const Status = {
  Ok: "Ok",
  BadRequest: "BadRequest",
  NotFound: "NotFound",
  MethodNotAllowed: "MethodNotAllowed",
  InternalServerError: "InternalServerError",
} as const;

export type Status = (typeof Status)[keyof typeof Status];

const STATUS_LINE_TEXT: Readonly<Record<Status, string>> = {
  Ok: "200 OK",
  BadRequest: "400 BAD REQUEST",
  NotFound: "404 NOT FOUND",
  MethodNotAllowed: "405 METHOD NOT ALLOWED",
  InternalServerError: "500 INTERNAL SERVER ERROR",
};

/** Code and reason phrase as they appear in the status line, e.g. `"200 OK"`. */
export function statusText(status: Status): string {
  return STATUS_LINE_TEXT[status];
}

export function statusCode(status: Status): number {
  return Number.parseInt(STATUS_LINE_TEXT[status], 10);
}
