import type { HttpErrorCode, HttpErrorDetails } from "@gitview/contracts";

export class HttpRouteError extends Error {
  readonly status: number;
  readonly code: HttpErrorCode;
  readonly details?: HttpErrorDetails;

  constructor(
    status: number,
    code: HttpErrorCode,
    message: string,
    options: { details?: HttpErrorDetails; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "HttpRouteError";
    this.status = status;
    this.code = code;
    this.details = options.details;
  }
}

export function isHttpRouteError(error: unknown): error is HttpRouteError {
  return error instanceof HttpRouteError;
}
