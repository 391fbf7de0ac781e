// Normalizes error output; flow is route validation/exception -> sendRouteError -> plain-text status response.
import path from "node:path";
import type { Request, Response } from "express";
import { HttpRouteError, isHttpRouteError } from "../domain/http-route-error.js";
import { logEvent } from "../logging/logger.js";

export const FALLBACK_CONTENT_TYPE = "application/octet-stream";

export function sendHttpError(res: Response, status: number, message: string) {
  res.status(status).type("text/plain").send(message);
}

function describeCause(error: Error): string | null {
  const { cause } = error;
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? null : String(cause);
}

export function sendRouteError(req: Request, res: Response, error: unknown) {
  const routeError = isHttpRouteError(error)
    ? error
    : new HttpRouteError(500, "INTERNAL_ERROR", "Unexpected server error.", { cause: error });

  if (res.headersSent || res.destroyed) {
    logEvent("http", "info", "request:aborted", {
      method: req.method,
      path: req.path,
      code: routeError.code,
    });
    return;
  }

  if (routeError.status >= 500) {
    logEvent("http", "error", "request:failed", {
      method: req.method,
      path: req.path,
      code: routeError.code,
      message: routeError.message,
      cause: describeCause(routeError),
      details: routeError.details ?? null,
    });
  }

  sendHttpError(res, routeError.status, routeError.message);
}

export function sendFileBytes(res: Response, filePath: string, content: Buffer) {
  res.type(path.posix.extname(filePath) || FALLBACK_CONTENT_TYPE);
  res.send(content);
}

export function sendHtml(res: Response, html: string) {
  res.type("html").send(html);
}

// Aborts in-flight git processes for this request once the client goes away before the response ends.
export function createRequestAbortSignal(res: Response): AbortSignal {
  const controller = new AbortController();

  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });

  return controller.signal;
}

export function readQueryString(value: unknown): string {
  return typeof value === "string" ? value : "";
}
