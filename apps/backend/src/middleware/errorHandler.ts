import type { NextFunction, Request, Response } from "express";
import { PayloadTooLargeError, ValidationError, toErrorResponse } from "../errors.js";

/** express.json() failures carry a `type` such as "entity.parse.failed". */
function isBodyError(err: unknown): err is Error & { type: string } {
  return err instanceof Error && "type" in err && typeof err.type === "string" && err.type.startsWith("entity.");
}

function fromBodyError(err: Error & { type: string }): PayloadTooLargeError | ValidationError {
  if (err.type === "entity.too.large") {
    return new PayloadTooLargeError(`Request body too large: ${err.message}`, { cause: err });
  }
  return new ValidationError(`Invalid request body: ${err.message}`, { cause: err });
}

export function notFound(_req: Request, res: Response): void {
  res.status(404).json({ error: { kind: "NotFoundError", message: "Not Found" } });
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const requestId = typeof res.locals.requestId === "string" ? res.locals.requestId : undefined;
  const error = isBodyError(err) ? fromBodyError(err) : err;
  const { status, body } = toErrorResponse(error, requestId);
  if (status >= 500) {
    console.error(`[server] request ${requestId ?? "-"} failed:`, err);
  }
  res.status(status).json(body);
}
