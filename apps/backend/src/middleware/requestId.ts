import type { NextFunction, Request, Response } from "express";
import { randomUUID } from "node:crypto";

const REQUEST_ID = /^[\w.-]{1,64}$/;

/** Echoes a caller's `x-request-id` when it looks like an id, otherwise mints one. */
export function requestId(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.header("x-request-id");
  const id = incoming && REQUEST_ID.test(incoming) ? incoming : randomUUID();
  res.setHeader("x-request-id", id);
  res.locals.requestId = id;
  next();
}
