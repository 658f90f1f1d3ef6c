/**
 * Zod validation for express routes, plus the shared error response.
 */

import { NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError, ZodType, ZodTypeDef } from "zod";
import { MeshworkError, TimeoutError, ValidationError } from "../../core/errors";

export interface ErrorBody {
  ok: false;
  error: { code: string; message: string; details?: unknown };
}

type Handler<T> = (data: T, req: Request, res: Response) => Promise<void> | void;

function issues(error: ZodError) {
  return error.errors.map((e) => ({ path: e.path.join("."), message: e.message, code: e.code }));
}

function validate<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  pick: (req: Request) => unknown,
  what: string,
  handler: Handler<T>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(pick(req));
    if (!result.success) {
      const body: ErrorBody = {
        ok: false,
        error: { code: "validation_error", message: `${what} validation failed`, details: issues(result.error) },
      };
      res.status(400).json(body);
      return;
    }
    Promise.resolve()
      .then(() => handler(result.data, req, res))
      .catch(next);
  };
}

/** Parses the JSON body and hands the typed value to the handler. Handler errors reach `errorHandler`. */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, handler: Handler<T>): RequestHandler {
  return validate(schema, (req) => req.body, "Request", handler);
}

export function validateQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>, handler: Handler<T>): RequestHandler {
  return validate(schema, (req) => req.query, "Query", handler);
}

/** Wraps a handler without input so a rejected promise still reaches `errorHandler`. */
export function handle(handler: (req: Request, res: Response) => Promise<void> | void): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof MeshworkError) {
    return {
      status: error.statusCode ?? 500,
      body: { ok: false, error: { code: error.code, message: error.message, details: error.details } },
    };
  }
  if (error instanceof ValidationError) {
    return { status: 400, body: { ok: false, error: { code: error.code, message: error.message, details: error.details } } };
  }
  if (error instanceof TimeoutError) {
    return { status: 504, body: { ok: false, error: { code: error.code, message: error.message } } };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { status: 500, body: { ok: false, error: { code: "internal_error", message: message || "Internal server error" } } };
}
