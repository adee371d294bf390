/**
 * Zod validation helpers.
 *
 * Parse a request body or query string against a Zod schema and hand
 * back the schema's output type. Failures throw RequestValidationError,
 * which the error handler turns into a 400 envelope.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { RequestValidationError } from "../types/error.js";
import type { ValidationIssue } from "../types/error.js";

export async function parseBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(
      "Request body validation failed",
      formatZodErrors(result.error),
    );
  }
  return result.data;
}

export function parseQuery<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestValidationError(
      "Invalid query parameters",
      formatZodErrors(result.error),
    );
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
