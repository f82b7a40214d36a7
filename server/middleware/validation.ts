/**
 * Request validation for the HTTP surface.
 *
 * Parsed values replace the raw request parts, so handlers see trimmed
 * strings and coerced numbers. Failures go to next() as a ValidationError.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { z, ZodError, type ZodSchema } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  params?: ZodSchema<Record<string, string>>;
  query?: ZodSchema;
  body?: ZodSchema;
}

function describeIssues(error: ZodError): string {
  return error.errors
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join(", ");
}

/**
 * @example
 * app.post("/api/chat", validate({ body: chatRequestSchema }), handler);
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) req.params = schemas.params.parse(req.params);
      if (schemas.query) req.query = schemas.query.parse(req.query);
      if (schemas.body) req.body = schemas.body.parse(req.body);
      next();
    } catch (error) {
      next(error instanceof ZodError ? new ValidationError(describeIssues(error)) : error);
    }
  };
}

export const commonSchemas = {
  id: z.object({
    id: z.string().trim().min(1, "ID is required"),
  }),
  messageList: z.object({
    limit: z.coerce.number().int().min(1).max(200).optional(),
  }),
};

export type MessageListQuery = z.infer<typeof commonSchemas.messageList>;
