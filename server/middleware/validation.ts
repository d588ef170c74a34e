/**
 * Validation Middleware
 *
 * Provides Zod-based request validation for body, params, and query.
 * Integrates with existing error handling via ValidationError.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError, type ZodTypeAny } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodTypeAny;
  params?: z.ZodType<Record<string, string>, z.ZodTypeDef, unknown>;
  query?: z.ZodType<Record<string, string | undefined>, z.ZodTypeDef, unknown>;
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 *
 * @example
 * app.post("/api/messages/:requestId/cancel",
 *   validate({ params: commonSchemas.requestId }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.query) {
        req.query = schemas.query.parse(req.query);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

// Common parameter schemas
export const commonSchemas = {
  requestId: z.object({
    requestId: z.string().min(1, "requestId is required"),
  }),
};

// Multipart fields arrive as strings
export const uploadFieldsSchema = z.object({
  userId: z.string().min(1, "userId is required"),
  text: z.string().max(20000).default(""),
  requestId: z.string().min(1).optional(),
});
