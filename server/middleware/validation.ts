/**
 * Validation Middleware
 *
 * Provides Zod-based request validation for body and params.
 * Integrates with existing error handling via ValidationError.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError, type ZodSchema } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 *
 * @example
 * app.post("/api/query",
 *   validate({ body: queryRequestSchema }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
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
  sessionId: z.object({
    sessionId: z.string().trim().min(1, "Session ID is required").max(200),
  }),
};
