/**
 * Validation Middleware
 * 
 * Provides Zod-based request validation for body, params, and query.
 * Integrates with existing error handling via ValidationError.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError, type ZodSchema } from "zod";
import { DELETE_KINDS, sendMessageSchema } from "@shared/schema";
import { PAGINATION_CONSTANTS } from "../config/constants";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
  query?: ZodSchema;
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 * Parsed values replace the originals, so coercions and defaults apply downstream.
 * 
 * @example
 * app.post("/api/messages/send",
 *   authenticated,
 *   validate({ body: messageSchemas.send }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
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
        const messages = error.errors
          .map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
          .join(', ');
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

export const authSchemas = {
  login: z.object({
    username: z.string().trim().min(1, "Username is required"),
    password: z.string().min(1, "Password is required"),
  }),

  refresh: z.object({
    refreshToken: z.string().min(1, "refreshToken is required"),
  }),

  logout: z.object({
    refreshToken: z.string().min(1).optional(),
  }),
};

export const messageSchemas = {
  send: sendMessageSchema,

  list: z.object({
    page: z.coerce.number().int().min(1).default(1),
    // Out-of-range sizes are clamped by the store
    pageSize: z.coerce.number().int().default(PAGINATION_CONSTANTS.DEFAULT_PAGE_SIZE),
    isRead: z.enum(["true", "false"]).transform(value => value === "true").optional(),
  }),

  markRead: z.object({
    messageId: z.coerce.string().min(1).optional(),
  }),

  delete: z.object({
    messageId: z.coerce.string().min(1).optional(),
    kind: z.enum(DELETE_KINDS).optional(),
  }).refine(data => (data.messageId === undefined) !== (data.kind === undefined), {
    message: "Provide exactly one of messageId or kind",
  }),
};

export type LoginInput = z.infer<typeof authSchemas.login>;
export type RefreshInput = z.infer<typeof authSchemas.refresh>;
export type LogoutInput = z.infer<typeof authSchemas.logout>;
export type ListMessagesQuery = z.infer<typeof messageSchemas.list>;
export type MarkReadInput = z.infer<typeof messageSchemas.markRead>;
export type DeleteMessagesInput = z.infer<typeof messageSchemas.delete>;
