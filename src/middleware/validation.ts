import type { Request, Response, NextFunction } from "express";
import { z, ZodError, type ZodSchema } from "zod";

/**
 * Validation middleware factory
 * Creates middleware that validates request body and query against Zod schemas
 */
export function validate(schemas: { body?: ZodSchema; query?: ZodSchema }) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body);
      }
      if (schemas.query) {
        req.query = await schemas.query.parseAsync(req.query);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json(validationErrorBody(error));
        return;
      }
      next(error);
    }
  };
}

export function validationErrorBody(error: ZodError) {
  return {
    error: {
      code: "VALIDATION_ERROR",
      message: "Invalid request data",
      details: error.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      })),
    },
  };
}

export const schemas = {
  subscribeQuery: z
    .object({
      channel_id: z.string().min(1).max(256).optional(),
      token: z.string().optional(),
    })
    .passthrough(),

  publishEvent: z.object({
    data: z.string().max(1_000_000),
    channelId: z.string().min(1).max(256).optional(),
    id: z.string().max(256).optional(),
    event: z.string().min(1).max(128).optional(),
    retry: z.number().int().nonnegative().optional(),
  }),
};

export type SubscribeQuery = z.infer<typeof schemas.subscribeQuery>;
export type PublishEventBody = z.infer<typeof schemas.publishEvent>;
