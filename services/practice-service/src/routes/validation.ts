import type { FastifyRequest } from "fastify";
import { z } from "zod";
import { AppError } from "../errors.js";

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new AppError("invalid_request", "Invalid request body", { details: parsed.error.flatten() });
  }
  return parsed.data;
}

const ActionIdParams = z.object({
  id: z
    .string()
    .regex(/^[1-9]\d*$/)
    .transform(Number)
    .pipe(z.number().int().max(Number.MAX_SAFE_INTEGER)),
});

/** Null for an id that cannot name any action. */
export function actionIdOrNull(params: unknown): number | null {
  const parsed = ActionIdParams.safeParse(params);
  return parsed.success ? parsed.data.id : null;
}

/** A malformed id names no action of the caller's, so it is reported like a missing one. */
export function parseActionId(params: unknown): number {
  const actionId = actionIdOrNull(params);
  if (actionId === null) throw new AppError("not_found", "Action not found");
  return actionId;
}

export function authedUserId(req: FastifyRequest): number {
  if (req.userId === null) throw new AppError("unauthorized", "Missing authorization header");
  return req.userId;
}
