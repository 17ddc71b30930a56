import type { FastifyInstance, preHandlerAsyncHookHandler } from "fastify";
import { z } from "zod";
import type { Store } from "../db/store.js";
import { finishAction } from "../lib/recorder.js";
import { listWithStats } from "../lib/stats.js";
import type { PracticeRecord } from "../types.js";
import { toWireAction, toWireActionWithStats, toWireRecord } from "../serialize.js";
import { actionIdOrNull, authedUserId, parseActionId, parseBody } from "./validation.js";

type ActionDeps = {
  store: Store;
  now: () => Date;
  requireAuth: preHandlerAsyncHookHandler;
};

const CreateActionSchema = z.object({
  name: z.string().trim().min(1).max(200),
});

const FinishActionSchema = z
  .object({
    note: z.string().max(1000).nullish(),
  })
  .nullish();

export function registerActionRoutes(app: FastifyInstance, deps: ActionDeps) {
  const { store, now, requireAuth } = deps;

  app.post("/api/actions", { preHandler: [requireAuth] }, async (req) => {
    const userId = authedUserId(req);
    const { name } = parseBody(CreateActionSchema, req.body);
    const action = await store.createAction({ userId, name, createTime: now() });
    req.log.info({ userId, actionId: action.id }, "action created");
    return toWireAction(action);
  });

  app.get("/api/actions", { preHandler: [requireAuth] }, async (req) => {
    const actions = await listWithStats(store, authedUserId(req), now());
    return actions.map(toWireActionWithStats);
  });

  // Malformed, unknown and foreign ids all answer null, matching the list endpoint's view of the world.
  app.get("/api/actions/:id", { preHandler: [requireAuth] }, async (req, reply) => {
    const userId = authedUserId(req);
    const actionId = actionIdOrNull(req.params);
    const action = actionId === null ? null : await store.findAction(userId, actionId);
    return reply.send(action ? toWireAction(action) : null);
  });

  app.get("/api/actions/:id/records", { preHandler: [requireAuth] }, async (req) => {
    const userId = authedUserId(req);
    const actionId = actionIdOrNull(req.params);
    const records: PracticeRecord[] = actionId === null ? [] : await store.listRecords(userId, actionId);
    return records.map(toWireRecord);
  });

  app.post("/api/actions/:id/finish", { preHandler: [requireAuth] }, async (req) => {
    const userId = authedUserId(req);
    const actionId = parseActionId(req.params);
    const body = parseBody(FinishActionSchema, req.body);
    const record = await finishAction(store, { userId, actionId, now: now(), note: body?.note ?? null });
    req.log.info({ userId, actionId, recordId: record.id }, "action finished");
    return toWireRecord(record);
  });
}
