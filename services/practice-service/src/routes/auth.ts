import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { login, register, type AccountDeps, type Session } from "../lib/accounts.js";
import { toWireUser } from "../serialize.js";
import { parseBody } from "./validation.js";

const CredentialsSchema = z.object({
  username: z.string().trim().min(1).max(64),
  password: z.string().min(1).max(256),
});

function toWireSession(session: Session) {
  return { token: session.token, user: toWireUser(session.user) };
}

export function registerAuthRoutes(app: FastifyInstance, deps: AccountDeps) {
  app.post("/api/register", async (req) => {
    const body = parseBody(CredentialsSchema, req.body);
    const session = await register(deps, body);
    req.log.info({ userId: session.user.id }, "user registered");
    return toWireSession(session);
  });

  app.post("/api/login", async (req) => {
    const body = parseBody(CredentialsSchema, req.body);
    return toWireSession(await login(deps, body));
  });
}
