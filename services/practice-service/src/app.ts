import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import type { Store } from "./db/store.js";
import { AppError, toAppError } from "./errors.js";
import type { TokenService } from "./lib/tokens.js";
import { registerActionRoutes } from "./routes/actions.js";
import { registerAuthRoutes } from "./routes/auth.js";

declare module "fastify" {
  interface FastifyRequest {
    userId: number | null;
  }
}

export type AppDeps = {
  store: Store;
  tokens: TokenService;
  now?: () => Date;
  logger?: FastifyServerOptions["logger"];
  /** Allowed CORS origin; any origin when null/undefined. */
  corsOrigin?: string | null;
  passwordRounds?: number;
};

const BEARER_PREFIX = "Bearer ";

/** 4xx raised by Fastify itself (bad JSON, unsupported content type, ...). */
function frameworkClientStatus(error: unknown): number | null {
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : null;
  }
  return null;
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const now = deps.now ?? (() => new Date());
  const app = Fastify({ logger: deps.logger ?? false });

  await app.register(cors, {
    origin: deps.corsOrigin ? [deps.corsOrigin] : true,
  });

  app.decorateRequest("userId", null);

  app.addHook("onResponse", async (request, reply) => {
    request.log.info({
      route: request.routeOptions.url ?? request.url,
      method: request.method,
      userId: request.userId ?? undefined,
      durationMs: Math.round(reply.elapsedTime),
      statusCode: reply.statusCode,
    });
  });

  app.setErrorHandler((error, request, reply) => {
    const clientStatus = error instanceof AppError ? null : frameworkClientStatus(error);
    if (clientStatus !== null) {
      return reply.code(clientStatus).send({ error: "invalid_request", message: "Invalid request" });
    }
    const appError = toAppError(error);
    if (appError.kind === "internal") {
      request.log.error({ err: error }, "request failed");
    }
    return reply.code(appError.statusCode).send(appError.toPayload());
  });

  app.setNotFoundHandler((_request, reply) => {
    return reply.code(404).send({ error: "not_found", message: "Not Found" });
  });

  async function requireAuth(request: FastifyRequest): Promise<void> {
    const header = request.headers.authorization;
    if (typeof header !== "string" || !header.startsWith(BEARER_PREFIX)) {
      throw new AppError("unauthorized", "Missing authorization header");
    }
    request.userId = deps.tokens.validate(header.slice(BEARER_PREFIX.length).trim(), now());
  }

  app.get("/health", async () => ({ ok: true }));

  registerAuthRoutes(app, {
    store: deps.store,
    tokens: deps.tokens,
    now,
    passwordRounds: deps.passwordRounds,
  });
  registerActionRoutes(app, { store: deps.store, now, requireAuth });

  return app;
}
