import "dotenv/config";
import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { MemoryStore } from "./db/memoryStore.js";
import { PgStore } from "./db/pgStore.js";
import type { Store } from "./db/store.js";
import { TokenService } from "./lib/tokens.js";

const loaded = loadConfig(process.env);
if (!loaded.ok) {
  console.error("Env validation failed:", loaded.issues);
  process.exit(1);
}
const { config, warnings } = loaded;

const pgStore = config.dataStore === "postgres" ? PgStore.create(config.databaseUrl) : null;
const store: Store = pgStore ?? new MemoryStore();

const app = await buildApp({
  store,
  tokens: new TokenService({ secret: config.jwtSecret, expiryPolicy: config.jwtExpiryPolicy }),
  logger: { level: config.logLevel },
  corsOrigin: config.appOrigin,
});

for (const warning of warnings) app.log.warn(warning);

if (pgStore) {
  pgStore.onPoolError((err) => app.log.error({ err }, "idle postgres client error"));
  try {
    await pgStore.migrate();
  } catch (err) {
    app.log.error({ err }, "schema setup failed");
    process.exit(1);
  }
}

let shuttingDown = false;
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  app.log.info({ signal }, "shutting down");
  try {
    await app.close();
    await store.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

app.listen({ port: config.port, host: config.host }).then(() => {
  app.log.info({ dataStore: config.dataStore, expiryPolicy: config.jwtExpiryPolicy }, "practice service ready");
}).catch((err) => {
  app.log.error(err);
  process.exit(1);
});
