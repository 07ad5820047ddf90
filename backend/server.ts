import { getConfig } from "./config";
import { createApp } from "./app";
import { FeedbackMailer } from "./contact/FeedbackMailer";
import { applySchema, closeDatabasePool } from "./database/connection";
import { describeError } from "./domain/Errors";
import { IntakeSessionStore } from "./intake/IntakeSessionStore";
import { createSearchServices } from "./maps/SearchServices";
import { SessionTokens } from "./middleware/auth";
import { createIntakeRepository } from "./repository/RepositoryFactory";

const config = getConfig();

console.log("[Server] CORS allowed origins:", config.corsOrigins);

// ---- Graceful shutdown ----
async function shutdown(signal: string): Promise<void> {
  console.log(`[Server] ${signal} received, shutting down`);
  try {
    await closeDatabasePool();
  } catch (err) {
    console.error("[Server] Failed to close database pool:", describeError(err));
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

async function main(): Promise<void> {
  if (config.database.url) await applySchema();

  const app = createApp({
    config,
    search: createSearchServices(config),
    repository: createIntakeRepository(config),
    sessions: new IntakeSessionStore(),
    tokens: new SessionTokens(config.sessionSecret),
    mailer: new FeedbackMailer(config.mail),
  });

  app.listen(config.port, "0.0.0.0", () => {
    console.log(`[Server] Running on port ${config.port}`);
    console.log(`[Server] API health check: http://0.0.0.0:${config.port}/api/health`);
    console.log(`[Server] Environment: ${config.env}`);
    console.log(`[Server] Database: ${config.database.url ? "PostgreSQL" : "In-memory"}`);
  });
}

main().catch((err: unknown) => {
  console.error("[Server] Startup failed:", describeError(err));
  process.exit(1);
});
