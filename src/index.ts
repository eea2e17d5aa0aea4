import dotenv from "dotenv";
dotenv.config();

import path from "node:path";
import { createApp } from "./slack";
import { createLogger } from "./utils/logger";
import { loadEnv } from "./utils/env";
import { loadCatalogFromDir } from "./catalog/loader";
import { EmbeddingClient } from "./embeddings/client";
import { MatchEngine } from "./match/engine";
import { AuthClient } from "./auth/client";
import { ApiStepExecutor } from "./api/executor";
import { ResponseFormatter } from "./api/formatter";
import { ConversationEngine } from "./conversation/engine";

async function main() {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);

  const catalog = await loadCatalogFromDir(path.resolve(env.COMMANDS_DIR));
  logger.info("Command catalog loaded", { commands: catalog.size, dir: env.COMMANDS_DIR });

  const embedder = env.OPENAI_API_KEY ? new EmbeddingClient(env, logger) : null;
  const matcher = await MatchEngine.create(catalog, {
    strategy: env.MATCH_STRATEGY,
    embedder,
    logger,
  });
  const auth = new AuthClient({
    loginUrl: env.AUTH_LOGIN_URL,
    requiredCookies: env.AUTH_REQUIRED_COOKIES,
    timeoutMs: env.AUTH_TIMEOUT_MS,
    logger,
  });
  const engine = new ConversationEngine({
    catalog,
    matcher,
    executor: new ApiStepExecutor({ sessions: auth, logger, timeoutMs: env.API_TIMEOUT_MS }),
    formatter: new ResponseFormatter(logger),
    logger,
    messages: env.SESSION_EXPIRED_MESSAGE ? { sessionExpired: env.SESSION_EXPIRED_MESSAGE } : {},
  });
  const app = createApp(env, engine, auth, logger);

  // Start Slack Socket Mode
  await app.start();
  logger.info("Slack app started (Socket Mode)", { strategy: matcher.strategy });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await app.stop();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error("Shutdown failed", { message: String(err) });
      process.exit(1);
    });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
