import { App, LogLevel } from "@slack/bolt";
import type { Env } from "../utils/env";
import type { Logger } from "../utils/logger";
import type { AuthClient } from "../auth/client";
import type { ConversationEngine } from "../conversation/engine";
import { registerRoutes } from "./router";

export function createApp(env: Env, engine: ConversationEngine, auth: AuthClient, logger: Logger) {
  const app = new App({
    token: env.SLACK_BOT_TOKEN,
    signingSecret: env.SLACK_SIGNING_SECRET,
    appToken: env.SLACK_APP_TOKEN,
    socketMode: true,
    logLevel: LogLevel.ERROR, // keep Slack SDK quiet; we log ourselves
  });

  app.error(async (err) => {
    logger.error("Slack app error", { message: err.message, code: err.code });
  });

  registerRoutes(app, env, engine, auth, logger.child({ component: "slack" }));
  return {
    start: () => app.start(),
    stop: () => app.stop(),
  };
}
