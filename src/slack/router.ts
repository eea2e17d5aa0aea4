import type { App, BlockButtonAction } from "@slack/bolt";
import { v4 as uuidv4 } from "uuid";
import type { Env } from "../utils/env";
import type { Logger } from "../utils/logger";
import type { AuthClient } from "../auth/client";
import type { ConversationEngine } from "../conversation/engine";
import type { Reply, Turn } from "../types";
import { CHOICE_ACTION_PATTERN, toMessage } from "./ui";

export const HELP_TEXT = [
  "Just tell me what you need, e.g. `add client` or `list clients`.",
  "`/assistant reset` drops the current conversation.",
  "`/assistant login <email> <password>` and `/assistant logout` manage your session.",
].join("\n");

const LOGIN_REQUIRED = "Please log in with `/assistant login <email> <password>` before using the bot.";

export function registerRoutes(
  app: App,
  env: Env,
  engine: ConversationEngine,
  auth: AuthClient,
  logger: Logger
) {
  const loginRequired = Boolean(env.AUTH_LOGIN_URL);

  const runTurn = async (turn: Turn): Promise<Reply> => {
    const log = logger.child({
      turnId: uuidv4(),
      conversationId: turn.conversationId,
      userId: turn.userId,
    });
    const startedAt = Date.now();
    if (loginRequired && !auth.isLoggedIn(turn.userId)) {
      log.debug("Turn refused, not logged in");
      return { text: LOGIN_REQUIRED, keyboard: { type: "none" } };
    }
    const wasActive = engine.isActive(turn.conversationId);
    const reply = await engine.handle(turn);
    log.info("Turn handled", {
      wasActive,
      active: engine.isActive(turn.conversationId),
      durationMs: Date.now() - startedAt,
    });
    log.debug("Turn reply", { text: reply.text, keyboard: reply.keyboard.type });
    return reply;
  };

  app.command("/assistant", async ({ command, ack, respond }) => {
    await ack();
    const [sub = "help", ...args] = command.text.trim().split(/\s+/).filter(Boolean);

    switch (sub.toLowerCase()) {
      case "reset": {
        const dropped = engine.reset(command.channel_id);
        await respond(
          dropped ? "Conversation reset. You can start a new command." : "No active conversation to reset."
        );
        return;
      }
      case "login": {
        if (args.length < 2) {
          await respond("Usage: `/assistant login <email> <password>`");
          return;
        }
        const [username, ...password] = args;
        const result = await auth.login(command.user_id, username, password.join(" "));
        await respond(result.message);
        return;
      }
      case "logout":
        await respond(
          auth.logout(command.user_id) ? "You have been logged out successfully." : "You are not logged in."
        );
        return;
      default:
        await respond(HELP_TEXT);
    }
  });

  app.action<BlockButtonAction>(CHOICE_ACTION_PATTERN, async ({ ack, body, action, client }) => {
    await ack();
    const channel = body.channel?.id ?? body.user.id;
    const text = action.value ?? action.text.text;
    try {
      const reply = await runTurn({ conversationId: channel, userId: body.user.id, text });
      await client.chat.postMessage({ channel, ...toMessage(reply) });
    } catch (err) {
      logger.error("Choice handling failed", { channel, message: String(err) });
    }
  });

  // Messages (DMs and mentions)
  app.message(async ({ message, say, context }) => {
    if (message.subtype !== undefined) return;
    const text = message.text ?? "";
    const mention = context.botUserId ? `<@${context.botUserId}>` : null;
    logger.debug("Slack message received", {
      channelType: message.channel_type,
      userId: message.user,
    });

    // Only respond to DMs and mentions
    if (message.channel_type !== "im" && !(mention && text.includes(mention))) return;

    const cleaned = (mention ? text.split(mention).join(" ") : text).trim();
    if (!cleaned) return;

    try {
      const reply = await runTurn({ conversationId: message.channel, userId: message.user, text: cleaned });
      await say(toMessage(reply));
    } catch (err) {
      logger.error("Message handling failed", { channel: message.channel, message: String(err) });
    }
  });
}
