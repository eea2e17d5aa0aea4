import type { KnownBlock } from "@slack/types";
import type { Reply } from "../types";

export const CHOICE_ACTION_PREFIX = "dialogue_choice_";
export const CHOICE_ACTION_PATTERN = /^dialogue_choice_\d+$/;

// Slack caps an actions block at 25 elements and button labels at 75 chars.
const MAX_BUTTONS = 25;
const MAX_LABEL = 75;

function label(option: string): string {
  return option.length > MAX_LABEL ? `${option.slice(0, MAX_LABEL - 1)}…` : option;
}

/**
 * Choice keyboards become buttons whose value is the literal answer. Slack
 * keeps no keyboard between messages, so a cleared keyboard is just text.
 */
export function buildReplyBlocks(reply: Reply): KnownBlock[] {
  const blocks: KnownBlock[] = [
    {
      type: "section",
      text: { type: "mrkdwn", text: reply.text },
    },
  ];
  if (reply.keyboard.type !== "choices" || reply.keyboard.options.length === 0) {
    return blocks;
  }

  blocks.push({
    type: "actions",
    elements: reply.keyboard.options.slice(0, MAX_BUTTONS).map((option, i) => ({
      type: "button" as const,
      text: { type: "plain_text" as const, text: label(option) },
      action_id: `${CHOICE_ACTION_PREFIX}${i}`,
      value: option,
    })),
  });
  return blocks;
}

export function toMessage(reply: Reply) {
  return { text: reply.text, blocks: buildReplyBlocks(reply) };
}
