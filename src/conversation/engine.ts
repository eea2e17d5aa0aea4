import type { Catalog } from "../catalog/loader";
import { normalizeAnswer } from "../catalog/normalize";
import type { ApiStepExecutor } from "../api/executor";
import type { ResponseFormatter } from "../api/formatter";
import type { MatchEngine } from "../match/engine";
import type {
  ApiStep,
  ConversationState,
  DialogueCommand,
  Keyboard,
  Reply,
  Step,
  Turn,
} from "../types";
import type { Logger } from "../utils/logger";
import { ConversationStore } from "./store";

export type EngineMessages = {
  noMatch: string;
  restart: string;
  sessionExpired: string;
  busy: string;
  chooseOneOf: (choices: readonly string[]) => string;
};

export const DEFAULT_MESSAGES: EngineMessages = {
  noMatch: "I don't understand what you said.",
  restart: "I'm not sure what to do next. Let's start over.",
  sessionExpired: "Your session has expired. Please log in again.",
  busy: "Still working on your previous message, please try again.",
  chooseOneOf: (choices) => `Please choose one of: ${choices.join(", ")}`,
};

export type ConversationEngineOptions = {
  catalog: Catalog;
  matcher: MatchEngine;
  executor: ApiStepExecutor;
  formatter: ResponseFormatter;
  logger: Logger;
  store?: ConversationStore;
  messages?: Partial<EngineMessages>;
};

type Transition =
  | { kind: "jump"; stepIndex: number; pending: boolean; ack: string | null }
  | { kind: "terminate"; ack: string }
  | { kind: "stuck"; reason: string };

const NO_KEYBOARD: Keyboard = { type: "none" };
const CLEAR_KEYBOARD: Keyboard = { type: "clear" };

function keyboardFor(step: Step): Keyboard {
  return step.choices ? { type: "choices", options: step.choices } : NO_KEYBOARD;
}

function withAck(ack: string | null, text: string): string {
  return ack ? `${ack}\n\n${text}` : text;
}

export function renderSummary(stored: ReadonlyMap<string, string>): string {
  return [...stored].map(([key, value]) => `${key}: ${value}`).join("\n");
}

function renderPrompt(step: Step, stored: ReadonlyMap<string, string>): string {
  return (step.prompt ?? "").split("{summary}").join(renderSummary(stored));
}

/** Nothing left to answer: a final step with no choices or branches. */
function endsOnArrival(step: Step): boolean {
  return step.isFinal && !step.expectedAnswers && step.responses.size === 0 && step.goto.size === 0;
}

export class ConversationEngine {
  private catalog: Catalog;
  private matcher: MatchEngine;
  private executor: ApiStepExecutor;
  private formatter: ResponseFormatter;
  private logger: Logger;
  private store: ConversationStore;
  private messages: EngineMessages;

  constructor(options: ConversationEngineOptions) {
    this.catalog = options.catalog;
    this.matcher = options.matcher;
    this.executor = options.executor;
    this.formatter = options.formatter;
    this.logger = options.logger;
    this.store = options.store ?? new ConversationStore();
    this.messages = { ...DEFAULT_MESSAGES, ...options.messages };
  }

  /** Runtime failures are converted into a reply; this never rejects. */
  async handle(turn: Turn): Promise<Reply> {
    try {
      const state = this.store.get(turn.conversationId);
      return state ? await this.continueDialogue(turn, state) : await this.start(turn);
    } catch (err) {
      this.logger.error("Turn failed", {
        conversationId: turn.conversationId,
        message: String(err),
      });
      return { text: this.messages.restart, keyboard: NO_KEYBOARD };
    }
  }

  reset(conversationId: string): boolean {
    return this.store.delete(conversationId);
  }

  isActive(conversationId: string): boolean {
    return this.store.has(conversationId);
  }

  private async start(turn: Turn): Promise<Reply> {
    const result = await this.matcher.match(turn.text);
    this.logger.info("Match result", {
      conversationId: turn.conversationId,
      commandKey: result.commandKey,
      score: Number(result.score.toFixed(4)),
      method: result.method,
      confident: result.confident,
    });

    const command = result.commandKey ? this.catalog.get(result.commandKey) : undefined;
    if (!command) {
      return { text: this.messages.noMatch, keyboard: NO_KEYBOARD };
    }
    if (command.kind === "simple") {
      return { text: command.reply, keyboard: NO_KEYBOARD };
    }

    const initial: ConversationState = {
      commandKey: command.key,
      stepIndex: 0,
      storedResponses: new Map(),
      pendingReturnToConfirmation: false,
    };
    return this.enter(turn, command, null, initial, null);
  }

  private async continueDialogue(turn: Turn, state: ConversationState): Promise<Reply> {
    const command = this.catalog.getDialogue(state.commandKey);
    const step = command?.steps[state.stepIndex];
    if (!command || !step) {
      this.logger.error("Conversation points outside the catalog", {
        conversationId: turn.conversationId,
        commandKey: state.commandKey,
        stepIndex: state.stepIndex,
      });
      this.store.delete(turn.conversationId, state);
      return { text: this.messages.restart, keyboard: CLEAR_KEYBOARD };
    }

    const answer = normalizeAnswer(turn.text);
    if (step.expectedAnswers && step.choices && !step.expectedAnswers.has(answer)) {
      this.logger.debug("Answer rejected", { command: command.key, step: step.id, answer });
      const prompt = renderPrompt(step, state.storedResponses);
      const hint = this.messages.chooseOneOf(step.choices);
      return { text: prompt ? `${hint}\n\n${prompt}` : hint, keyboard: keyboardFor(step) };
    }

    let stored = state.storedResponses;
    if (step.storeResponse) {
      const copy = new Map(stored);
      copy.set(step.id, step.expectedAnswers?.get(answer) ?? turn.text.trim());
      stored = copy;
    }

    const transition = this.resolve(command, state, step, answer);
    switch (transition.kind) {
      case "stuck":
        this.logger.warn("No transition from step; check the command script", {
          command: command.key,
          step: step.id,
          answer,
          reason: transition.reason,
        });
        return { text: this.messages.restart, keyboard: NO_KEYBOARD };
      case "terminate":
        if (!this.store.delete(turn.conversationId, state)) {
          return { text: this.messages.busy, keyboard: NO_KEYBOARD };
        }
        this.logger.info("Conversation finished", {
          conversationId: turn.conversationId,
          command: command.key,
        });
        return { text: transition.ack, keyboard: CLEAR_KEYBOARD };
      case "jump":
        return this.enter(
          turn,
          command,
          state,
          {
            commandKey: state.commandKey,
            stepIndex: transition.stepIndex,
            storedResponses: stored,
            pendingReturnToConfirmation: transition.pending,
          },
          transition.ack
        );
    }
  }

  private resolve(
    command: DialogueCommand,
    state: ConversationState,
    step: Step,
    answer: string
  ): Transition {
    const target = step.goto.get(answer);
    const ack = target === undefined ? (step.responses.get(answer) ?? null) : null;
    let stepIndex: number;
    let pending = state.pendingReturnToConfirmation;

    if (target !== undefined) {
      const index = command.stepIndex.get(target);
      if (index === undefined) return { kind: "stuck", reason: `unknown goto target "${target}"` };
      stepIndex = index;
      if (step.id === command.fieldSelectorStep) pending = true;
    } else if (ack !== null) {
      if (step.isFinal) return { kind: "terminate", ack };
      stepIndex = state.stepIndex + 1;
    } else if (pending) {
      const index = command.stepIndex.get(command.confirmationStep);
      if (index === undefined) {
        return { kind: "stuck", reason: `no confirmation step "${command.confirmationStep}"` };
      }
      pending = false;
      stepIndex = index;
    } else if (!step.isFinal) {
      stepIndex = state.stepIndex + 1;
    } else {
      return { kind: "stuck", reason: "final step has no matching response" };
    }

    if (stepIndex >= command.steps.length) {
      return { kind: "stuck", reason: "ran past the last step" };
    }
    return { kind: "jump", stepIndex, pending, ack };
  }

  /**
   * Executes the step `next` points at and commits `next` over `base`
   * (null when the conversation is being created). Nothing is committed
   * unless the step ran to an outcome that moves the dialogue.
   */
  private async enter(
    turn: Turn,
    command: DialogueCommand,
    base: ConversationState | null,
    next: ConversationState,
    ack: string | null
  ): Promise<Reply> {
    const target = command.steps[next.stepIndex];
    if (target.kind === "api") {
      return this.runApiStep(turn, command, target, base, next);
    }

    const text = withAck(ack, renderPrompt(target, next.storedResponses));
    if (endsOnArrival(target)) {
      if (base) this.store.delete(turn.conversationId, base);
      this.logger.info("Conversation finished", {
        conversationId: turn.conversationId,
        command: command.key,
      });
      return { text, keyboard: CLEAR_KEYBOARD };
    }
    if (!this.commit(turn.conversationId, base, next)) {
      return { text: this.messages.busy, keyboard: NO_KEYBOARD };
    }
    return { text, keyboard: keyboardFor(target) };
  }

  private async runApiStep(
    turn: Turn,
    command: DialogueCommand,
    step: ApiStep,
    base: ConversationState | null,
    next: ConversationState
  ): Promise<Reply> {
    const outcome = await this.executor.execute(step, next.storedResponses, turn.userId);
    const finish = () => {
      if (base) this.store.delete(turn.conversationId, base);
      this.logger.info("Conversation finished", {
        conversationId: turn.conversationId,
        command: command.key,
        outcome: outcome.kind,
      });
    };

    switch (outcome.kind) {
      case "session_expired":
        this.logger.info("Session expired during API step", {
          userId: turn.userId,
          command: command.key,
          step: step.id,
        });
        return { text: this.messages.sessionExpired, keyboard: NO_KEYBOARD };
      case "failure":
        if (step.isFinal) {
          finish();
          return { text: outcome.message, keyboard: CLEAR_KEYBOARD };
        }
        return { text: outcome.message, keyboard: NO_KEYBOARD };
      case "success": {
        const text = this.formatter.format(outcome.body, step.format);
        if (step.isFinal) {
          finish();
          return { text, keyboard: CLEAR_KEYBOARD };
        }
        if (!this.commit(turn.conversationId, base, next)) {
          return { text: this.messages.busy, keyboard: NO_KEYBOARD };
        }
        return { text, keyboard: keyboardFor(step) };
      }
    }
  }

  private commit(key: string, base: ConversationState | null, next: ConversationState): boolean {
    return base ? this.store.replace(key, base, next) : this.store.create(key, next);
  }
}
