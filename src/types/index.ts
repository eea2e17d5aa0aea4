export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type ApiDescriptor = {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  payload: Record<string, unknown>;
};

export type FormatSlot = {
  template: string;
  joinWith: string;
};

export type FormatDescriptor = {
  slots: Record<string, FormatSlot>;
  successTemplate: string;
  errorText: string;
  fallbackText: string;
};

type StepBase = {
  readonly id: string;
  readonly storeResponse: boolean;
  /** Display literals, in declaration order. */
  readonly choices: readonly string[] | null;
  /** Normalized answer -> display literal. */
  readonly expectedAnswers: ReadonlyMap<string, string> | null;
  readonly responses: ReadonlyMap<string, string>;
  readonly goto: ReadonlyMap<string, string>;
  readonly isFinal: boolean;
};

export type PromptStep = StepBase & {
  readonly kind: "prompt";
  readonly prompt: string;
};

export type ApiStep = StepBase & {
  readonly kind: "api";
  readonly prompt: string | null;
  readonly api: Readonly<ApiDescriptor>;
  readonly format: Readonly<FormatDescriptor>;
};

export type Step = PromptStep | ApiStep;

export type SimpleCommand = {
  readonly kind: "simple";
  readonly key: string;
  readonly reply: string;
  readonly samples: readonly string[];
};

export type DialogueCommand = {
  readonly kind: "scripted" | "api";
  readonly key: string;
  readonly samples: readonly string[];
  readonly steps: readonly Step[];
  /** Step id -> index into `steps`. */
  readonly stepIndex: ReadonlyMap<string, number>;
  readonly fieldSelectorStep: string;
  readonly confirmationStep: string;
};

export type Command = SimpleCommand | DialogueCommand;

export type ConversationState = {
  readonly commandKey: string;
  readonly stepIndex: number;
  readonly storedResponses: ReadonlyMap<string, string>;
  readonly pendingReturnToConfirmation: boolean;
};

export type MatchMethod = "lexical" | "semantic" | "blended";

export type MatchResult = {
  commandKey: string | null;
  score: number;
  method: MatchMethod;
  /** Advisory only; routing uses the acceptance floor. */
  confident: boolean;
};

export type Keyboard =
  | { type: "none" }
  | { type: "choices"; options: readonly string[] }
  | { type: "clear" };

export type Reply = {
  text: string;
  keyboard: Keyboard;
};

export type Turn = {
  conversationId: string;
  userId: string;
  text: string;
};

export type Session = {
  cookies: Record<string, string>;
  token: string | null;
};

export interface SessionProvider {
  isLoggedIn(userId: string): boolean;
  getSession(userId: string): Session | null;
  getToken(userId: string): string | null;
  invalidate(userId: string): void;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

export type ApiOutcome =
  | { kind: "success"; body: unknown }
  | { kind: "session_expired" }
  | { kind: "failure"; message: string };
