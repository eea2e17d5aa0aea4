import { vi } from "vitest";
import type { EmbeddingProvider, Session, SessionProvider } from "../types";
import { createLogger, type Logger } from "../utils/logger";

export type CapturedLogger = Logger & { lines: Array<Record<string, unknown>> };

export function captureLogger(): CapturedLogger {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger("debug", (line) => {
    lines.push(JSON.parse(line));
  });
  return Object.assign(logger, { lines });
}

export const silentLogger: Logger = createLogger("error", () => undefined);

/** Bag-of-words vectors over a fixed vocabulary; unknown words are ignored. */
export class VocabularyEmbedder implements EmbeddingProvider {
  calls: string[] = [];

  constructor(private vocabulary: string[]) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const words = text.toLowerCase().split(/[^\p{L}]+/u).filter(Boolean);
    return this.vocabulary.map((term) => words.filter((w) => w === term).length);
  }
}

/** Exact-text lookup; rejects for text it was not given. */
export class TableEmbedder implements EmbeddingProvider {
  constructor(private table: Record<string, number[]>) {}

  async embed(text: string): Promise<number[]> {
    const vector = this.table[text];
    if (!vector) throw new Error(`no vector for "${text}"`);
    return vector;
  }
}

export function fakeSessions(session: Session | null = { cookies: { laravel_session: "abc" }, token: "csrf-token" }) {
  const sessions = {
    isLoggedIn: vi.fn((_userId: string) => session !== null),
    getSession: vi.fn((_userId: string) => session),
    getToken: vi.fn((_userId: string) => session?.token ?? null),
    invalidate: vi.fn((_userId: string) => undefined),
  };
  const provider: SessionProvider = sessions;
  return { provider, ...sessions };
}
