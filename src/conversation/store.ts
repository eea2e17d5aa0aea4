import type { ConversationState } from "../types";

/**
 * Live dialogues keyed by conversation id. Mutations are check-and-set on the
 * state object a caller read, so two in-flight turns for the same key cannot
 * overwrite each other; different keys never contend.
 */
export class ConversationStore {
  private states = new Map<string, ConversationState>();

  get(key: string): ConversationState | undefined {
    return this.states.get(key);
  }

  has(key: string): boolean {
    return this.states.has(key);
  }

  /** Only succeeds when the conversation is idle. */
  create(key: string, state: ConversationState): boolean {
    if (this.states.has(key)) return false;
    this.states.set(key, state);
    return true;
  }

  replace(key: string, expected: ConversationState, next: ConversationState): boolean {
    if (this.states.get(key) !== expected) return false;
    this.states.set(key, next);
    return true;
  }

  /** Without `expected`, deletes unconditionally. */
  delete(key: string, expected?: ConversationState): boolean {
    const current = this.states.get(key);
    if (!current) return false;
    if (expected && current !== expected) return false;
    return this.states.delete(key);
  }

  get size(): number {
    return this.states.size;
  }
}
