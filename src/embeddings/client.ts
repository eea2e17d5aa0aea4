import OpenAI from "openai";
import type { Env } from "../utils/env";
import type { Logger } from "../utils/logger";
import type { EmbeddingProvider } from "../types";

export class EmbeddingClient implements EmbeddingProvider {
  private openai: OpenAI;
  private model: string;
  private logger: Logger;

  constructor(env: Env, logger: Logger) {
    if (!env.OPENAI_API_KEY) {
      throw new Error("OPENAI_API_KEY is required for embeddings");
    }
    this.model = env.OPENAI_EMBEDDING_MODEL;
    this.logger = logger;
    this.openai = new OpenAI({ apiKey: env.OPENAI_API_KEY });
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.openai.embeddings.create({
      model: this.model,
      input: text,
    });
    const first = response.data[0];
    if (!first || first.embedding.length === 0) {
      throw new Error(`Empty embedding returned by ${this.model}`);
    }
    this.logger.debug("Embedding created", { model: this.model, dimensions: first.embedding.length });
    return first.embedding;
  }
}
