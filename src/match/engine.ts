import type { Catalog } from "../catalog/loader";
import type { EmbeddingProvider, MatchMethod, MatchResult } from "../types";
import type { MatchStrategy } from "../utils/env";
import type { Logger } from "../utils/logger";
import { stripFiller } from "./normalize";
import { cosineSimilarity, lexicalSimilarity } from "./similarity";

export const LEXICAL_FLOOR = 0.8;
export const SEMANTIC_FLOOR = 0.5;
export const CONFIDENT_THRESHOLD = 0.65;
export const SEMANTIC_WEIGHT = 0.7;
export const LEXICAL_WEIGHT = 0.3;

type IndexedCommand = {
  key: string;
  lowerKey: string;
  /** Key embedding first, then one per sample phrase. */
  vectors: number[][];
};

export type MatchEngineOptions = {
  strategy: MatchStrategy;
  embedder: EmbeddingProvider | null;
  logger: Logger;
};

const NO_MATCH = (method: MatchMethod): MatchResult => ({
  commandKey: null,
  score: 0,
  method,
  confident: false,
});

export class MatchEngine {
  private readonly index: IndexedCommand[];
  private readonly embedder: EmbeddingProvider | null;
  private readonly logger: Logger;
  readonly strategy: MatchStrategy;

  private constructor(index: IndexedCommand[], options: MatchEngineOptions) {
    this.index = index;
    this.embedder = options.embedder;
    this.logger = options.logger;
    this.strategy = options.strategy;
  }

  static async create(catalog: Catalog, options: MatchEngineOptions): Promise<MatchEngine> {
    const { embedder, strategy, logger } = options;
    if (strategy !== "lexical" && !embedder) {
      throw new Error(`${strategy} matching needs an embedding provider`);
    }

    const index: IndexedCommand[] = [];
    for (const command of catalog.values()) {
      const vectors: number[][] = [];
      if (embedder) {
        for (const phrase of [command.key, ...command.samples]) {
          vectors.push(await embedder.embed(phrase));
        }
      }
      index.push({ key: command.key, lowerKey: command.key.toLowerCase(), vectors });
    }
    logger.info("Match index ready", {
      commands: index.length,
      embeddings: index.reduce((n, c) => n + c.vectors.length, 0),
      strategy,
    });
    return new MatchEngine(index, options);
  }

  async match(text: string, strategy: MatchStrategy = this.strategy): Promise<MatchResult> {
    const cleaned = stripFiller(text);
    if (strategy === "lexical") return this.matchLexical(cleaned);

    const query = await this.embedQuery(cleaned);
    if (!query) return this.matchLexical(cleaned);
    return strategy === "semantic"
      ? this.matchSemantic(query)
      : this.matchBlended(cleaned, query);
  }

  private async embedQuery(cleaned: string): Promise<number[] | null> {
    if (!this.embedder) {
      throw new Error("semantic matching needs an embedding provider");
    }
    try {
      return await this.embedder.embed(cleaned);
    } catch (err) {
      this.logger.warn("Embedding failed; falling back to lexical match", {
        message: String(err),
      });
      return null;
    }
  }

  private matchLexical(cleaned: string): MatchResult {
    let best: MatchResult = NO_MATCH("lexical");
    for (const command of this.index) {
      const score = lexicalSimilarity(cleaned, command.lowerKey);
      if (score >= LEXICAL_FLOOR && score > best.score) {
        best = { commandKey: command.key, score, method: "lexical", confident: true };
      }
    }
    return best;
  }

  private semanticScore(command: IndexedCommand, query: number[]): number {
    let best = 0;
    for (const vector of command.vectors) {
      best = Math.max(best, cosineSimilarity(query, vector));
    }
    return best;
  }

  private matchSemantic(query: number[]): MatchResult {
    return this.pickRouted("semantic", (command) => this.semanticScore(command, query));
  }

  private matchBlended(cleaned: string, query: number[]): MatchResult {
    return this.pickRouted(
      "blended",
      (command) =>
        SEMANTIC_WEIGHT * this.semanticScore(command, query) +
        LEXICAL_WEIGHT * lexicalSimilarity(cleaned, command.lowerKey)
    );
  }

  private pickRouted(method: MatchMethod, score: (command: IndexedCommand) => number): MatchResult {
    let bestKey: string | null = null;
    let bestScore = 0;
    for (const command of this.index) {
      const s = score(command);
      if (s > bestScore) {
        bestKey = command.key;
        bestScore = s;
      }
    }
    if (bestKey === null || bestScore < SEMANTIC_FLOOR) return NO_MATCH(method);
    return {
      commandKey: bestKey,
      score: bestScore,
      method,
      confident: bestScore >= CONFIDENT_THRESHOLD,
    };
  }
}
