import { describe, expect, it } from "vitest";
import { loadCatalog } from "../catalog/loader";
import { MatchEngine } from "./engine";
import { TableEmbedder, VocabularyEmbedder, captureLogger, silentLogger } from "../test-utils/fakes";

function simpleCatalog(commands: Record<string, string[]>) {
  return loadCatalog([
    {
      name: "test.json",
      commands: Object.fromEntries(
        Object.entries(commands).map(([key, samples]) => [
          key,
          { type: "simple", response: `reply for ${key}`, samples },
        ])
      ),
    },
  ]);
}

describe("MatchEngine (lexical)", () => {
  const lexical = (commands: Record<string, string[]>) =>
    MatchEngine.create(simpleCatalog(commands), {
      strategy: "lexical",
      embedder: null,
      logger: silentLogger,
    });

  it("accepts a similarity of exactly 0.80 and rejects 0.79", async () => {
    const key = "a".repeat(100);
    const engine = await lexical({ [key]: [] });

    const accepted = await engine.match("a".repeat(80) + "b".repeat(20));
    expect(accepted).toEqual({ commandKey: key, score: 0.8, method: "lexical", confident: true });

    const rejected = await engine.match("a".repeat(79) + "b".repeat(21));
    expect(rejected).toEqual({ commandKey: null, score: 0, method: "lexical", confident: false });
  });

  it("breaks ties by catalog order", async () => {
    const engine = await lexical({ hello: [], hellp: [] });
    const result = await engine.match("hellx");
    expect(result.commandKey).toBe("hello");
    expect(result.score).toBe(0.8);
  });

  it("strips filler and case before comparing", async () => {
    const engine = await lexical({ "add client": [], "list clients": [] });
    const result = await engine.match("Please ADD client");
    expect(result).toEqual({ commandKey: "add client", score: 1, method: "lexical", confident: true });
  });

  it("is deterministic for the same input", async () => {
    const engine = await lexical({ "add client": [], "list clients": [] });
    expect(await engine.match("list client")).toEqual(await engine.match("list client"));
  });

  it("refuses semantic strategies without an embedder", async () => {
    await expect(
      MatchEngine.create(simpleCatalog({ hello: [] }), {
        strategy: "semantic",
        embedder: null,
        logger: silentLogger,
      })
    ).rejects.toThrow("semantic matching needs an embedding provider");
  });
});

describe("MatchEngine (semantic)", () => {
  const table = new TableEmbedder({
    alpha: [1, 0, 0, 0],
    beta: [0, 0, 0, 1],
    "beta sample": [0, 1, 0, 0],
    "half way": [1, 1, 1, 1],
    "too far": [1, 0, 2, 0],
    "sample query": [0, 1, 0, 0],
  });
  const semantic = () =>
    MatchEngine.create(simpleCatalog({ alpha: [], beta: ["beta sample"] }), {
      strategy: "semantic",
      embedder: table,
      logger: silentLogger,
    });

  it("routes at exactly 0.50 without claiming confidence", async () => {
    const engine = await semantic();
    expect(await engine.match("half way")).toEqual({
      commandKey: "alpha",
      score: 0.5,
      method: "semantic",
      confident: false,
    });
  });

  it("rejects scores below the floor", async () => {
    const engine = await semantic();
    expect(await engine.match("too far")).toEqual({
      commandKey: null,
      score: 0,
      method: "semantic",
      confident: false,
    });
  });

  it("matches through declared sample phrases", async () => {
    const engine = await semantic();
    expect(await engine.match("sample query")).toEqual({
      commandKey: "beta",
      score: 1,
      method: "semantic",
      confident: true,
    });
  });

  it("embeds keys and samples once at creation", async () => {
    const embedder = new VocabularyEmbedder(["book", "appointment"]);
    const engine = await MatchEngine.create(
      simpleCatalog({ book_appointment: ["reserve a slot"] }),
      { strategy: "semantic", embedder, logger: silentLogger }
    );
    expect(embedder.calls).toEqual(["book_appointment", "reserve a slot"]);

    const result = await engine.match("Please book an appointment");
    expect(result.commandKey).toBe("book_appointment");
    expect(result.score).toBeCloseTo(1);
    expect(embedder.calls).toEqual(["book_appointment", "reserve a slot", "book an appointment"]);
  });
});

describe("MatchEngine (blended)", () => {
  const table = new TableEmbedder({
    "add client": [1, 0],
    "remove client": [0, 1],
    "ad client": [1, 1],
  });

  it("weights semantic 0.7 and lexical 0.3", async () => {
    const engine = await MatchEngine.create(simpleCatalog({ "add client": [], "remove client": [] }), {
      strategy: "blended",
      embedder: table,
      logger: silentLogger,
    });
    const result = await engine.match("ad client");
    expect(result.commandKey).toBe("add client");
    expect(result.method).toBe("blended");
    expect(result.score).toBeCloseTo(0.7 * Math.SQRT1_2 + 0.3 * 0.9);
    expect(result.confident).toBe(true);
  });

  it("falls back to lexical matching when the embedder fails", async () => {
    const logger = captureLogger();
    const engine = await MatchEngine.create(simpleCatalog({ "add client": [], "remove client": [] }), {
      strategy: "blended",
      embedder: table,
      logger,
    });
    const result = await engine.match("add clint");
    expect(result).toEqual({ commandKey: "add client", score: 0.9, method: "lexical", confident: true });
    expect(logger.lines.some((line) => line.msg === "Embedding failed; falling back to lexical match")).toBe(
      true
    );
  });
});
