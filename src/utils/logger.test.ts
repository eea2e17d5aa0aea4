import { describe, expect, it } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  it("drops lines below the threshold and writes JSON", () => {
    const lines: string[] = [];
    const logger = createLogger("info", (line) => lines.push(line));
    logger.debug("hidden");
    logger.warn("Match result", { score: 0.9 });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual({
      level: "warn",
      msg: "Match result",
      time: expect.any(String),
      score: 0.9,
    });
  });

  it("adds child bindings to every line", () => {
    const lines: string[] = [];
    const logger = createLogger("debug", (line) => lines.push(line)).child({ turnId: "t-1" });
    logger.child({ conversationId: "c1" }).info("Turn handled", { durationMs: 3 });

    expect(JSON.parse(lines[0])).toMatchObject({
      level: "info",
      msg: "Turn handled",
      turnId: "t-1",
      conversationId: "c1",
      durationMs: 3,
    });
  });
});
