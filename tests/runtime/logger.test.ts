import { describe, it, expect } from "vitest";
import { createLogger, formatLogLine } from "../../src/runtime/logger.js";

describe("logger", () => {
  it("formats level, scope and fields", () => {
    expect(formatLogLine("info", "engine", "ready")).toBe("[midi-graph] INFO engine: ready");
    expect(formatLogLine("warn", "osc", "bad packet", { port: 9000 })).toBe(
      '[midi-graph] WARN osc: bad packet {"port":9000}',
    );
  });

  it("serializes errors by name and message", () => {
    expect(formatLogLine("error", "s", "failed", { error: new TypeError("boom") })).toBe(
      '[midi-graph] ERROR s: failed {"error":{"name":"TypeError","message":"boom"}}',
    );
  });

  it("drops lines below its level", () => {
    const lines: string[] = [];
    const logger = createLogger("root", "warn", (line) => lines.push(line));
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    expect(lines).toEqual(["[midi-graph] WARN root: c", "[midi-graph] ERROR root: d"]);
  });

  it("scopes child loggers under their parent", () => {
    const lines: string[] = [];
    createLogger("root", "info", (line) => lines.push(line))
      .child("engine")
      .info("started");
    expect(lines).toEqual(["[midi-graph] INFO root.engine: started"]);
  });
});
