import { describe, it, expect } from "vitest";
import { Effect, LogLevel } from "effect";
import { loggingLayer, makePrettyLogger, parseLogLevel } from "@valuegraph/effect-runtime";

describe("parseLogLevel", () => {
  it("maps names to Effect log levels", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.Debug);
    expect(parseLogLevel("INFO")).toBe(LogLevel.Info);
    expect(parseLogLevel("warning")).toBe(LogLevel.Warning);
    expect(parseLogLevel("error")).toBe(LogLevel.Error);
    expect(parseLogLevel("verbose")).toBe(LogLevel.Info);
  });
});

describe("pretty logger", () => {
  it("writes timestamped, level-padded lines", () => {
    const lines: string[] = [];
    const layer = loggingLayer("debug", makePrettyLogger((line) => lines.push(line)));
    Effect.runSync(Effect.logWarning("grad norm", 3).pipe(Effect.provide(layer)));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] WARN  grad norm 3$/);
  });

  it("drops messages below the minimum level", () => {
    const lines: string[] = [];
    const layer = loggingLayer("error", makePrettyLogger((line) => lines.push(line)));
    Effect.runSync(Effect.logInfo("hidden").pipe(Effect.provide(layer)));
    expect(lines).toHaveLength(0);
  });
});
