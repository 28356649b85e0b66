import { describe, expect, it } from "@effect/vitest";
import { Effect, Logger } from "effect";
import { formatLogLine, makeStderrLogger } from "./logger";

describe("formatLogLine", () => {
  const entry = { timestamp: "2024-03-01T00:00:00.000Z", level: "INFO", message: "hello" };

  it("should render text lines with a level prefix", () => {
    expect(formatLogLine(entry, "text")).toBe("[2024-03-01T00:00:00.000Z] [INFO] hello");
  });

  it("should append data as JSON in text mode", () => {
    expect(formatLogLine({ ...entry, data: { stream: "Account" } }, "text")).toBe(
      '[2024-03-01T00:00:00.000Z] [INFO] hello {"stream":"Account"}'
    );
  });

  it("should render a JSON object in json mode", () => {
    expect(JSON.parse(formatLogLine(entry, "json"))).toEqual(entry);
  });
});

describe("makeStderrLogger", () => {
  it.effect("should write annotated messages through the writer", () =>
    Effect.gen(function* () {
      const lines: string[] = [];
      const logger = makeStderrLogger("json", (line) => lines.push(line));

      yield* Effect.logWarning("quota low").pipe(
        Effect.annotateLogs("stream", "Lead"),
        Effect.provide(Logger.replace(Logger.defaultLogger, logger))
      );

      expect(lines).toHaveLength(1);
      const parsed = JSON.parse(lines[0] ?? "{}");
      expect(parsed.level).toBe("WARN");
      expect(parsed.message).toBe("quota low");
      expect(parsed.data).toEqual({ stream: "Lead" });
    })
  );
});
