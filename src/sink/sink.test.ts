import { describe, expect, it } from "@effect/vitest";
import { DateTime } from "effect";
import { SinkMessage, toJsonLine } from "./sink";

describe("toJsonLine", () => {
  it("should announce the schema with its key and bookmark properties", () => {
    const line = toJsonLine(
      SinkMessage.Schema({
        stream: "Account",
        schema: { type: "object" },
        keyProperties: ["Id"],
        replicationKey: "SystemModstamp",
      })
    );
    expect(line).toBe(
      '{"type":"SCHEMA","stream":"Account","schema":{"type":"object"},"key_properties":["Id"],' +
        '"bookmark_properties":["SystemModstamp"]}'
    );
  });

  it("should leave bookmark properties empty for full-table streams", () => {
    const line = toJsonLine(
      SinkMessage.Schema({ stream: "TopicTag", schema: {}, keyProperties: ["Id"] })
    );
    expect(line).toBe(
      '{"type":"SCHEMA","stream":"TopicTag","schema":{},"key_properties":["Id"],' +
        '"bookmark_properties":[]}'
    );
  });

  it("should stamp records with their version and extraction time", () => {
    const line = toJsonLine(
      SinkMessage.Record({
        stream: "Account",
        record: { Id: "001A" },
        version: 1700000000000,
        extractedAt: DateTime.unsafeMake("2024-01-05T10:00:00Z"),
      })
    );
    expect(line).toBe(
      '{"type":"RECORD","stream":"Account","record":{"Id":"001A"},"version":1700000000000,' +
        '"time_extracted":"2024-01-05T10:00:00.000Z"}'
    );
  });

  it("should write state and version activation", () => {
    expect(toJsonLine(SinkMessage.State({ value: { bookmarks: {} } }))).toBe(
      '{"type":"STATE","value":{"bookmarks":{}}}'
    );
    expect(toJsonLine(SinkMessage.ActivateVersion({ stream: "Account", version: 5 }))).toBe(
      '{"type":"ACTIVATE_VERSION","stream":"Account","version":5}'
    );
  });
});
