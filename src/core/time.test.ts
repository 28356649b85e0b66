import { describe, expect, it } from "@effect/vitest";
import { DateTime, Option } from "effect";
import { formatSoqlDateTime, isAtOrBefore, isLater, parseInstant } from "./time";

const iso = (input: string) => Option.map(parseInstant(input), DateTime.formatIso);

describe("parseInstant", () => {
  it("should accept the compact offset returned by the REST API", () => {
    expect(iso("2024-01-05T10:00:00.000+0000")).toEqual(Option.some("2024-01-05T10:00:00.000Z"));
  });

  it("should convert non-UTC offsets", () => {
    expect(iso("2024-01-05T10:00:00+02:00")).toEqual(Option.some("2024-01-05T08:00:00.000Z"));
  });

  it("should read values without a zone as UTC", () => {
    expect(iso("2024-01-05T10:00:00")).toEqual(Option.some("2024-01-05T10:00:00.000Z"));
    expect(iso("2024-01-05")).toEqual(Option.some("2024-01-05T00:00:00.000Z"));
  });

  it("should return none for garbage", () => {
    expect(parseInstant("not a date")).toEqual(Option.none());
    expect(parseInstant("  ")).toEqual(Option.none());
  });
});

describe("formatSoqlDateTime", () => {
  it("should drop zero milliseconds", () => {
    expect(formatSoqlDateTime(DateTime.unsafeMake("2024-01-05T10:00:00.000Z"))).toBe(
      "2024-01-05T10:00:00Z"
    );
  });

  it("should keep non-zero milliseconds", () => {
    expect(formatSoqlDateTime(DateTime.unsafeMake("2024-01-05T10:00:00.250Z"))).toBe(
      "2024-01-05T10:00:00.250Z"
    );
  });
});

describe("comparisons", () => {
  const cutoff = DateTime.unsafeMake("2024-01-05T10:00:00Z");

  it("should include the cutoff itself", () => {
    expect(isAtOrBefore("2024-01-05T10:00:00.000+0000", cutoff)).toBe(true);
    expect(isAtOrBefore("2024-01-05T10:00:01.000+0000", cutoff)).toBe(false);
    expect(isAtOrBefore("garbage", cutoff)).toBe(false);
  });

  it("should order by instant rather than by text", () => {
    expect(isLater("2024-01-05T10:00:00+02:00", "2024-01-05T09:00:00Z")).toBe(false);
    expect(isLater("2024-01-05T10:00:00Z", "2024-01-05T09:00:00Z")).toBe(true);
    expect(isLater("2024-01-05T10:00:00Z", "garbage")).toBe(true);
  });
});
