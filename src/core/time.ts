import { DateTime, Option } from "effect";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;
const HAS_ZONE = /(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Parses a Salesforce timestamp into a UTC instant.
 *
 * Accepts ISO-8601 with `Z`, `+00:00` or the compact `+0000` offset that
 * the REST API returns. Values without a zone are read as UTC.
 */
export const parseInstant = (input: string): Option.Option<DateTime.Utc> => {
  const trimmed = input.trim();
  if (trimmed === "") return Option.none();

  let normalized = DATE_ONLY.test(trimmed) ? `${trimmed}T00:00:00` : trimmed;
  normalized = normalized.replace(COMPACT_OFFSET, "$1:$2");
  if (!HAS_ZONE.test(normalized)) {
    normalized = `${normalized}Z`;
  }

  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) return Option.none();
  return DateTime.make(date).pipe(Option.map(DateTime.toUtc));
};

/**
 * Formats an instant as a SOQL datetime literal, e.g. `2024-01-05T10:00:00Z`.
 * Milliseconds are kept only when non-zero.
 */
export const formatSoqlDateTime = (instant: DateTime.Utc): string =>
  DateTime.formatIso(instant).replace(/\.000Z$/, "Z");

/**
 * True when `value` parses and is at or before `cutoff`.
 */
export const isAtOrBefore = (value: string, cutoff: DateTime.Utc): boolean =>
  Option.match(parseInstant(value), {
    onNone: () => false,
    onSome: (instant) => DateTime.lessThanOrEqualTo(instant, cutoff),
  });

/**
 * Compares two timestamps by instant. Unparseable values sort first.
 */
export const isLater = (candidate: string, current: string): boolean => {
  const a = parseInstant(candidate);
  const b = parseInstant(current);
  if (Option.isNone(a)) return false;
  if (Option.isNone(b)) return true;
  return DateTime.greaterThan(a.value, b.value);
};
