import * as chrono from "chrono-node";
import { normalizeWhitespace } from "../../packages/shared/src/text-utils.js";

/** Singapore time; every persisted timestamp is expressed at this offset. */
export const DEFAULT_UTC_OFFSET_MINUTES = 8 * 60;

export interface ResolvedEventDate {
  dateText: string;
  startDatetime: string;
  endDatetime: string;
}

export interface NaturalDateMatch {
  start: Date;
  end: Date | null;
}

export type NaturalDateParser = (
  text: string,
  options: { offsetMinutes: number; reference: Date; preferFuture: boolean }
) => NaturalDateMatch | null;

const pad = (value: number): string => String(value).padStart(2, "0");

const formatOffset = (offsetMinutes: number): string => {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const absolute = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;
};

/** `YYYY-MM-DDTHH:mm±HH:MM` at the given offset; seconds are truncated. */
export const formatInstantAtOffset = (instant: Date, offsetMinutes: number): string => {
  const shifted = new Date(instant.getTime() + offsetMinutes * 60_000);
  return (
    `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}` +
    `T${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}${formatOffset(offsetMinutes)}`
  );
};

const INSTANT_LIKE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

const parseOffsetMinutes = (value: string): number => {
  if (value.toUpperCase() === "Z") {
    return 0;
  }
  const digits = value.slice(1).replace(":", "");
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4));
  return value.startsWith("-") ? -minutes : minutes;
};

/**
 * Parse ISO-8601-ish text (`2026-03-15T10:00`, `2026-03-15 10:00:00`,
 * `2026-03-15T10:00+08:00`, `2026-03-15`) and re-express it at the target
 * offset. Text without an offset is read as target-offset local time.
 * Returns "" for anything else.
 */
export const normalizeInstantLike = (
  value: string | null | undefined,
  offsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES
): string => {
  const text = normalizeWhitespace(value);
  const match = INSTANT_LIKE_PATTERN.exec(text);
  if (!match) {
    return "";
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, offsetText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText ?? "0");
  const minute = Number(minuteText ?? "0");
  const second = Number(secondText ?? "0");

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return "";
  }

  const wallClockMs = Date.UTC(year, month - 1, day, hour, minute, second);
  const calendarCheck = new Date(wallClockMs);
  if (calendarCheck.getUTCDate() !== day || calendarCheck.getUTCMonth() !== month - 1) {
    return "";
  }

  const sourceOffset = offsetText ? parseOffsetMinutes(offsetText) : offsetMinutes;
  return formatInstantAtOffset(new Date(wallClockMs - sourceOffset * 60_000), offsetMinutes);
};

export const chronoDateParser: NaturalDateParser = (text, { offsetMinutes, reference, preferFuture }) => {
  const [result] = chrono.parse(
    text,
    { instant: reference, timezone: offsetMinutes },
    { forwardDate: preferFuture }
  );
  if (!result) {
    return null;
  }

  return {
    start: result.start.date(),
    end: result.end ? result.end.date() : null
  };
};

/**
 * Turn free-form date text into fixed-offset timestamps. Unresolvable text
 * keeps `dateText` and leaves both timestamps empty; this never throws.
 * For ranges the start is authoritative and the end is best-effort.
 */
export const resolveEventDate = (
  rawText: string | null | undefined,
  reference: Date,
  offsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES,
  parser: NaturalDateParser = chronoDateParser
): ResolvedEventDate => {
  const dateText = normalizeWhitespace(rawText);
  const unresolved: ResolvedEventDate = { dateText, startDatetime: "", endDatetime: "" };
  if (!dateText) {
    return unresolved;
  }

  const direct = normalizeInstantLike(dateText, offsetMinutes);
  if (direct) {
    return { dateText, startDatetime: direct, endDatetime: "" };
  }

  let match: NaturalDateMatch | null;
  try {
    match = parser(dateText, { offsetMinutes, reference, preferFuture: true });
  } catch {
    return unresolved;
  }

  if (!match || Number.isNaN(match.start.getTime())) {
    return unresolved;
  }

  const endDatetime =
    match.end && !Number.isNaN(match.end.getTime())
      ? formatInstantAtOffset(match.end, offsetMinutes)
      : "";

  return {
    dateText,
    startDatetime: formatInstantAtOffset(match.start, offsetMinutes),
    endDatetime
  };
};
