/**
 * Encode-side formats for numbers and datetimes.
 */

import { isValid, parse } from "date-fns";
import { formatInTimeZone, fromZonedTime, toDate } from "date-fns-tz";
import { type Result, ok, err } from "../types/common.js";

/** Canonical datetime pattern: ISO 8601 with milliseconds and offset (`Z` for UTC). */
export const DEFAULT_DATETIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSXXX";

/** Zone used when a datetime field declares none. */
export const DEFAULT_TIME_ZONE = "UTC";

const NUMBER_FORMAT = /^([FD])(\d{1,2})$/;
const EPOCH_FORMATS = new Set(["unix", "unixMs"]);

/** Whether a datetime format stores an epoch number (`N`) instead of text. */
export const isEpochFormat = (format: string | undefined): boolean =>
  format !== undefined && EPOCH_FORMATS.has(format);

/** Whether `format` is a supported number format (`F2`, `D8`...). */
export const isNumberFormat = (format: string): boolean => NUMBER_FORMAT.test(format);

/**
 * Renders a number with an optional `F<n>` / `D<n>` format.
 *
 * @example
 * ```ts
 * formatNumber(3.5, "F2"); // { success: true, data: "3.50" }
 * formatNumber(42, "D5");  // { success: true, data: "00042" }
 * ```
 */
export const formatNumber = (
  value: number,
  format: string | undefined,
): Result<string, string> => {
  if (format === undefined) return ok(String(value));

  const match = NUMBER_FORMAT.exec(format);
  if (!match) return err(`unsupported number format "${format}"`);

  const digits = Number(match[2]);
  if (match[1] === "F") return ok(value.toFixed(digits));

  if (!Number.isInteger(value)) {
    return err(`format "${format}" requires an integer, got ${value}`);
  }
  const padded = String(Math.abs(value)).padStart(digits, "0");
  return ok(value < 0 ? `-${padded}` : padded);
};

/** Whether `timeZone` is an IANA zone the runtime knows. */
export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
};

/**
 * Checks a datetime format by rendering the epoch with it.
 * Returns the reason the format is unusable, or undefined.
 */
export const checkDateTimeFormat = (format: string): string | undefined => {
  if (isEpochFormat(format)) return undefined;
  try {
    formatInTimeZone(new Date(0), DEFAULT_TIME_ZONE, format);
    return undefined;
  } catch (e) {
    return e instanceof Error ? e.message : String(e);
  }
};

/** Stored form of a datetime: text for pattern formats, an epoch for `unix` / `unixMs`. */
export type StoredDateTime =
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "epoch"; readonly value: string };

/**
 * Renders a datetime in `timeZone` with `format`.
 *
 * @example
 * ```ts
 * formatDateTime(new Date("2024-03-01T12:00:00Z"), undefined, "Europe/Berlin");
 * // { kind: "text", value: "2024-03-01T13:00:00.000+01:00" }
 * formatDateTime(new Date("2024-03-01T12:00:00Z"), "unix", undefined);
 * // { kind: "epoch", value: "1709294400" }
 * ```
 */
export const formatDateTime = (
  value: Date,
  format: string | undefined,
  timeZone: string | undefined,
): StoredDateTime => {
  if (format === "unix") {
    return { kind: "epoch", value: String(Math.floor(value.getTime() / 1000)) };
  }
  if (format === "unixMs") {
    return { kind: "epoch", value: String(value.getTime()) };
  }
  return {
    kind: "text",
    value: formatInTimeZone(
      value,
      timeZone ?? DEFAULT_TIME_ZONE,
      format ?? DEFAULT_DATETIME_FORMAT,
    ),
  };
};

const QUOTED_LITERAL = /'[^']*'/g;
const OFFSET_TOKEN = /[XxO]/;

/** Whether a date-fns format pattern carries its own UTC offset. */
const hasOffsetToken = (format: string): boolean =>
  OFFSET_TOKEN.test(format.replace(QUOTED_LITERAL, ""));

/**
 * Parses stored datetime text. A declared `format` is tried first; text it
 * reads without an offset is wall-clock time in `timeZone`. Text the format
 * does not match, or any text when no format is declared, is read as ISO 8601.
 * Returns undefined when the text cannot be read.
 */
export const parseDateTimeText = (
  text: string,
  format: string | undefined,
  timeZone: string | undefined,
): Date | undefined => {
  const zone = timeZone ?? DEFAULT_TIME_ZONE;

  if (format !== undefined && !isEpochFormat(format)) {
    const parsed = parse(text, format, new Date(0));
    if (isValid(parsed)) {
      return hasOffsetToken(format) ? parsed : fromZonedTime(parsed, zone);
    }
  }

  const iso = toDate(text, { timeZone: zone });
  return isValid(iso) ? iso : undefined;
};

/** Parses a stored epoch number according to `format`. */
export const parseEpoch = (
  text: string,
  format: string | undefined,
): Date | undefined => {
  if (text.trim() === "") return undefined;
  const n = Number(text);
  if (!Number.isFinite(n)) return undefined;
  return new Date(format === "unix" ? n * 1000 : n);
};
