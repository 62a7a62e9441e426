import { describe, it, expect } from "vitest";
import {
  checkDateTimeFormat,
  formatDateTime,
  formatNumber,
  isEpochFormat,
  isValidTimeZone,
  parseDateTimeText,
  parseEpoch,
} from "../../codec/formats.js";

const noonUtc = new Date("2024-03-01T12:00:00.000Z");

describe("formatNumber()", () => {
  it("renders plain numbers without a format", () => {
    expect(formatNumber(1.25, undefined)).toEqual({ success: true, data: "1.25" });
  });

  it("renders fixed decimals", () => {
    expect(formatNumber(3.5, "F2")).toEqual({ success: true, data: "3.50" });
  });

  it("zero-pads integers, keeping the sign in front", () => {
    expect(formatNumber(42, "D5")).toEqual({ success: true, data: "00042" });
    expect(formatNumber(-7, "D3")).toEqual({ success: true, data: "-007" });
  });

  it("rejects fractions under a D format", () => {
    expect(formatNumber(1.5, "D2")).toEqual({
      success: false,
      error: 'format "D2" requires an integer, got 1.5',
    });
  });

  it("rejects unknown formats", () => {
    expect(formatNumber(1, "X2")).toEqual({ success: false, error: 'unsupported number format "X2"' });
  });
});

describe("time zones and formats", () => {
  it("knows IANA zones", () => {
    expect(isValidTimeZone("Europe/Berlin")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus")).toBe(false);
  });

  it("accepts date-fns patterns and epoch formats", () => {
    expect(checkDateTimeFormat("yyyy-MM-dd HH:mm")).toBeUndefined();
    expect(checkDateTimeFormat("unix")).toBeUndefined();
    expect(isEpochFormat("unixMs")).toBe(true);
    expect(isEpochFormat("yyyy")).toBe(false);
  });

  it("reports unusable patterns", () => {
    expect(typeof checkDateTimeFormat("jj")).toBe("string");
  });
});

describe("formatDateTime()", () => {
  it("renders ISO 8601 in UTC by default", () => {
    expect(formatDateTime(noonUtc, undefined, undefined)).toEqual({
      kind: "text",
      value: "2024-03-01T12:00:00.000Z",
    });
  });

  it("renders in the field's time zone", () => {
    expect(formatDateTime(noonUtc, undefined, "Europe/Berlin")).toEqual({
      kind: "text",
      value: "2024-03-01T13:00:00.000+01:00",
    });
    expect(formatDateTime(noonUtc, "yyyy-MM-dd HH:mm", "America/New_York")).toEqual({
      kind: "text",
      value: "2024-03-01 07:00",
    });
  });

  it("renders epochs in seconds or milliseconds", () => {
    expect(formatDateTime(noonUtc, "unix", undefined)).toEqual({ kind: "epoch", value: "1709294400" });
    expect(formatDateTime(noonUtc, "unixMs", undefined)).toEqual({ kind: "epoch", value: "1709294400000" });
  });
});

describe("parseDateTimeText()", () => {
  it("reads ISO text with an offset", () => {
    expect(parseDateTimeText("2024-03-01T13:00:00.000+01:00", undefined, undefined)).toEqual(noonUtc);
  });

  it("reads offset-less text in the field's zone", () => {
    expect(parseDateTimeText("2024-03-01T13:00:00", undefined, "Europe/Berlin")).toEqual(noonUtc);
  });

  it("falls back to the field's own pattern", () => {
    expect(parseDateTimeText("01/03/2024 07:00", "dd/MM/yyyy HH:mm", "America/New_York")).toEqual(noonUtc);
  });

  it("returns undefined for unreadable text", () => {
    expect(parseDateTimeText("not a date", undefined, undefined)).toBeUndefined();
    expect(parseDateTimeText("not a date", "yyyy-MM-dd", undefined)).toBeUndefined();
  });
});

describe("parseEpoch()", () => {
  it("reads seconds and milliseconds", () => {
    expect(parseEpoch("1709294400", "unix")).toEqual(noonUtc);
    expect(parseEpoch("1709294400000", "unixMs")).toEqual(noonUtc);
  });

  it("returns undefined for non-numeric text", () => {
    expect(parseEpoch("soon", "unix")).toBeUndefined();
  });
});
