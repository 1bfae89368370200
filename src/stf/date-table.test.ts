import { describe, it, expect } from "vitest";
import {
  DATE_FORMATS,
  getDateFormat,
  parseDateFormatSelector,
  parseHeaderTimestamp,
  parseLinkDate,
} from "./date-table.js";
import { DateParseError, InvalidDateFormatError } from "./errors.js";

describe("date table", () => {
  it("has twelve one-indexed entries", () => {
    expect(DATE_FORMATS).toHaveLength(12);
    expect(getDateFormat(1)).toBe("%m/%d/%Y %H:%M");
    expect(getDateFormat(12)).toBe("%d-%b-%Y %I:%M%p");
    expect(() => getDateFormat(0)).toThrow(InvalidDateFormatError);
    expect(() => getDateFormat(13)).toThrow(InvalidDateFormatError);
  });

  describe("parseLinkDate", () => {
    it("reads month/day/year with a 24 hour clock", () => {
      expect(parseLinkDate("12/31/20 23:59", 1)).toBe("2020-12-31T23:59:00Z");
      expect(parseLinkDate("7/4/1999 8:05", 1)).toBe("1999-07-04T08:05:00Z");
    });

    it("reads day.month.year and ISO ordering", () => {
      expect(parseLinkDate("31.12.2020 08:30", 3)).toBe("2020-12-31T08:30:00Z");
      expect(parseLinkDate("2021-03-04 10:00", 4)).toBe("2021-03-04T10:00:00Z");
    });

    it("defaults the year to 1900 when the pattern has none", () => {
      expect(parseLinkDate("31-Dec 23:59", 5)).toBe("1900-12-31T23:59:00Z");
      expect(parseLinkDate("1-January 1:30pm", 11)).toBe("1900-01-01T13:30:00Z");
    });

    it("matches month names regardless of case", () => {
      expect(parseLinkDate("5-mar-2022 7:00", 6)).toBe("2022-03-05T07:00:00Z");
    });

    it("converts a 12 hour clock", () => {
      expect(parseLinkDate("01/02/2021 12:05am", 7)).toBe("2021-01-02T00:05:00Z");
      expect(parseLinkDate("06/15/1999 3:15PM", 7)).toBe("1999-06-15T15:15:00Z");
      expect(parseLinkDate("15/06/1999 12:00pm", 8)).toBe("1999-06-15T12:00:00Z");
    });

    it("rejects text that does not fit the pattern", () => {
      expect(() => parseLinkDate("tomorrow", 1)).toThrow(DateParseError);
      expect(() => parseLinkDate("13/01/2020 10:00", 1)).toThrow(DateParseError);
      expect(() => parseLinkDate("31-Foo 10:00", 5)).toThrow(DateParseError);
      expect(() => parseLinkDate("", 1)).toThrow(DateParseError);
    });

    it("rejects an unknown format", () => {
      expect(() => parseLinkDate("12/31/20 23:59", 13)).toThrow(InvalidDateFormatError);
    });
  });

  describe("parseHeaderTimestamp", () => {
    it("reads the header date and time", () => {
      expect(parseHeaderTimestamp("10/15/20;14:03:22;002")).toBe("2020-10-15T14:03:22Z");
      expect(parseHeaderTimestamp("01/02/99;00:00:00;002")).toBe("1999-01-02T00:00:00Z");
    });

    it("fails on anything else", () => {
      expect(() => parseHeaderTimestamp("10/15/20 14:03:22")).toThrow(DateParseError);
      expect(() => parseHeaderTimestamp("10/15/2020;14:03:22;002")).toThrow(DateParseError);
      expect(() => parseHeaderTimestamp(null)).toThrow(DateParseError);
    });
  });

  describe("parseDateFormatSelector", () => {
    it("reads the leading number", () => {
      expect(parseDateFormatSelector("5")).toBe(5);
      expect(parseDateFormatSelector(" 12")).toBe(12);
      expect(parseDateFormatSelector("7 (dd-mmm)")).toBe(7);
    });

    it("rejects values outside 1-12", () => {
      for (const value of ["0", "13", "-1", "x", ""]) {
        expect(() => parseDateFormatSelector(value)).toThrow(InvalidDateFormatError);
      }
      expect(() => parseDateFormatSelector(null)).toThrow(InvalidDateFormatError);
    });
  });
});
