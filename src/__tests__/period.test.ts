import { describe, expect, test } from "vitest";
import { Period, PeriodErrors } from "../period/period";

describe("Period", () => {
  describe("of", () => {
    test("should return the shared zero period for all-zero components", () => {
      expect(Period.of(0, 0, 0)).toBe(Period.ZERO);
      expect(Period.ZERO.isZero()).toBe(true);
    });

    test("should hold weeks as days", () => {
      const period = Period.ofWeeks(3);

      expect(period.days).toBe(21);
      expect(period.toString()).toBe("P21D");
    });

    test("should throw on components that are not 32-bit integers", () => {
      expect(() => Period.of(1.5, 0, 0)).toThrow(RangeError);
      expect(() => Period.ofDays(2 ** 31)).toThrow(
        "Days must be a 32-bit integer, got 2147483648"
      );
    });
  });

  describe("parse", () => {
    test("should parse each designator", () => {
      const period = Period.parse("P1Y2M3W4D")._unsafeUnwrap();

      expect(period.years).toBe(1);
      expect(period.months).toBe(2);
      expect(period.days).toBe(25);
    });

    test("should ignore case", () => {
      expect(Period.parse("p3m")._unsafeUnwrap().equals(Period.ofMonths(3))).toBe(
        true
      );
    });

    test("should apply a leading sign to every component", () => {
      const period = Period.parse("-P1Y2M")._unsafeUnwrap();

      expect(period.years).toBe(-1);
      expect(period.months).toBe(-2);
      expect(period.isNegative()).toBe(true);
    });

    test("should fail on malformed text", () => {
      for (const text of ["P", "3M", "P1.5M", "P1M1Y", "P9999999999D"]) {
        expect(Period.parse(text)._unsafeUnwrapErr()).toEqual({
          code: PeriodErrors.PERIOD_PARSE_FAILED,
          message: `Text cannot be parsed to a Period: '${text}'`,
        });
      }
    });
  });

  describe("toString", () => {
    test("should print the non-zero components", () => {
      expect(Period.ZERO.toString()).toBe("P0D");
      expect(Period.of(1, 6, 0).toString()).toBe("P1Y6M");
      expect(Period.of(0, 0, 5).toString()).toBe("P5D");
      expect(Period.of(2, 0, 3).toString()).toBe("P2Y3D");
    });
  });

  describe("normalized", () => {
    test("should carry whole years out of the months", () => {
      expect(Period.ofMonths(18).normalized().toString()).toBe("P1Y6M");
      expect(Period.of(1, 13, 5).normalized().toString()).toBe("P2Y1M5D");
    });

    test("should truncate negative months toward zero", () => {
      expect(Period.ofMonths(-18).normalized().toString()).toBe("P-1Y-6M");
    });

    test("should return the receiver when nothing changes", () => {
      const period = Period.of(1, 6, 40);

      expect(period.normalized()).toBe(period);
    });
  });

  describe("units", () => {
    test("should expose years, months and days only", () => {
      const period = Period.of(1, 2, 3);

      expect(period.getUnits()).toEqual(["years", "months", "days"]);
      expect(period.get("years")).toBe(1);
      expect(period.get("months")).toBe(2);
      expect(period.get("days")).toBe(3);
      expect(period.toTotalMonths()).toBe(14);
    });
  });

  describe("equals and hashCode", () => {
    test("should compare components", () => {
      expect(Period.ofWeeks(2).equals(Period.ofDays(14))).toBe(true);
      expect(Period.ofMonths(12).equals(Period.ofYears(1))).toBe(false);
      expect(Period.ofMonths(1).equals(undefined)).toBe(false);
    });

    test("should spread components across the hash", () => {
      expect(Period.ofYears(1).hashCode()).toBe(1);
      expect(Period.ofMonths(1).hashCode()).toBe(256);
      expect(Period.ofDays(1).hashCode()).toBe(65536);
    });
  });

  describe("addTo", () => {
    test("should clamp to the end of a shorter month", () => {
      expect(Period.ofMonths(1).addTo(new Date(2024, 0, 31))._unsafeUnwrap()).toEqual(
        new Date(2024, 1, 29)
      );
    });

    test("should add years and months as one step", () => {
      expect(Period.of(1, 1, 0).addTo(new Date(2023, 0, 31))._unsafeUnwrap()).toEqual(
        new Date(2024, 1, 29)
      );
    });

    test("should add days after months", () => {
      expect(Period.of(0, 1, 1).addTo(new Date(2024, 0, 31))._unsafeUnwrap()).toEqual(
        new Date(2024, 2, 1)
      );
    });

    test("should not modify the given date", () => {
      const date = new Date(2024, 4, 10);
      const zero = Period.ZERO.addTo(date)._unsafeUnwrap();

      expect(zero).toEqual(date);
      expect(zero).not.toBe(date);
    });

    test("should fail on invalid dates and overflow", () => {
      expect(Period.ofDays(1).addTo(new Date(Number.NaN))._unsafeUnwrapErr()).toEqual({
        code: PeriodErrors.DATE_OUT_OF_RANGE,
        message: "Unable to add period: date out of range (Invalid Date)",
      });
      expect(
        Period.ofYears(10000).addTo(new Date(Date.UTC(275000, 0, 1)))._unsafeUnwrapErr()
          .code
      ).toBe(PeriodErrors.DATE_OUT_OF_RANGE);
    });
  });

  describe("subtractFrom", () => {
    test("should clamp to the end of a shorter month", () => {
      expect(
        Period.ofMonths(1).subtractFrom(new Date(2024, 2, 31))._unsafeUnwrap()
      ).toEqual(new Date(2024, 1, 29));
    });

    test("should subtract years", () => {
      expect(
        Period.ofYears(1).subtractFrom(new Date(2024, 1, 29))._unsafeUnwrap()
      ).toEqual(new Date(2023, 1, 28));
    });

    test("should fail on invalid dates", () => {
      expect(
        Period.ofDays(1).subtractFrom(new Date(Number.NaN))._unsafeUnwrapErr()
          .message
      ).toBe("Unable to subtract period: date out of range (Invalid Date)");
    });
  });
});
