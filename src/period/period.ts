import {
  addDays,
  addMonths,
  addYears,
  isValid,
  subDays,
  subMonths,
  subYears,
} from "date-fns";
import { err, ok, type Result } from "neverthrow";
import type { Days, Months, Years } from "../shared/types";
import {
  brand,
  splitMonths,
  weeksToDays,
  yearsToMonths,
} from "../utils/period-conversion";
import {
  MAX_COMPONENT,
  MIN_COMPONENT,
  PERIOD_PATTERN,
  PERIOD_UNITS,
} from "./const";
import type { PeriodError, PeriodUnit } from "./types";

export enum PeriodErrors {
  PERIOD_PARSE_FAILED = "PERIOD_PARSE_FAILED",
  DATE_OUT_OF_RANGE = "DATE_OUT_OF_RANGE",
}

function checkComponent(value: number, label: string): number {
  if (
    !Number.isInteger(value) ||
    value > MAX_COMPONENT ||
    value < MIN_COMPONENT
  ) {
    throw new RangeError(`${label} must be a 32-bit integer, got ${value}`);
  }
  // collapse -0 so equality and formatting stay component based
  return value || 0;
}

function rotateLeft(value: number, distance: number): number {
  return (value << distance) | (value >>> (32 - distance));
}

/**
 * A calendar-based amount of time made of years, months and days.
 *
 * Components are signed and kept as given: 12 months and 1 year are different
 * periods until {@link Period.normalized} is called.
 */
export class Period {
  static readonly ZERO = new Period(
    brand<"years">(0),
    brand<"months">(0),
    brand<"days">(0)
  );

  public readonly years: Years;
  public readonly months: Months;
  public readonly days: Days;

  private constructor(years: Years, months: Months, days: Days) {
    this.years = years;
    this.months = months;
    this.days = days;
  }

  /**
   * @throws RangeError if a component is not an integer in the 32-bit range
   */
  static of(years: number, months: number, days: number): Period {
    const y = checkComponent(years, "Years");
    const m = checkComponent(months, "Months");
    const d = checkComponent(days, "Days");
    if (y === 0 && m === 0 && d === 0) {
      return Period.ZERO;
    }
    return new Period(brand<"years">(y), brand<"months">(m), brand<"days">(d));
  }

  static ofYears(years: number): Period {
    return Period.of(years, 0, 0);
  }

  static ofMonths(months: number): Period {
    return Period.of(0, months, 0);
  }

  static ofWeeks(weeks: number): Period {
    const days = weeksToDays(brand<"weeks">(checkComponent(weeks, "Weeks")));
    return Period.of(0, 0, days);
  }

  static ofDays(days: number): Period {
    return Period.of(0, 0, days);
  }

  /**
   * Parses an ISO-8601 period such as `P1Y2M`, `P2W` or `-P3D`.
   * Letters are case-insensitive and weeks are folded into days.
   */
  static parse(text: string): Result<Period, PeriodError> {
    const match = PERIOD_PATTERN.exec(text);
    if (!match) {
      return err(parseFailure(text));
    }
    const [, sign, years, months, weeks, days] = match;
    if (
      years === undefined &&
      months === undefined &&
      weeks === undefined &&
      days === undefined
    ) {
      return err(parseFailure(text));
    }
    const negate = sign === "-" ? -1 : 1;
    const values = [years, months, weeks, days].map(
      (part) => negate * Number(part ?? 0)
    );
    const [y = 0, m = 0, w = 0, d = 0] = values;
    const totalDays = w * 7 + d;
    const inRange = [y, m, w, totalDays].every(
      (value) => value <= MAX_COMPONENT && value >= MIN_COMPONENT
    );
    if (!inRange) {
      return err(parseFailure(text));
    }
    return ok(Period.of(y, m, totalDays));
  }

  isZero(): boolean {
    return this.years === 0 && this.months === 0 && this.days === 0;
  }

  isNegative(): boolean {
    return this.years < 0 || this.months < 0 || this.days < 0;
  }

  toTotalMonths(): Months {
    return brand<"months">(yearsToMonths(this.years) + this.months);
  }

  get(unit: PeriodUnit): number {
    return this[unit];
  }

  getUnits(): readonly PeriodUnit[] {
    return PERIOD_UNITS;
  }

  normalized(): Period {
    const { years, months } = splitMonths(this.toTotalMonths());
    if (years === this.years && months === this.months) {
      return this;
    }
    return Period.of(years, months, this.days);
  }

  /**
   * Adds this period to a date. Years and months go first, clamping to the
   * end of the month, then days. The given date is left untouched.
   */
  addTo(date: Date): Result<Date, PeriodError> {
    if (!isValid(date)) {
      return err(outOfRange(date, "add"));
    }
    let result = date;
    if (this.years !== 0 && this.months !== 0) {
      result = addMonths(result, this.toTotalMonths());
    } else {
      if (this.years !== 0) {
        result = addYears(result, this.years);
      }
      if (this.months !== 0) {
        result = addMonths(result, this.months);
      }
    }
    if (this.days !== 0) {
      result = addDays(result, this.days);
    }
    if (!isValid(result)) {
      return err(outOfRange(date, "add"));
    }
    return ok(result === date ? new Date(date.getTime()) : result);
  }

  subtractFrom(date: Date): Result<Date, PeriodError> {
    if (!isValid(date)) {
      return err(outOfRange(date, "subtract"));
    }
    let result = date;
    if (this.years !== 0 && this.months !== 0) {
      result = subMonths(result, this.toTotalMonths());
    } else {
      if (this.years !== 0) {
        result = subYears(result, this.years);
      }
      if (this.months !== 0) {
        result = subMonths(result, this.months);
      }
    }
    if (this.days !== 0) {
      result = subDays(result, this.days);
    }
    if (!isValid(result)) {
      return err(outOfRange(date, "subtract"));
    }
    return ok(result === date ? new Date(date.getTime()) : result);
  }

  equals(other: Period | null | undefined): boolean {
    if (other === this) {
      return true;
    }
    if (!other) {
      return false;
    }
    return (
      this.years === other.years &&
      this.months === other.months &&
      this.days === other.days
    );
  }

  hashCode(): number {
    return (
      (this.years + rotateLeft(this.months, 8) + rotateLeft(this.days, 16)) | 0
    );
  }

  toString(): string {
    if (this.isZero()) {
      return "P0D";
    }
    return [
      "P",
      this.years !== 0 ? `${this.years}Y` : "",
      this.months !== 0 ? `${this.months}M` : "",
      this.days !== 0 ? `${this.days}D` : "",
    ].join("");
  }
}

function parseFailure(text: string): PeriodError {
  return {
    code: PeriodErrors.PERIOD_PARSE_FAILED,
    message: `Text cannot be parsed to a Period: '${text}'`,
  };
}

function outOfRange(date: Date, operation: "add" | "subtract"): PeriodError {
  const shown = isValid(date) ? date.toISOString() : "Invalid Date";
  return {
    code: PeriodErrors.DATE_OUT_OF_RANGE,
    message: `Unable to ${operation} period: date out of range (${shown})`,
  };
}
