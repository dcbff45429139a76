import { err, ok, type Result } from "neverthrow";
import { MAX_COMPONENT, MIN_COMPONENT } from "../period/const";
import { Period } from "../period/period";
import type { PeriodError, PeriodUnit } from "../period/types";
import {
  brand,
  daysToWeeks,
  isWholeWeeks,
  MONTHS_PER_YEAR,
} from "../utils/period-conversion";
import {
  DAYS_IN_YEAR,
  MAX_MONTHS,
  MAX_YEARS,
  TERM_NAME,
  TERM_YEARS,
} from "./const";
import type { InvalidFrequencyError } from "./types";

export enum FrequencyErrors {
  INVALID_FREQUENCY = "INVALID_FREQUENCY",
}

function invalidFrequency(
  message: string,
  cause?: PeriodError
): InvalidFrequencyError {
  return cause
    ? { code: FrequencyErrors.INVALID_FREQUENCY, message, cause }
    : { code: FrequencyErrors.INVALID_FREQUENCY, message };
}

function checkWhole(
  value: number,
  label: string
): Result<number, InvalidFrequencyError> {
  if (!Number.isInteger(value)) {
    return err(invalidFrequency(`${label} must be a whole number: ${value}`));
  }
  return ok(value);
}

// Counts are held in a 32-bit period component, weeks as days
function checkRange(
  value: number,
  label: string,
  scale = 1
): Result<number, InvalidFrequencyError> {
  if (value * scale > MAX_COMPONENT || value * scale < MIN_COMPONENT) {
    return err(invalidFrequency(`${label} is out of range: ${value}`));
  }
  return ok(value);
}

/**
 * A periodic frequency used by financial products that have an event every
 * so often, such as every 3 months or every 2 weeks.
 *
 * A frequency is any positive period of days, weeks, months or years, up to
 * 1,000 years. The special {@link Frequency.TERM} value (10,000 years) means
 * there is no subdivision of the whole term, also known as zero-coupon.
 *
 * Months and years are not normalized, so `P12M` and `P1Y` are distinct until
 * {@link Frequency.normalized} is called. Day counts that are a multiple of 7
 * are held as weeks.
 *
 * Instances are immutable. Every factory returns a `Result` instead of
 * throwing.
 */
export class Frequency {
  /** Daily, 364 events per year. */
  static readonly P1D = Frequency.constant(Period.ofDays(1));
  /** Weekly, 52 events per year. */
  static readonly P1W = Frequency.constant(Period.ofWeeks(1), "P1W");
  /** Bi-weekly, 26 events per year. */
  static readonly P2W = Frequency.constant(Period.ofWeeks(2), "P2W");
  /** Lunar, 13 events per year. */
  static readonly P4W = Frequency.constant(Period.ofWeeks(4), "P4W");
  static readonly P13W = Frequency.constant(Period.ofWeeks(13), "P13W");
  static readonly P26W = Frequency.constant(Period.ofWeeks(26), "P26W");
  static readonly P52W = Frequency.constant(Period.ofWeeks(52), "P52W");
  /** Monthly, 12 events per year. */
  static readonly P1M = Frequency.constant(Period.ofMonths(1));
  /** Bi-monthly, 6 events per year. */
  static readonly P2M = Frequency.constant(Period.ofMonths(2));
  /** Quarterly, 4 events per year. */
  static readonly P3M = Frequency.constant(Period.ofMonths(3));
  static readonly P4M = Frequency.constant(Period.ofMonths(4));
  /** Semi-annual, 2 events per year. */
  static readonly P6M = Frequency.constant(Period.ofMonths(6));
  /** Annual, 1 event per year. */
  static readonly P12M = Frequency.constant(Period.ofMonths(12));
  /**
   * No subdivision of the term, represented as 10,000 years so that date
   * arithmetic still lands after the end of any real term.
   */
  static readonly TERM = Frequency.constant(
    Period.ofYears(TERM_YEARS),
    TERM_NAME
  );

  private readonly period: Period;
  private readonly name: string;

  private constructor(period: Period, name: string) {
    this.period = period;
    this.name = name;
  }

  private static constant(period: Period, name = period.toString()) {
    return new Frequency(period, name);
  }

  private static create(
    period: Period,
    name = period.toString()
  ): Result<Frequency, InvalidFrequencyError> {
    if (period.isZero()) {
      return err(invalidFrequency("Period must not be zero"));
    }
    if (period.isNegative()) {
      return err(invalidFrequency("Period must not be negative"));
    }
    return ok(new Frequency(period, name));
  }

  /**
   * Obtains a frequency from a period.
   *
   * A period of days only is passed to {@link Frequency.ofDays}, so a multiple
   * of 7 days becomes weeks. Months are not normalized into years.
   */
  static of(
    period: Period | null | undefined
  ): Result<Frequency, InvalidFrequencyError> {
    if (!period) {
      return err(invalidFrequency("Period must be supplied"));
    }
    const months = period.toTotalMonths();
    if (months === 0 && period.days !== 0) {
      return Frequency.ofDays(period.days);
    }
    if (months > MAX_MONTHS) {
      return err(invalidFrequency("Period must not exceed 1000 years"));
    }
    return Frequency.create(period);
  }

  static ofDays(days: number): Result<Frequency, InvalidFrequencyError> {
    return checkWhole(days, "Days")
      .andThen((count) => checkRange(count, "Days"))
      .andThen((count) =>
        isWholeWeeks(brand<"days">(count))
          ? Frequency.ofWeeks(daysToWeeks(brand<"days">(count)))
          : Frequency.create(Period.ofDays(count))
      );
  }

  static ofWeeks(weeks: number): Result<Frequency, InvalidFrequencyError> {
    return checkWhole(weeks, "Weeks")
      .andThen((count) => checkRange(count, "Weeks", 7))
      .andThen((count) =>
        Frequency.create(Period.ofWeeks(count), `P${count}W`)
      );
  }

  static ofMonths(months: number): Result<Frequency, InvalidFrequencyError> {
    return checkWhole(months, "Months")
      .andThen((count) =>
        count > MAX_MONTHS
          ? err(invalidFrequency("Months must not exceed 12,000"))
          : checkRange(count, "Months")
      )
      .andThen((count) => Frequency.create(Period.ofMonths(count)));
  }

  static ofYears(years: number): Result<Frequency, InvalidFrequencyError> {
    return checkWhole(years, "Years")
      .andThen((count) =>
        count > MAX_YEARS
          ? err(invalidFrequency("Years must not exceed 1,000"))
          : checkRange(count, "Years")
      )
      .andThen((count) => Frequency.create(Period.ofYears(count)));
  }

  /**
   * Parses a frequency such as `P3M`, `2W` or `Term`.
   *
   * The `P` prefix is optional and `Term` is matched ignoring case.
   */
  static parse(
    text: string | null | undefined
  ): Result<Frequency, InvalidFrequencyError> {
    if (text === null || text === undefined) {
      return err(invalidFrequency("Frequency text must be supplied"));
    }
    if (text.toLowerCase() === TERM_NAME.toLowerCase()) {
      return ok(Frequency.TERM);
    }
    const prefixed = /^p/i.test(text) ? text : `P${text}`;
    return Period.parse(prefixed)
      .mapErr((cause) =>
        invalidFrequency(`Unable to parse frequency: '${text}'`, cause)
      )
      .andThen((period) => Frequency.of(period));
  }

  /**
   * Rebuilds a frequency from its period, handing back the shared
   * {@link Frequency.TERM} instance when the period is the term's.
   */
  static resolve(
    period: Period | null | undefined
  ): Result<Frequency, InvalidFrequencyError> {
    if (period && period.equals(Frequency.TERM.period)) {
      return ok(Frequency.TERM);
    }
    return Frequency.of(period);
  }

  static fromJSON(json: string): Result<Frequency, InvalidFrequencyError> {
    return Frequency.parse(json);
  }

  getPeriod(): Period {
    return this.period;
  }

  isTerm(): boolean {
    return (
      this === Frequency.TERM || this.period.equals(Frequency.TERM.period)
    );
  }

  isWeekBased(): boolean {
    return (
      this.period.toTotalMonths() === 0 && isWholeWeeks(this.period.days)
    );
  }

  /**
   * Year-based frequencies count as month-based. There must be no day element.
   */
  isMonthBased(): boolean {
    return (
      this.period.toTotalMonths() > 0 &&
      this.period.days === 0 &&
      !this.isTerm()
    );
  }

  normalized(): Result<Frequency, InvalidFrequencyError> {
    const norm = this.period.normalized();
    return norm !== this.period ? Frequency.of(norm) : ok(this);
  }

  /**
   * Number of times the frequency occurs in a year.
   *
   * Month-based frequencies divide 12 by the total months, so only P1M, P2M,
   * P3M, P4M, P6M and P12M (or P1Y) have a value. Day and week based ones
   * divide 364 by the days. 'Term' has zero events.
   */
  eventsPerYear(): Result<number, InvalidFrequencyError> {
    if (this.isTerm()) {
      return ok(0);
    }
    const months = this.period.toTotalMonths();
    const days = this.period.days;
    if (this.isMonthBased()) {
      if (MONTHS_PER_YEAR % months === 0) {
        return ok(MONTHS_PER_YEAR / months);
      }
    } else if (months === 0 && DAYS_IN_YEAR % days === 0) {
      return ok(DAYS_IN_YEAR / days);
    }
    return err(
      invalidFrequency(`Unable to calculate events per year: ${this.name}`)
    );
  }

  /** Weeks are held as days, so only years, months and days are reported. */
  get(unit: PeriodUnit): number {
    return this.period.get(unit);
  }

  getUnits(): readonly PeriodUnit[] {
    return this.period.getUnits();
  }

  addTo(date: Date): Result<Date, PeriodError> {
    return this.period.addTo(date);
  }

  subtractFrom(date: Date): Result<Date, PeriodError> {
    return this.period.subtractFrom(date);
  }

  equals(other: Frequency | null | undefined): boolean {
    if (other === this) {
      return true;
    }
    return !!other && this.period.equals(other.period);
  }

  hashCode(): number {
    return this.period.hashCode();
  }

  toJSON(): string {
    return this.name;
  }

  toString(): string {
    return this.name;
  }
}
