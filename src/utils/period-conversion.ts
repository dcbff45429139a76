import type { BrandedNumber } from "../shared/types";
import type { Months, Years, Weeks, Days } from "../shared/types";

export const MONTHS_PER_YEAR = 12;
export const DAYS_PER_WEEK = 7;

export function brand<T>(value: number): BrandedNumber<T> {
  return value as BrandedNumber<T>;
}

export function yearsToMonths(years: Years): Months {
  return brand<"months">(years * MONTHS_PER_YEAR);
}

// Whole years are carried out of the month count, truncating toward zero.
export function splitMonths(totalMonths: Months): {
  years: Years;
  months: Months;
} {
  return {
    years: brand<"years">(Math.trunc(totalMonths / MONTHS_PER_YEAR) || 0),
    months: brand<"months">(totalMonths % MONTHS_PER_YEAR || 0),
  };
}

export function weeksToDays(weeks: Weeks): Days {
  return brand<"days">(weeks * DAYS_PER_WEEK);
}

export function isWholeWeeks(days: Days): boolean {
  return days % DAYS_PER_WEEK === 0;
}

export function daysToWeeks(days: Days): Weeks {
  return brand<"weeks">(days / DAYS_PER_WEEK);
}
