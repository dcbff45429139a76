import { MONTHS_PER_YEAR } from "../utils/period-conversion";

// Artificial maximum length of an ordinary frequency
export const MAX_YEARS = 1_000;
export const MAX_MONTHS = MAX_YEARS * MONTHS_PER_YEAR;

// Length of the 'Term' frequency, far beyond any real trade
export const TERM_YEARS = 10_000;
export const TERM_NAME = "Term";

// Day count of a year when deriving events per year from days
export const DAYS_IN_YEAR = 364;
