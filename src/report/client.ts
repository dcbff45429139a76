import { format, isValid, parse } from "date-fns";
import { err, ok, type Ok, type Result } from "neverthrow";
import { Frequency } from "../frequency/frequency";
import type { FrequencyReport, FrequencyReportRow } from "./types";

export enum FrequencyReportErrors {
  INVALID_REFERENCE_DATE = "INVALID_REFERENCE_DATE",
}

// Signed year so dates before year 1 keep their sign
const DATE_FORMAT = "uuuu-MM-dd";
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export class FrequencyReportClient {
  private readonly frequencies: readonly string[];

  constructor(frequencies: readonly string[]) {
    this.frequencies = frequencies;
  }

  public parseReferenceDate(
    text: string | undefined,
    today: Date = new Date()
  ): Result<Date, FrequencyReportErrors> {
    if (!text) {
      return ok(
        new Date(today.getFullYear(), today.getMonth(), today.getDate())
      );
    }
    if (!DATE_PATTERN.test(text)) {
      return err(FrequencyReportErrors.INVALID_REFERENCE_DATE);
    }
    const date = parse(text, DATE_FORMAT, today);
    if (!isValid(date)) {
      return err(FrequencyReportErrors.INVALID_REFERENCE_DATE);
    }
    return ok(date);
  }

  public buildReport(referenceDate: Date): Ok<FrequencyReport, never> {
    const report: FrequencyReport = {
      referenceDate: format(referenceDate, DATE_FORMAT),
      rows: [],
      rejected: [],
    };

    for (const input of this.frequencies) {
      const frequency = Frequency.parse(input);

      if (frequency.isErr()) {
        report.rejected.push({ input, reason: frequency.error.message });
        continue;
      }

      report.rows.push(this.describe(frequency.value, referenceDate));
    }

    return ok(report);
  }

  private describe(
    frequency: Frequency,
    referenceDate: Date
  ): FrequencyReportRow {
    const formatDate = (date: Date) => format(date, DATE_FORMAT);

    return {
      frequency: frequency.toString(),
      normalized: frequency
        .normalized()
        .match(String, () => frequency.toString()),
      weekBased: frequency.isWeekBased(),
      monthBased: frequency.isMonthBased(),
      eventsPerYear: frequency.eventsPerYear().unwrapOr(null),
      next: frequency
        .addTo(referenceDate)
        .match(formatDate, (error) => error.code),
      previous: frequency
        .subtractFrom(referenceDate)
        .match(formatDate, (error) => error.code),
    };
  }
}
