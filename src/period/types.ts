import type { PeriodErrors } from "./period";

export type PeriodUnit = "years" | "months" | "days";

export type PeriodError = {
  code: PeriodErrors;
  message: string;
};
