import type { PeriodError } from "../period/types";
import type { FrequencyErrors } from "./frequency";

export type InvalidFrequencyError = {
  code: FrequencyErrors.INVALID_FREQUENCY;
  message: string;
  cause?: PeriodError;
};
