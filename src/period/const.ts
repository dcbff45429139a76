import type { PeriodUnit } from "./types";

// Components are held in the signed 32-bit range
export const MAX_COMPONENT = 2_147_483_647;
export const MIN_COMPONENT = -2_147_483_648;

export const PERIOD_UNITS: readonly PeriodUnit[] = ["years", "months", "days"];

export const PERIOD_PATTERN =
  /^([-+]?)P(?:([-+]?[0-9]+)Y)?(?:([-+]?[0-9]+)M)?(?:([-+]?[0-9]+)W)?(?:([-+]?[0-9]+)D)?$/i;
