import "dotenv/config";

export const DEFAULT_FREQUENCIES = "P1D,P1W,P2W,P1M,P3M,P6M,P12M,Term";

export const FREQUENCIES = (process.env.FREQUENCIES || DEFAULT_FREQUENCIES)
  .split(",")
  .map((entry) => entry.trim())
  .filter((entry) => entry.length > 0);
// Defaults to today when unset
export const REFERENCE_DATE = process.env.REFERENCE_DATE;
