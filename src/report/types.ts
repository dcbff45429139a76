export type FrequencyReportRow = {
  frequency: string;
  normalized: string;
  weekBased: boolean;
  monthBased: boolean;
  eventsPerYear: number | null;
  next: string;
  previous: string;
};

export type FrequencyReport = {
  referenceDate: string;
  rows: FrequencyReportRow[];
  rejected: { input: string; reason: string }[];
};
