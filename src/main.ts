import { FREQUENCIES, REFERENCE_DATE } from "./report/config";
import { FrequencyReportClient } from "./report/client";

const frequencyReportClient = new FrequencyReportClient(FREQUENCIES);

function main() {
  const referenceDate =
    frequencyReportClient.parseReferenceDate(REFERENCE_DATE);

  if (referenceDate.isErr()) {
    console.error(
      `Invalid REFERENCE_DATE '${REFERENCE_DATE}', expected YYYY-MM-DD`
    );
    process.exitCode = 1;
    return;
  }

  const { value: report } =
    frequencyReportClient.buildReport(referenceDate.value);

  for (const { input, reason } of report.rejected) {
    console.error(`Skipping '${input}': ${reason}`);
  }

  console.log(`Frequencies from ${report.referenceDate}:`);

  console.table(
    report.rows.map((row) => ({
      Frequency: row.frequency,
      Normalized: row.normalized,
      "Week based": row.weekBased,
      "Month based": row.monthBased,
      "Events per year": row.eventsPerYear ?? "-",
      Next: row.next,
      Previous: row.previous,
    }))
  );
}

main();
