import {
  RETURNING_REPORT_HEADER,
  ReturningReportRow,
  StatusReportRow,
} from '../../types/ReportTypes';
import { SUPPORTER_CADENCES, SUPPORTER_STATUS_ORDER } from '../../types/SupporterTypes';

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvLine(values: readonly (string | number)[]): string {
  return values.map(csvField).join(',');
}

export function returningReportToCsv(rows: readonly ReturningReportRow[]): string {
  const lines = [
    csvLine(RETURNING_REPORT_HEADER),
    ...rows.map((row) => csvLine([row.month, row.totalNew, ...row.expiredByBucket])),
  ];
  return `${lines.join('\n')}\n`;
}

/** Header: Month, then "<Cadence> <Status>" for Annual then Monthly. */
export function statusReportHeader(): string[] {
  const columns = ['Month'];
  for (const cadence of SUPPORTER_CADENCES) {
    for (const status of SUPPORTER_STATUS_ORDER) {
      columns.push(`${cadence} ${status}`);
    }
  }
  return columns;
}

export function statusReportToCsv(rows: readonly StatusReportRow[]): string {
  const lines = [
    csvLine(statusReportHeader()),
    ...rows.map((row) => csvLine([
      row.month,
      ...SUPPORTER_CADENCES.flatMap((cadence) =>
        SUPPORTER_STATUS_ORDER.map((status) => row.counts[cadence][status])
      ),
    ])),
  ];
  return `${lines.join('\n')}\n`;
}
