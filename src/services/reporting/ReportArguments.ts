/**
 * Report arguments: flag parsing, validation and range defaults
 *
 * Defaults (earliest payment, today) are resolved here and passed to the
 * report explicitly; the engine never reads them itself.
 */

import { MonthDate } from '../calendar/MonthDate';
import { PaymentStore } from '../payments/PaymentStore';
import { ReportKind, ReportRequest, ReportRequestSchema } from '../../types/PaymentSchemas';
import { ReportArgumentError } from '../../types/ReportErrors';

export interface ReportRange {
  start: MonthDate;
  end: MonthDate;
  report: ReportKind;
}

export const REPORT_USAGE =
  'Usage: returning-report [--start-month YYYY-MM] [--end-month YYYY-MM] [--report returning|status]';

const FLAG_TO_FIELD: Record<string, 'startMonth' | 'endMonth' | 'report'> = {
  '--start-month': 'startMonth',
  '--end-month': 'endMonth',
  '--report': 'report',
};

/** Validate a request object (handler event or parsed flags). */
export function validateReportRequest(input: unknown): ReportRequest {
  const result = ReportRequestSchema.safeParse(input ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
      .join('; ');
    throw new ReportArgumentError(`Invalid report arguments: ${detail}`);
  }
  return result.data;
}

/**
 * Parse `--flag value` and `--flag=value` forms.
 */
export function parseReportArgv(argv: readonly string[]): ReportRequest {
  const raw: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const field = FLAG_TO_FIELD[flag];
    if (!field) {
      throw new ReportArgumentError(`Unknown argument: ${arg}. ${REPORT_USAGE}`, 'UNKNOWN_ARGUMENT');
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < argv.length) {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === '') {
      throw new ReportArgumentError(`Missing value for ${flag}. ${REPORT_USAGE}`, 'MISSING_VALUE');
    }
    raw[field] = value;
  }

  return validateReportRequest(raw);
}

function parseMonthArgument(name: string, value: string): MonthDate {
  try {
    return MonthDate.parseMonth(value);
  } catch (error) {
    throw new ReportArgumentError(
      `Invalid ${name}: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_MONTH'
    );
  }
}

/**
 * Apply defaults: start = earliest payment date, end = today.
 */
export async function resolveReportRange(
  request: ReportRequest,
  paymentStore: PaymentStore,
  today: MonthDate = MonthDate.today()
): Promise<ReportRange> {
  let start: MonthDate;
  if (request.startMonth !== undefined) {
    start = parseMonthArgument('start month', request.startMonth);
  } else {
    const earliest = await paymentStore.earliestPaymentDate();
    if (!earliest) {
      throw new ReportArgumentError('No payments recorded; a start month is required', 'NO_PAYMENTS');
    }
    start = earliest;
  }

  const end = request.endMonth !== undefined
    ? parseMonthArgument('end month', request.endMonth)
    : today;

  if (end.isBefore(start)) {
    throw new ReportArgumentError('End month predates start month', 'END_BEFORE_START');
  }

  return { start, end, report: request.report };
}
