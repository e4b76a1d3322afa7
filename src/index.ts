/**
 * Supporter Lifecycle
 *
 * Library entry point. Production execution happens via:
 * - returning-report Lambda handler (handlers/reporting)
 * - returning-report CLI (scripts/returning-report.ts)
 */

export { MonthDate, MONTH_MAX_DAY } from './services/calendar/MonthDate';
export { calculateLapseDate } from './services/lifecycle/LapseCalculator';
export { cadenceFromProgram, programHasCadence, resolveCadence } from './services/lifecycle/CadenceResolver';
export { PaymentHistory } from './services/lifecycle/PaymentHistory';
export {
  StatusEngine,
  StatusEngineConfig,
  isInCurrentMonthWindow,
  DEFAULT_LOST_THRESHOLD_DAYS,
  DEFAULT_LAPSED_THRESHOLD_DAYS,
} from './services/lifecycle/StatusEngine';
export { PaymentStore, toPayment } from './services/payments/PaymentStore';
export { DynamoPaymentStore, PaymentsDocumentClient } from './services/payments/DynamoPaymentStore';
export { SupporterService, SupporterServiceConfig } from './services/supporters/SupporterService';
export {
  SupporterReportService,
  SupporterReportServiceConfig,
  expiryBucket,
  iterateMonths,
} from './services/reporting/SupporterReportService';
export { returningReportToCsv, statusReportToCsv, statusReportHeader } from './services/reporting/ReportCsv';
export {
  ReportRange,
  REPORT_USAGE,
  parseReportArgv,
  resolveReportRange,
  validateReportRequest,
} from './services/reporting/ReportArguments';
export { Logger, LogMeta, LoggerOptions } from './services/core/Logger';
export { TraceService } from './services/core/TraceService';
export { ReportConfig, getReportConfig, setReportConfig } from './config/reportConfig';
export * from './types/SupporterTypes';
export * from './types/ReportTypes';
export * from './types/ReportErrors';
export * from './types/PaymentSchemas';
export { TraceContext } from './types/CommonTypes';
