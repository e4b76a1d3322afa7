/**
 * Returning Report Handler
 *
 * Lambda handler that renders a monthly supporter report as CSV.
 *
 * Event: { startMonth?: 'YYYY-MM', endMonth?: 'YYYY-MM', report?: 'returning' | 'status', traceId? }
 * - startMonth defaults to the earliest payment date, endMonth to today
 * - invalid arguments → 400; store failures are logged and rethrown
 */

import { Context } from 'aws-lambda';
import { Logger } from '../../services/core/Logger';
import { TraceService } from '../../services/core/TraceService';
import { DynamoPaymentStore } from '../../services/payments/DynamoPaymentStore';
import { StatusEngine } from '../../services/lifecycle/StatusEngine';
import { SupporterReportService } from '../../services/reporting/SupporterReportService';
import { resolveReportRange, validateReportRequest } from '../../services/reporting/ReportArguments';
import { getReportConfig } from '../../config/reportConfig';
import { createDocumentClient } from '../../utils/aws-client-config';
import { ReportArgumentError } from '../../types/ReportErrors';

export interface ReturningReportEvent {
  startMonth?: string;
  endMonth?: string;
  report?: string;
  traceId?: string;
}

export interface ReturningReportResult {
  statusCode: number;
  headers?: Record<string, string>;
  body: string;
}

export async function handler(event: ReturningReportEvent, context?: Context): Promise<ReturningReportResult> {
  const { traceId: incomingTraceId, ...request } = event;
  const traceContext = new TraceService().createContext(incomingTraceId);
  const logger = new Logger('ReturningReportHandler', traceContext);

  logger.info('Report requested', { request, requestId: context?.awsRequestId });

  try {
    const config = getReportConfig();
    const paymentStore = new DynamoPaymentStore(
      createDocumentClient(config.region),
      config.paymentsTableName,
      logger
    );
    const reportService = new SupporterReportService({
      logger,
      paymentStore,
      statusEngine: new StatusEngine({ lostThresholdDays: config.lostThresholdDays }),
      tieBreak: config.tieBreak,
    });

    const range = await resolveReportRange(validateReportRequest(request), paymentStore);
    const csv = await reportService.generateCsv(range);

    return {
      statusCode: 200,
      headers: { 'Content-Type': 'text/csv', 'X-Trace-Id': traceContext.traceId },
      body: csv,
    };
  } catch (error) {
    if (error instanceof ReportArgumentError) {
      logger.warn('Invalid report request', { error: error.message, error_code: error.error_code });
      return {
        statusCode: 400,
        body: JSON.stringify({
          success: false,
          error: error.message,
          error_code: error.error_code,
          traceId: traceContext.traceId,
        }),
      };
    }
    logger.error('Report generation failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
