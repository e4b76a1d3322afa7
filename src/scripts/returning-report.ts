#!/usr/bin/env node
/**
 * Returning Report Script
 *
 * Prints a CSV report of supporters who returned (or, with --report status,
 * status counts per cadence) for each month in a range.
 *
 * Usage:
 *   npm run report -- [--start-month YYYY-MM] [--end-month YYYY-MM] [--report returning|status]
 *
 * Defaults: start = earliest payment date, end = today.
 *
 * Environment variables (from .env file):
 *   - PAYMENTS_TABLE_NAME
 *   - AWS_REGION
 *   - TIE_BREAK (insertion | program)
 *   - LOST_THRESHOLD_DAYS
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '../services/core/Logger';
import { TraceService } from '../services/core/TraceService';
import { DynamoPaymentStore } from '../services/payments/DynamoPaymentStore';
import { PaymentStore } from '../services/payments/PaymentStore';
import { StatusEngine } from '../services/lifecycle/StatusEngine';
import { SupporterReportService } from '../services/reporting/SupporterReportService';
import { parseReportArgv, resolveReportRange } from '../services/reporting/ReportArguments';
import { getReportConfig } from '../config/reportConfig';
import { createDocumentClient } from '../utils/aws-client-config';
import { ReportArgumentError } from '../types/ReportErrors';

export interface ReportScriptDeps {
  paymentStore?: PaymentStore;
  write?: (chunk: string) => void;
  logger?: Logger;
}

/**
 * Returns the process exit code: 0 on success, 2 on argument errors.
 * Other failures are rethrown.
 */
export async function main(argv: readonly string[], deps: ReportScriptDeps = {}): Promise<number> {
  // stdout carries the CSV; diagnostics go to stderr.
  const logger = deps.logger ?? new Logger('ReturningReport', new TraceService().createContext(), { sink: 'stderr' });
  const write = deps.write ?? ((chunk: string) => { process.stdout.write(chunk); });

  try {
    const request = parseReportArgv(argv);
    const config = getReportConfig();
    const paymentStore = deps.paymentStore ?? new DynamoPaymentStore(
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

    const range = await resolveReportRange(request, paymentStore);
    write(await reportService.generateCsv(range));
    return 0;
  } catch (error) {
    if (error instanceof ReportArgumentError) {
      console.error(`returning-report: error: ${error.message}`);
      return 2;
    }
    throw error;
  }
}

if (require.main === module) {
  // Load environment variables from .env file if it exists
  const envPath = path.join(__dirname, '../../.env');
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }

  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`returning-report: fatal: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    });
}
