/**
 * Payment and report input schemas (zod)
 *
 * Stored items and handler events arrive untyped; these schemas are the only
 * way they enter typed code.
 */

import { z } from 'zod';

const IsoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD');
const IsoMonthString = z.string().regex(/^\d{4}-\d{2}$/, 'month must be YYYY-MM');

/** Payment item as read from the payments table. */
export const PaymentRecordSchema = z.object({
  entity: z.string().min(1, 'entity is required'),
  date: IsoDateString,
  payee: z.string().default(''),
  program: z.string().nullable().default(null),
  amount: z.string().default(''),
});

export const ReportKindEnum = z.enum(['returning', 'status']);
export type ReportKind = z.infer<typeof ReportKindEnum>;

/** Report request (CLI flags or handler event). Defaults are applied later. */
export const ReportRequestSchema = z.object({
  startMonth: IsoMonthString.optional(),
  endMonth: IsoMonthString.optional(),
  report: ReportKindEnum.default('returning'),
}).strict();

export type ReportRequest = z.infer<typeof ReportRequestSchema>;
