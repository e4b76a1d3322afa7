/**
 * Common types used across the system
 */

export interface TraceContext {
  traceId: string;
  entity?: string;
  month?: string;
}
