import { v4 as uuidv4 } from 'uuid';
import { TraceContext } from '../../types/CommonTypes';

/**
 * TraceService - Trace ID generation for report runs
 */
export class TraceService {
  /**
   * Generate a new trace ID
   */
  generateTraceId(): string {
    return `trace-${Date.now()}-${uuidv4()}`;
  }

  /**
   * Create trace context for a report run, reusing an incoming trace ID if any
   */
  createContext(existingTraceId?: string, month?: string): TraceContext {
    return {
      traceId: existingTraceId || this.generateTraceId(),
      ...(month ? { month } : {}),
    };
  }
}
