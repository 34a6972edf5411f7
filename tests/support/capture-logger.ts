import { StructuredLogger } from '../../src/index';
import type { LogLevel, LogRecord, Logger } from '../../src/index';

/** A StructuredLogger whose records land in an array. */
export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = new StructuredLogger({
    level,
    sink:   (record) => records.push(record),
    nowIso: () => '2026-01-01T00:00:00.000Z',
  });
  return { logger, records };
}
