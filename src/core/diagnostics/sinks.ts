/**
 * Diagnostics sinks: where recorded warnings and trace records end up.
 */
import type { ErrorCode, HydrateError } from '../../utils/errors.js';
import { logger, type Logger } from '../../utils/logger.js';
import type { DiagnosticsSink, TraceRecord, TraceSink } from '../nodes/types.js';

/**
 * Keeps every recorded warning in memory.
 */
export class WarningCollector implements DiagnosticsSink {
  private readonly recorded: HydrateError[] = [];

  record(warning: HydrateError): void {
    this.recorded.push(warning);
  }

  get warnings(): readonly HydrateError[] {
    return this.recorded;
  }

  byCode(code: ErrorCode): HydrateError[] {
    return this.recorded.filter((w) => w.code === code);
  }

  clear(): void {
    this.recorded.length = 0;
  }
}

/**
 * Forwards warnings to a logger at warn level.
 */
export class LoggerSink implements DiagnosticsSink {
  constructor(private readonly log: Logger = logger.child('hydrate')) {}

  record(warning: HydrateError): void {
    this.log.warn(`${warning.name} ${warning.code}: ${warning.message}`, warning.details);
  }
}

/**
 * Passes each warning on, then throws it.
 */
export class StrictSink implements DiagnosticsSink {
  constructor(private readonly inner: DiagnosticsSink) {}

  record(warning: HydrateError): never {
    this.inner.record(warning);
    throw warning;
  }
}

/**
 * Default trace sink: a debug-level `hydrate:trace` logger.
 */
export function createLoggerTrace(log: Logger = logger.child('hydrate').child('trace')): TraceSink {
  log.setLevel('debug');
  return (record: TraceRecord) => {
    const label = record.operation === 'get' ? 'Get' : 'Call';
    const data = record.output === undefined ? undefined : { output: record.output };
    log.debug(`${record.nodeKind} :: ${label} == ${String(record.key)} :: Depth == ${record.depth}`, data);
  };
}
