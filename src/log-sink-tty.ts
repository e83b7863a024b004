import type { LogEntry, LogFormat, LogSink } from './types.js';

import { createStructuredLogger } from './logging/structured-logger.js';

export interface TtyLogOptions {
  color?: boolean;
  verbose?: boolean;
  traceEngine?: boolean;
  explicitFormat?: LogFormat;
  labels?: Record<string, string>;
}

/**
 * Build the stderr log sink for the CLI. VRB needs `verbose`; TRC needs
 * `traceEngine`. ERR, WRN and FIN always pass.
 */
export function makeTTYLogSink(opts: TtyLogOptions, write?: (s: string) => void): LogSink {
  const writer = typeof write === 'function'
    ? write
    : (s: string) => {
        try {
          process.stderr.write(s);
        } catch {
          // stderr gone; nowhere left to report
        }
      };

  // Interactive terminals get the short console layout unless a format was asked for.
  const format: LogFormat = opts.explicitFormat ?? (process.stderr.isTTY ? 'console' : 'logfmt');
  if (format === 'none') return () => undefined;

  const logger = createStructuredLogger({
    format,
    color: opts.color ?? process.stderr.isTTY,
    verbose: opts.verbose === true,
    writer,
    labels: opts.labels,
  });

  return (entry: LogEntry) => {
    if (entry.severity === 'VRB' && opts.verbose !== true) return;
    if (entry.severity === 'TRC' && opts.traceEngine !== true) return;
    logger.emit(entry);
  };
}
