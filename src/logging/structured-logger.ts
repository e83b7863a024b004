import type { LogEntry, LogFormat } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent, type BuildStructuredEventOptions } from './structured-log-event.js';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  writer?: (line: string) => void;
}

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly color: boolean;
  private readonly verbose: boolean;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.color = options.color ?? false;
    this.verbose = options.verbose ?? false;
    const writer = options.writer ?? defaultWriter;
    const format = options.format ?? 'logfmt';

    if (format === 'logfmt') {
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color: this.color })}\n`);
      });
    }
    if (format === 'json') {
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
    if (format === 'console') {
      this.sinks.push((event) => {
        writer(`${formatConsole(event, { color: this.color, verbose: this.verbose })}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    const options: BuildStructuredEventOptions = { labels: this.labels };
    const event = buildStructuredLogEvent(entry, options);
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr gone; nowhere left to report
  }
}

export function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('remote', event.remoteIdentifier);
  push('fatal', event.fatal);
  push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
