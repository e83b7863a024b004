import type { StructuredLogEvent } from './structured-log-event.js';

import { ANSI_RESET, COLOR_BY_SEVERITY } from './logfmt.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const DIRECTION_ARROWS: Record<StructuredLogEvent['direction'], string> = {
  request: '→',
  response: '←',
};

export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const prefix = `${event.severity} ${DIRECTION_ARROWS[event.direction]} [${event.remoteIdentifier}]`;
  const labels = options.verbose === true
    ? Object.entries(event.labels).map(([key, value]) => `${key}=${value}`).join(' ')
    : '';
  const head = options.color === true ? `${COLOR_BY_SEVERITY[event.severity]}${prefix}${ANSI_RESET}` : prefix;
  let output = labels.length > 0 ? `${head} ${event.message} (${labels})` : `${head} ${event.message}`;

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
