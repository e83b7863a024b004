import type { Verdict } from './outcome/types.js';

import { isEngineError } from './errors.js';

export const EXIT_CODES = {
  success: 0,
  uncaught: 1,
  usage: 2,
  inconclusive: 5,
  internal: 6,
  failed: 10,
  timeout: 124,
  interrupted: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForVerdict(verdict: Verdict | undefined): ExitCode {
  switch (verdict) {
    case 'false':
      return EXIT_CODES.failed;
    case 'unknown':
      return EXIT_CODES.inconclusive;
    default:
      return EXIT_CODES.success;
  }
}

export function exitCodeForError(error: unknown): ExitCode {
  if (!isEngineError(error)) return EXIT_CODES.uncaught;
  if (error.kind === 'timeout') return EXIT_CODES.timeout;
  if (error.kind === 'config_error') return EXIT_CODES.usage;
  return EXIT_CODES.internal;
}
