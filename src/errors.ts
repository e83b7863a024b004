import type { PreconditionKind } from './types.js';

export type EngineErrorKind =
  | 'tool_not_found'
  | 'timeout'
  | 'precondition'
  | 'fault'
  | 'parse_error'
  | 'model_load'
  | 'session_closed'
  | 'session_busy'
  | 'config_error';

export interface EngineErrorMeaning {
  executed: boolean;
  summary: string;
}

export const ENGINE_ERROR_KIND_MEANINGS: Record<EngineErrorKind, EngineErrorMeaning> = {
  tool_not_found: {
    executed: false,
    summary: 'Engine executable is not on the search path.',
  },
  timeout: {
    executed: true,
    summary: 'Engine did not reach a synchronization marker before the deadline; the computation was interrupted.',
  },
  precondition: {
    executed: true,
    summary: 'Engine refused the command until a warm-up step is performed.',
  },
  fault: {
    executed: true,
    summary: 'Engine reported a fatal condition.',
  },
  parse_error: {
    executed: true,
    summary: 'Engine output did not have the expected shape.',
  },
  model_load: {
    executed: true,
    summary: 'Model could not be read or compiled.',
  },
  session_closed: {
    executed: false,
    summary: 'Engine process is gone.',
  },
  session_busy: {
    executed: false,
    summary: 'Another command is still waiting for engine output.',
  },
  config_error: {
    executed: false,
    summary: 'Driver configuration is missing or invalid.',
  },
};

export class EngineError extends Error {
  readonly kind: EngineErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: EngineErrorKind, message: string, opts?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'EngineError';
    this.kind = kind;
    if (opts?.details !== undefined) {
      this.details = opts.details;
    }
  }
}

export class ToolNotFoundError extends EngineError {
  readonly executable: string;

  constructor(executable: string) {
    super('tool_not_found', `${executable} not in PATH`);
    this.name = 'ToolNotFoundError';
    this.executable = executable;
  }
}

export class BackendTimeoutError extends EngineError {
  readonly timeoutMs: number;
  readonly partialOutput: string;

  constructor(timeoutMs: number, partialOutput: string) {
    super('timeout', `engine did not answer within ${String(timeoutMs)} ms`);
    this.name = 'BackendTimeoutError';
    this.timeoutMs = timeoutMs;
    this.partialOutput = partialOutput;
  }
}

export class RecoverablePreconditionError extends EngineError {
  readonly precondition: PreconditionKind;
  readonly lines: string[];

  constructor(precondition: PreconditionKind, lines: string[]) {
    super('precondition', lines.join('\n'));
    this.name = 'RecoverablePreconditionError';
    this.precondition = precondition;
    this.lines = lines;
  }
}

// Only the offending lines travel with the error, never the whole transcript.
export class BackendFaultError extends EngineError {
  readonly lines: string[];

  constructor(lines: string[], opts?: { cause?: unknown }) {
    super('fault', lines.join('\n'), opts);
    this.name = 'BackendFaultError';
    this.lines = lines;
  }

  static fromPrecondition(err: RecoverablePreconditionError): BackendFaultError {
    return new BackendFaultError(err.lines, { cause: err });
  }
}

export class ParseError extends EngineError {
  constructor(message: string, excerpt?: string) {
    super('parse_error', message, excerpt !== undefined ? { details: { excerpt } } : undefined);
    this.name = 'ParseError';
  }
}

export class ModelLoadError extends EngineError {
  readonly modelPath: string;

  constructor(modelPath: string, cause: unknown) {
    super('model_load', `failed to load ${modelPath}: ${normalizeErrorMessage(cause)}`, { cause });
    this.name = 'ModelLoadError';
    this.modelPath = modelPath;
  }
}

export const isEngineError = (value: unknown): value is EngineError =>
  value instanceof EngineError;

export const isRecoverablePrecondition = (value: unknown): value is RecoverablePreconditionError =>
  value instanceof RecoverablePreconditionError;

export const normalizeErrorMessage = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};

export const toEngineError = (
  value: unknown,
  fallbackKind: EngineErrorKind = 'fault'
): EngineError => {
  if (isEngineError(value)) return value;
  return new EngineError(fallbackKind, normalizeErrorMessage(value), { cause: value });
};
