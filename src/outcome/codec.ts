import { z } from 'zod';

import type { Outcome, Trace } from './types.js';

import { ParseError } from '../errors.js';

const EncodedTraceSchema = z.object({
  description: z.string(),
  type: z.string(),
  states: z.array(z.record(z.string(), z.string())),
  loopIndexes: z.array(z.number().int().nonnegative()),
});

const EncodedOutcomeSchema = z.object({
  logic: z.string(),
  specification: z.string(),
  verdict: z.enum(['true', 'false', 'unknown']),
  trace: EncodedTraceSchema.nullable(),
});

export type EncodedTrace = z.infer<typeof EncodedTraceSchema>;
export type EncodedOutcome = z.infer<typeof EncodedOutcomeSchema>;

export function encodeTrace(trace: Trace): EncodedTrace {
  return {
    description: trace.description,
    type: trace.type,
    states: trace.states.map((state) => ({ ...state })),
    loopIndexes: [...trace.loopIndexes],
  };
}

/** Machine-readable form of an outcome. The raw transcript is left out. */
export function encodeOutcome(outcome: Outcome): EncodedOutcome {
  return {
    logic: outcome.logic,
    specification: outcome.specification,
    verdict: outcome.verdict,
    trace: outcome.trace === undefined ? null : encodeTrace(outcome.trace),
  };
}

function decodeTrace(encoded: EncodedTrace): Trace {
  const loopIndexes = [...new Set(encoded.loopIndexes)].sort((a, b) => a - b);
  const outOfRange = loopIndexes.find((idx) => idx >= encoded.states.length);
  if (outOfRange !== undefined) {
    throw new ParseError(`loop index ${String(outOfRange)} is outside a trace of ${String(encoded.states.length)} states`);
  }
  return { description: encoded.description, type: encoded.type, states: encoded.states, loopIndexes };
}

export function decodeOutcome(value: unknown): Outcome {
  const parsed = EncodedOutcomeSchema.safeParse(value);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('; ');
    throw new ParseError(`invalid encoded outcome: ${msgs}`);
  }
  const { logic, specification, verdict, trace } = parsed.data;
  if (verdict === 'false') {
    if (trace === null) throw new ParseError('encoded outcome with verdict "false" has no trace');
    return { logic, specification, verdict, trace: decodeTrace(trace), unparsed: '' };
  }
  if (trace !== null) throw new ParseError(`encoded outcome with verdict "${verdict}" carries a trace`);
  return { logic, specification, verdict, unparsed: '' };
}

export function encodeOutcomes(outcomes: readonly Outcome[]): string {
  return JSON.stringify(outcomes.map((outcome) => encodeOutcome(outcome)), null, 2);
}

export function decodeOutcomes(json: string): Outcome[] {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (e) {
    throw new ParseError(`invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!Array.isArray(value)) throw new ParseError('encoded outcomes must be a JSON array');
  return value.map((entry) => decodeOutcome(entry));
}
