import type { ParsedState, ParsedValue, StrState, Trace } from './types.js';

import { parserCaches } from './parser-cache.js';

const NUMERIC_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

function coerce(raw: string): ParsedValue {
  if (raw === 'TRUE') return true;
  if (raw === 'FALSE') return false;
  if (NUMERIC_LITERAL.test(raw)) {
    const parsed = Number(raw);
    if (Number.isFinite(parsed)) return parsed;
  }
  return raw;
}

/**
 * Display-only typing of an engine literal: `TRUE`/`FALSE` become booleans,
 * decimal literals become numbers, everything else (words, enums, ranges) stays text.
 */
export function coerceValue(raw: string): ParsedValue {
  const cached = parserCaches.values.get(raw);
  if (cached !== undefined) return cached;
  const value = coerce(raw);
  parserCaches.values.set(raw, value);
  return value;
}

export function parseState(state: StrState): ParsedState {
  return Object.fromEntries(Object.entries(state).map(([name, raw]) => [name, coerceValue(raw)]));
}

export function fullStates(trace: Pick<Trace, 'states'>): StrState[] {
  return trace.states.reduce<StrState[]>((acc, delta) => {
    const previous = acc.length > 0 ? acc[acc.length - 1] : {};
    acc.push({ ...previous, ...delta });
    return acc;
  }, []);
}

export function parsedStates(trace: Pick<Trace, 'states'>, opts?: { full?: boolean }): ParsedState[] {
  const source = opts?.full === true ? fullStates(trace) : trace.states;
  return source.map((state) => parseState(state));
}

export function selectStates(trace: Pick<Trace, 'states'>, opts?: { full?: boolean; parse?: boolean }): (StrState | ParsedState)[] {
  if (opts?.parse === true) return parsedStates(trace, opts);
  return opts?.full === true ? fullStates(trace) : trace.states;
}
