import type { Outcome, Trace } from './types.js';

import { LOOP_MARKER, TRACE_DESCRIPTION_LABEL } from './trace.js';
import { VERDICT_LABELS } from './types.js';
import { selectStates } from './values.js';

export interface RenderTraceOptions {
  /** Print every variable at every step instead of the per-step changes. */
  full?: boolean;
  /** Print typed values (booleans, numbers) instead of engine literals. */
  parse?: boolean;
}

const orNa = (value: string): string => (value.length > 0 ? value : 'N/A');

export function outcomeMessage(outcome: Pick<Outcome, 'verdict' | 'specification' | 'logic'>): string {
  return `VERIFICATION ${VERDICT_LABELS[outcome.verdict]} for ${outcome.specification} (${orNa(outcome.logic)})`;
}

// Same layout the engine prints, so the text parses back with parseTrace.
export function renderTrace(trace: Trace, opts: RenderTraceOptions = {}): string[] {
  const lines = [
    `${TRACE_DESCRIPTION_LABEL} ${orNa(trace.description)}`,
    `Trace Type: ${orNa(trace.type)}`,
  ];
  const loops = new Set(trace.loopIndexes);
  selectStates(trace, opts).forEach((state, idx) => {
    if (loops.has(idx)) lines.push(`  ${LOOP_MARKER}`);
    lines.push(`  -> State: 1.${String(idx + 1)} <-`);
    Object.entries(state).forEach(([name, value]) => {
      lines.push(`    ${name} = ${String(value)}`);
    });
  });
  return lines;
}

export function renderOutcome(outcome: Outcome, opts: RenderTraceOptions = {}): string[] {
  const lines = [outcomeMessage(outcome)];
  if (outcome.trace !== undefined) lines.push(...renderTrace(outcome.trace, opts));
  return lines;
}
