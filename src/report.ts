import type { RenderTraceOptions } from './outcome/render.js';
import type { Outcome } from './outcome/types.js';
import type { SimulationRecorder } from './session/simulation-recorder.js';
import type { OutputFormat } from './types.js';

import { encodeOutcomes, encodeTrace } from './outcome/codec.js';
import { overallVerdict } from './outcome/outcome.js';
import { outcomeMessage, renderOutcome, renderTrace } from './outcome/render.js';
import { selectStates } from './outcome/values.js';

export interface ReportOptions extends RenderTraceOptions {
  format: OutputFormat;
}

export function formatOutcomes(outcomes: readonly Outcome[], opts: ReportOptions): string {
  if (opts.format === 'json') return encodeOutcomes(outcomes);
  if (outcomes.length === 0) return 'no property was checked';
  return outcomes.map((outcome) => renderOutcome(outcome, opts).join('\n')).join('\n\n');
}

export function summarizeOutcomes(outcomes: readonly Outcome[]): string {
  const verdict = overallVerdict(outcomes);
  if (verdict === undefined) return 'no property was checked';
  return outcomes.map((outcome) => outcomeMessage(outcome)).join('; ');
}

/**
 * Simulation result. In JSON the states follow `full`/`parse` as in text; the
 * encoded trace always carries the raw per-step states.
 */
export function formatSimulation(
  recorder: SimulationRecorder,
  opts: ReportOptions & { interrupted?: boolean }
): string {
  const trace = recorder.toTrace();
  if (opts.format === 'json') {
    return JSON.stringify({
      satisfiable: recorder.satisfiable,
      interrupted: opts.interrupted === true,
      states: selectStates(trace, opts),
      trace: encodeTrace(trace),
    }, null, 2);
  }
  const lines = renderTrace(trace, opts);
  if (!recorder.satisfiable) lines.push('-- simulation cannot be extended under the constraint');
  if (opts.interrupted === true) lines.push('-- simulation interrupted');
  return lines.join('\n');
}
