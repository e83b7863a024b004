export type Verdict = 'true' | 'false' | 'unknown';

/** Variable name to the literal text the engine printed for it. */
export type StrState = Record<string, string>;

export type ParsedValue = boolean | number | string;

export type ParsedState = Record<string, ParsedValue>;

export type State = StrState | ParsedState;

export interface Trace {
  description: string;
  type: string;
  /** Per-step states as reported; intermediate steps usually carry only changed variables. */
  states: StrState[];
  /** Sorted, distinct positions in `states` where a repeating suffix begins. Empty for a finite path. */
  loopIndexes: number[];
}

interface OutcomeBase {
  logic: string;
  specification: string;
  /** Transcript slice the outcome was parsed from. Not carried by the structured encoding. */
  unparsed: string;
}

export type Outcome = OutcomeBase & (
  | { verdict: 'false'; trace: Trace }
  | { verdict: 'true' | 'unknown'; trace?: undefined }
);

export const VERDICT_LABELS: Record<Verdict, string> = {
  true: 'SUCCESSFUL',
  false: 'FAILED',
  unknown: 'INCONCLUSIVE',
};
