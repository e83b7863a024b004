import type { FatalPhraseConfig, PreconditionKind } from '../types.js';

import { BackendFaultError, RecoverablePreconditionError } from '../errors.js';

const PRECONDITION_ORDER: readonly PreconditionKind[] = ['boolean_model_missing', 'mode_not_engaged'];

const linesContaining = (lines: readonly string[], phrases: readonly string[]): string[] => (
  lines.filter((line) => phrases.some((phrase) => line.includes(phrase)))
);

/**
 * Find the first fatal condition in a transcript. Preconditions win over faults,
 * since the engine often prints both for one refused command.
 */
export function findFatalCondition(
  transcript: string,
  phrases: FatalPhraseConfig
): RecoverablePreconditionError | BackendFaultError | undefined {
  const lines = transcript.split('\n').map((line) => line.trimEnd());
  const precondition = PRECONDITION_ORDER
    .map((kind) => ({ kind, matched: linesContaining(lines, phrases.preconditions[kind]) }))
    .find((candidate) => candidate.matched.length > 0);
  if (precondition !== undefined) {
    return new RecoverablePreconditionError(precondition.kind, precondition.matched);
  }
  const faults = linesContaining(lines, phrases.faults);
  return faults.length > 0 ? new BackendFaultError(faults) : undefined;
}

export function assertNoFatalCondition(transcript: string, phrases: FatalPhraseConfig): void {
  const found = findFatalCondition(transcript, phrases);
  if (found !== undefined) throw found;
}
