import { describe, expect, it } from 'vitest';

import type { Outcome, Trace } from '../../outcome/types.js';

import { outcomeMessage, renderOutcome, renderTrace } from '../../outcome/render.js';
import { parseTrace } from '../../outcome/trace.js';

const trace: Trace = {
  description: 'LTL Counterexample',
  type: 'Counterexample',
  states: [{ x: '0', up: 'TRUE' }, { x: '1' }],
  loopIndexes: [1],
};

describe('outcomeMessage', () => {
  it('names the verdict, the property and the logic', () => {
    expect(outcomeMessage({ verdict: 'true', specification: 'G (x < 4)', logic: 'LTL' }))
      .toBe('VERIFICATION SUCCESSFUL for G (x < 4) (LTL)');
    expect(outcomeMessage({ verdict: 'false', specification: 'G p', logic: '' }))
      .toBe('VERIFICATION FAILED for G p (N/A)');
    expect(outcomeMessage({ verdict: 'unknown', specification: 'F q', logic: 'LTL' }))
      .toBe('VERIFICATION INCONCLUSIVE for F q (LTL)');
  });
});

describe('renderTrace', () => {
  it('prints the engine layout with loop markers before loop states', () => {
    expect(renderTrace(trace)).toEqual([
      'Trace Description: LTL Counterexample',
      'Trace Type: Counterexample',
      '  -> State: 1.1 <-',
      '    x = 0',
      '    up = TRUE',
      '  -- Loop starts here',
      '  -> State: 1.2 <-',
      '    x = 1',
    ]);
  });

  it('prints full typed states on request', () => {
    expect(renderTrace(trace, { full: true, parse: true }).slice(-3)).toEqual([
      '  -> State: 1.2 <-',
      '    x = 1',
      '    up = true',
    ]);
  });

  it('produces text that parses back to the same trace', () => {
    expect(parseTrace(renderTrace(trace).join('\n'))).toEqual(trace);
  });
});

describe('renderOutcome', () => {
  it('adds the trace under a failed verdict', () => {
    const outcome: Outcome = { logic: 'LTL', specification: 'G p', verdict: 'false', trace, unparsed: '' };
    const lines = renderOutcome(outcome);
    expect(lines[0]).toBe('VERIFICATION FAILED for G p (LTL)');
    expect(lines).toHaveLength(9);
  });
});
