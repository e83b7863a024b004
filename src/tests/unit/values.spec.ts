import { describe, expect, it } from 'vitest';

import { coerceValue, fullStates, parsedStates, selectStates } from '../../outcome/values.js';
import type { StrState } from '../../outcome/types.js';

describe('coerceValue', () => {
  it('maps engine booleans and decimal literals', () => {
    expect(coerceValue('TRUE')).toBe(true);
    expect(coerceValue('FALSE')).toBe(false);
    expect(coerceValue('42')).toBe(42);
    expect(coerceValue('-3')).toBe(-3);
    expect(coerceValue('2.5')).toBe(2.5);
  });

  it('leaves everything else as text', () => {
    expect(coerceValue('idle')).toBe('idle');
    expect(coerceValue('0ud8_5')).toBe('0ud8_5');
    expect(coerceValue('true')).toBe('true');
    expect(coerceValue('')).toBe('');
  });
});

describe('fullStates', () => {
  it('folds deltas so later steps override earlier ones', () => {
    const trace: { states: StrState[] } = { states: [{ x: '0', y: 'FALSE' }, { x: '1' }, { y: 'TRUE' }] };
    expect(fullStates(trace)).toEqual([
      { x: '0', y: 'FALSE' },
      { x: '1', y: 'FALSE' },
      { x: '1', y: 'TRUE' },
    ]);
  });

  it('does not touch the raw states', () => {
    const trace: { states: StrState[] } = { states: [{ x: '0' }, { y: '1' }] };
    fullStates(trace);
    expect(trace.states).toEqual([{ x: '0' }, { y: '1' }]);
  });

  it('returns nothing for an empty trace', () => {
    expect(fullStates({ states: [] })).toEqual([]);
  });
});

describe('parsedStates / selectStates', () => {
  const trace: { states: StrState[] } = { states: [{ x: '0', ok: 'TRUE' }, { x: '5' }] };

  it('types the deltas by default and the full states on request', () => {
    expect(parsedStates(trace)).toEqual([{ x: 0, ok: true }, { x: 5 }]);
    expect(parsedStates(trace, { full: true })).toEqual([{ x: 0, ok: true }, { x: 5, ok: true }]);
  });

  it('returns raw text unless parsing is asked for', () => {
    expect(selectStates(trace, { full: true })).toEqual([{ x: '0', ok: 'TRUE' }, { x: '5', ok: 'TRUE' }]);
    expect(selectStates(trace, { parse: true })).toEqual([{ x: 0, ok: true }, { x: 5 }]);
  });
});
