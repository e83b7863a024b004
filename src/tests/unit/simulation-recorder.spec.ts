import { describe, expect, it } from 'vitest';

import { SimulationRecorder } from '../../session/simulation-recorder.js';

describe('SimulationRecorder', () => {
  it('copies recorded states', () => {
    const recorder = new SimulationRecorder();
    const state = { x: '0' };
    recorder.record(state);
    state.x = '9';

    expect(recorder.states).toEqual([{ x: '0' }]);
    expect(recorder.length).toBe(1);
  });

  it('stays satisfiable until marked', () => {
    const recorder = new SimulationRecorder();
    expect(recorder.satisfiable).toBe(true);
    recorder.markUnsatisfiable();
    expect(recorder.satisfiable).toBe(false);
  });

  it('builds a finite simulation trace', () => {
    const recorder = new SimulationRecorder();
    recorder.record({ x: '0' });
    recorder.record({ x: '1' });

    expect(recorder.toTrace('run 1')).toEqual({
      description: 'run 1',
      type: 'Simulation',
      states: [{ x: '0' }, { x: '1' }],
      loopIndexes: [],
    });
  });
});
