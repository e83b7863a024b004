import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import type { SimulationHeuristic } from '../../heuristics/heuristics.js';
import type { ReplyTable } from '../fixtures/fake-engine.js';

import { defaultConfiguration } from '../../config.js';
import { BackendFaultError, BackendTimeoutError, EngineError, ModelLoadError, ParseError } from '../../errors.js';
import { EngineSession, parseEnvironment } from '../../session/engine-session.js';
import { SimulationRecorder } from '../../session/simulation-recorder.js';
import { FakeEngine, PROMPT, SET_OUTPUT, fakeSpawner } from '../fixtures/fake-engine.js';

const MODEL = fileURLToPath(new URL('../fixtures/counter.smv', import.meta.url));

const openSession = async (table: ReplyTable = []): Promise<{ session: EngineSession; engine: FakeEngine }> => {
  const engine = new FakeEngine([['set', SET_OUTPUT], ...table]);
  const { spawn } = fakeSpawner(engine);
  const session = await EngineSession.open({
    config: defaultConfiguration(),
    spawn,
    resolveExecutable: () => '/usr/local/bin/nuxmv',
  });
  return { session, engine };
};

const lastChoice: SimulationHeuristic = {
  kind: 'random',
  chooseFrom: (candidates) => Promise.resolve(candidates.length - 1),
  close: () => undefined,
};

const candidates = (states: readonly string[][], prompt: string): { raw: string } => {
  const blocks = states.map((lines, idx) => [
    '================= State =================',
    `${String(idx)}) -------------------------`,
    ...lines.map((line) => `  ${line}`),
    '',
  ].join('\r\n'));
  return { raw: ['***************  AVAILABLE STATES  *************', '', ...blocks, '', prompt].join('\r\n') };
};

describe('parseEnvironment', () => {
  it('reads names and values, unquoting strings and mapping NULL to null', () => {
    expect(parseEnvironment('\nshown_states 25\ninput_file "models/a b.smv"\ntrace_plugin NULL\n\n')).toEqual({
      shown_states: '25',
      input_file: 'models/a b.smv',
      trace_plugin: null,
    });
  });
});

describe('EngineSession', () => {
  it('reads the default environment on open', async () => {
    const { session, engine } = await openSession();
    expect(engine.commands).toEqual(['set']);
    expect(session.phase).toBe('ready');
    expect(session.defaultEnvironment).toEqual({
      shown_states: '25',
      input_file: null,
      default_trace_plugin: '0',
      on_failure_script_quits: '0',
    });
    expect(session.banner).toContain('This is nuXmv 2.0.0');
    session.close();
  });

  it('loads a model: reset, shown states, input file, then the symbolic warm-up', async () => {
    const { session, engine } = await openSession();
    await session.setModel(MODEL);
    expect(engine.commands).toEqual([
      'set',
      'reset',
      'set shown_states "65535"',
      `set input_file "${MODEL}"`,
      'go_msat',
    ]);
    expect(session.phase).toBe('model_loaded');
    expect(session.symbolicReady).toBe(true);
    expect(session.booleanReady).toBe(false);
    expect(session.environment.input_file).toBe(MODEL);
    session.close();
  });

  it('wraps a failing load step in ModelLoadError', async () => {
    const { session } = await openSession([['go_msat', 'file counter.smv: line 7: TYPE ERROR near "x"']]);
    const failure = await session.setModel(MODEL).catch((e: unknown) => e);
    expect(failure).toBeInstanceOf(ModelLoadError);
    if (!(failure instanceof ModelLoadError)) return;
    expect(failure.kind).toBe('model_load');
    expect(failure.cause).toBeInstanceOf(BackendFaultError);
    session.close();
  });

  it('refuses a model file that does not exist without talking to the engine', async () => {
    const { session, engine } = await openSession();
    await expect(session.setModel('/nonexistent/model.smv')).rejects.toBeInstanceOf(ModelLoadError);
    expect(engine.commands).toEqual(['set']);
    session.close();
  });

  it('clears both readiness flags on reset and keeps the loaded model', async () => {
    const { session } = await openSession();
    await session.setModel(MODEL);
    await session.go();
    expect(session.booleanReady).toBe(true);
    await session.reset();
    expect(session.booleanReady).toBe(false);
    expect(session.symbolicReady).toBe(false);
    expect(session.phase).toBe('model_loaded');
    session.close();
  });

  it('clears both readiness flags even when the reset itself times out', async () => {
    const { session } = await openSession([['reset', null]]);
    await session.go();
    await session.goMsat();
    const failure = await session.reset({ timeoutMs: 20 }).catch((e: unknown) => e);
    expect(failure).toBeInstanceOf(BackendTimeoutError);
    expect(session.booleanReady).toBe(false);
    expect(session.symbolicReady).toBe(false);
    session.close();
  });

  it('restores changed variables on a full reset', async () => {
    const { session, engine } = await openSession();
    await session.setEnvironment('shown_states', '10');
    await session.setEnvironment('custom_flag', 'on');
    await session.reset({ full: true });
    expect(engine.commands.slice(3)).toEqual(['reset', 'set shown_states "25"', 'unset custom_flag']);
    expect(session.environment.shown_states).toBe('25');
    expect(session.environment.custom_flag).toBeNull();
    expect(session.phase).toBe('ready');
    session.close();
  });

  it('leaves the variable cache alone when setting a variable fails', async () => {
    const { session } = await openSession([['set shown_states "-1"', 'illegal operand types for shown_states']]);
    await expect(session.setEnvironment('shown_states', '-1')).rejects.toBeInstanceOf(BackendFaultError);
    expect(session.environment.shown_states).toBe('25');
    session.close();
  });

  it('builds the boolean model once and retries the check once', async () => {
    const { session, engine } = await openSession([
      ['check_ltlspec_ic3 -p "G (x < 4)"', [
        'The boolean model must be built before.',
        '-- LTL specification G (x < 4)  is true',
      ]],
    ]);
    const outcomes = await session.checkProperty('ltl_ic3', { property: 'G (x < 4)' });
    expect(engine.commands.slice(1)).toEqual([
      'go_msat',
      'check_ltlspec_ic3 -p "G (x < 4)"',
      'build_boolean_model',
      'check_ltlspec_ic3 -p "G (x < 4)"',
    ]);
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]).toMatchObject({ logic: 'LTL', specification: 'G (x < 4)', verdict: 'true' });
    session.close();
  });

  it('turns a second refusal into a fault without looping', async () => {
    const { session, engine } = await openSession([
      ['check_ltlspec_ic3 -k 5', 'The boolean model must be built before.'],
    ]);
    const failure = await session.runProperty('ltl_ic3', { bound: 5 }).catch((e: unknown) => e);
    expect(failure).toBeInstanceOf(BackendFaultError);
    expect(failure).toMatchObject({ lines: ['The boolean model must be built before.'] });
    expect(engine.commands.filter((cmd) => cmd === 'check_ltlspec_ic3 -k 5')).toHaveLength(2);
    expect(engine.commands.filter((cmd) => cmd === 'build_boolean_model')).toHaveLength(1);
    session.close();
  });

  it('engages the configured mode when a raw command finds it missing', async () => {
    const { session, engine } = await openSession([
      ['print_reachable_states', ['The model must be built before', 'system diameter: 4']],
    ]);
    const output = await session.raw('print_reachable_states');
    expect(output).toBe('\nsystem diameter: 4\n');
    expect(engine.commands.slice(1)).toEqual(['print_reachable_states', 'go_msat', 'print_reachable_states']);
    expect(session.symbolicReady).toBe(true);
    session.close();
  });

  it('issues the BDD warm-up before a BDD check and parses a counterexample', async () => {
    const report = [
      '-- specification G F x = 3  is false',
      '-- as demonstrated by the following execution sequence',
      'Trace Description: LTL Counterexample',
      'Trace Type: Counterexample',
      '  -> State: 1.1 <-',
      '    x = 0',
      '    up = FALSE',
      '  -- Loop starts here',
      '  -> State: 1.2 <-',
      '    x = 0',
    ].join('\r\n');
    const { session, engine } = await openSession([['check_ltlspec -p "G F x = 3"', report]]);
    const outcomes = await session.checkProperty('ltl', { property: 'G F x = 3' });
    expect(engine.commands.slice(1)).toEqual(['go', 'check_ltlspec -p "G F x = 3"']);
    expect(outcomes[0].verdict).toBe('false');
    expect(outcomes[0].trace?.loopIndexes).toEqual([1]);
    expect(outcomes[0].trace?.states).toEqual([{ x: '0', up: 'FALSE' }, { x: '0' }]);
    session.close();
  });

  it('commits the chosen initial state and returns its variables', async () => {
    const { session, engine } = await openSession([
      ['msat_pick_state -c "TRUE" -v -i', candidates([['x = 0', 'up = FALSE'], ['x = 0', 'up = TRUE']], 'Choose a state from the above (0-1): ')],
    ]);
    const state = await session.initSimulationState(lastChoice);
    expect(state).toEqual({ x: '0', up: 'TRUE' });
    expect(engine.commands.slice(1)).toEqual(['go_msat', 'msat_pick_state -c "TRUE" -v -i', '1']);
    session.close();
  });

  it('hands out a fresh state object for every pick', async () => {
    const { session } = await openSession([
      ['msat_pick_state -c "TRUE" -v -i', candidates([['x = 0'], ['x = 1']], 'Choose a state from the above (0-1): ')],
    ]);
    const first = await session.initSimulationState(lastChoice);
    first.x = 'changed';
    const second = await session.initSimulationState(lastChoice);
    expect(second).toEqual({ x: '1' });
    expect(second).not.toBe(first);
    session.close();
  });

  it('interrupts the pending choice when the heuristic fails and stays usable', async () => {
    const { session, engine } = await openSession([
      ['msat_pick_state -c "TRUE" -v -i', candidates([['x = 0'], ['x = 1']], 'Choose a state from the above (0-1): ')],
    ]);
    const failing: SimulationHeuristic = {
      kind: 'interactive',
      chooseFrom: () => Promise.reject(new Error('input ended before a state was chosen')),
      close: () => undefined,
    };
    await expect(session.initSimulationState(failing)).rejects.toThrow('input ended before a state was chosen');
    expect(engine.interrupts).toBe(1);
    expect(engine.commands.slice(1)).toEqual(['go_msat', 'msat_pick_state -c "TRUE" -v -i']);

    await expect(session.raw('print_usage')).resolves.toBe('\n');
    expect(engine.commands.slice(-1)).toEqual(['print_usage']);
    session.close();
  });

  it('interrupts the pending choice when the heuristic picks out of range', async () => {
    const { session, engine } = await openSession([
      ['msat_pick_state -c "TRUE" -v -i', candidates([['x = 0']], 'Choose a state from the above (0-0): ')],
    ]);
    const outOfRange: SimulationHeuristic = {
      kind: 'random',
      chooseFrom: () => Promise.resolve(3),
      close: () => undefined,
    };
    const failure = await session.initSimulationState(outOfRange).catch((e: unknown) => e);
    expect(failure).toBeInstanceOf(EngineError);
    expect(engine.interrupts).toBe(1);
    expect(engine.commands).not.toContain('3');
    session.close();
  });

  it('rejects a pick that returns to the prompt without candidates', async () => {
    const { session } = await openSession([['msat_pick_state -c "x = 9" -v -i', { raw: `no states\r\n${PROMPT}` }]]);
    await expect(session.initSimulationState(lastChoice, { constraint: 'x = 9' })).rejects.toBeInstanceOf(ParseError);
    session.close();
  });

  it('simulates until the path cannot be extended', async () => {
    const single = "There's only one available state. Press Return to Proceed.";
    const { session } = await openSession([
      ['msat_pick_state -c "TRUE" -v -i', candidates([['x = 0', 'up = TRUE']], single)],
      ['msat_simulate -i -a -k 1 -c "TRUE"', [
        candidates([['x = 1', 'up = TRUE']], single),
        candidates([['x = 2', 'up = FALSE']], single),
      ]],
      ['0', ['', 'Simulation is SAT', 'Simulation is UNSAT']],
    ]);
    const recorder = await session.simulate({ heuristic: lastChoice, steps: 0 });
    expect(recorder.states).toEqual([
      { x: '0', up: 'TRUE' },
      { x: '1', up: 'TRUE' },
      { x: '2', up: 'FALSE' },
    ]);
    expect(recorder.satisfiable).toBe(false);
    session.close();
  });

  it('keeps the states recorded before a step times out', async () => {
    const single = "There's only one available state. Press Return to Proceed.";
    const { session, engine } = await openSession([
      ['msat_pick_state -c "TRUE" -v -i', candidates([['x = 0', 'up = TRUE']], single)],
      ['msat_simulate -i -a -k 1 -c "TRUE"', null],
    ]);
    const recorder = new SimulationRecorder();
    const failure = await session.simulate({ heuristic: lastChoice, steps: 3, recorder, timeoutMs: 20 }).catch((e: unknown) => e);
    expect(failure).toBeInstanceOf(BackendTimeoutError);
    expect(recorder.states).toEqual([{ x: '0', up: 'TRUE' }]);
    expect(engine.interrupts).toBe(1);
    session.close();
  });

  it('stops stepping once the abort signal fires', async () => {
    const single = "There's only one available state. Press Return to Proceed.";
    const controller = new AbortController();
    controller.abort();
    const { session, engine } = await openSession([
      ['msat_pick_state -c "TRUE" -v -i', candidates([['x = 0', 'up = TRUE']], single)],
    ]);
    const recorder = await session.simulate({ heuristic: lastChoice, steps: 5, signal: controller.signal });
    expect(recorder.length).toBe(1);
    expect(engine.commands.some((cmd) => cmd.startsWith('msat_simulate'))).toBe(false);
    session.close();
  });
});
