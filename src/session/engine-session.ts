import fs from 'node:fs';

import type { SimulationHeuristic } from '../heuristics/heuristics.js';
import type { Outcome, StrState } from '../outcome/types.js';
import type { Configuration, EngineMode, LogEntry, LogSink } from '../types.js';
import type { Transcript, WaitPattern } from './driver.js';
import type { PropertyCommandOptions, PropertyKind } from './commands.js';
import type { PtySpawner } from './pty.js';

import {
  BackendFaultError,
  EngineError,
  ModelLoadError,
  ParseError,
  isRecoverablePrecondition,
  normalizeErrorMessage,
  type RecoverablePreconditionError,
} from '../errors.js';
import { parseOutcomes } from '../outcome/outcome.js';
import { excerptOf, parseStateChunk } from '../outcome/trace.js';

import {
  BUILD_BOOLEAN_MODEL_COMMAND,
  RESET_COMMAND,
  SHOW_VARIABLES_COMMAND,
  pickStateCommand,
  propertyCommand,
  propertyMode,
  setVariableCommand,
  simulateStepCommand,
  warmUpCommand,
} from './commands.js';
import { EngineDriver } from './driver.js';
import { SimulationRecorder } from './simulation-recorder.js';

export type SessionPhase = 'uninitialized' | 'ready' | 'model_loaded';

/** Engine variables by name; `null` means unset. */
export type Environment = Record<string, string | null>;

export interface EngineSessionOptions {
  config: Configuration;
  log?: LogSink;
  traceEngine?: boolean;
  /** Sets `input_file` right after startup. */
  modelPath?: string;
  spawn?: PtySpawner;
  resolveExecutable?: (name: string) => string | undefined;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface RunPropertyOptions extends PropertyCommandOptions {
  timeoutMs?: number;
}

export interface SimulationStepOptions {
  constraint?: string;
  timeoutMs?: number;
}

export interface SimulationStep {
  state: StrState;
  /** The engine can still extend the path under the constraint. */
  sat: boolean;
}

export interface SimulateOptions extends SimulationStepOptions {
  heuristic: SimulationHeuristic;
  /** Steps after the initial state; 0 runs until the path is unsatisfiable. */
  steps?: number;
  recorder?: SimulationRecorder;
  signal?: AbortSignal;
}

interface ExecuteOptions {
  mode?: EngineMode;
  timeoutMs?: number;
  patterns?: readonly WaitPattern[];
}

const DEFAULT_CONSTRAINT = 'TRUE';

// Lines of `set`: `name value`, the value possibly quoted, `NULL` when unset.
export function parseEnvironment(text: string): Environment {
  return text.split('\n').reduce<Environment>((acc, rawLine) => {
    const line = rawLine.trim();
    if (line.length === 0) return acc;
    const gap = line.search(/\s/);
    if (gap === -1) return acc;
    const name = line.slice(0, gap);
    const value = line.slice(gap).trim();
    if (value === 'NULL') {
      acc[name] = null;
    } else if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      acc[name] = value.slice(1, -1);
    } else {
      acc[name] = value;
    }
    return acc;
  }, {});
}

const CANDIDATE_NOISE = /^\s*(->.*<-|\*+.*\*+)\s*$/;

/**
 * Command layer over one engine driver: tracks the loaded model, the engine
 * variables and which warm-ups have run, and recovers from the two refusals the
 * engine fixes itself once asked.
 */
export class EngineSession {
  private readonly driver: EngineDriver;
  private readonly config: Configuration;
  private readonly logSink?: LogSink;
  private readonly candidateHeader: RegExp;
  private readonly choicePrompt: RegExp;
  private defaults: Environment = {};
  private env: Environment = {};
  private currentPhase: SessionPhase = 'uninitialized';
  private booleanReadyFlag = false;
  private symbolicReadyFlag = false;
  private startupBanner = '';

  constructor(driver: EngineDriver, config: Configuration, log?: LogSink) {
    this.driver = driver;
    this.config = config;
    this.logSink = log;
    this.candidateHeader = new RegExp(config.markers.candidateHeader);
    this.choicePrompt = new RegExp(config.markers.choicePrompt);
  }

  static async open(opts: EngineSessionOptions): Promise<EngineSession> {
    const driver = new EngineDriver({
      engine: opts.config.engine,
      fatal: opts.config.fatal,
      log: opts.log,
      traceEngine: opts.traceEngine,
      spawn: opts.spawn,
      resolveExecutable: opts.resolveExecutable,
      cwd: opts.cwd,
      env: opts.env,
    });
    const session = new EngineSession(driver, opts.config, opts.log);
    try {
      const banner = await driver.start();
      session.startupBanner = banner.text;
      await session.bootstrap(opts.modelPath);
    } catch (e) {
      driver.close();
      throw e;
    }
    return session;
  }

  /** Whatever the engine printed before its first prompt. */
  get banner(): string {
    return this.startupBanner;
  }

  get phase(): SessionPhase {
    return this.currentPhase;
  }

  get booleanReady(): boolean {
    return this.booleanReadyFlag;
  }

  get symbolicReady(): boolean {
    return this.symbolicReadyFlag;
  }

  /** Cached view of the engine variables as last read or written. */
  get environment(): Readonly<Environment> {
    return this.env;
  }

  get defaultEnvironment(): Readonly<Environment> {
    return this.defaults;
  }

  async raw(command: string, timeoutMs?: number): Promise<string> {
    const transcript = await this.execute(command, { timeoutMs });
    return transcript.text;
  }

  async getEnvironment(timeoutMs?: number): Promise<Environment> {
    const env = parseEnvironment(await this.raw(SHOW_VARIABLES_COMMAND, timeoutMs));
    this.env = { ...env };
    return env;
  }

  async setEnvironment(name: string, value: string | null, timeoutMs?: number): Promise<void> {
    await this.execute(setVariableCommand(name, value), { timeoutMs });
    this.env[name] = value;
  }

  async setModel(modelPath: string, timeoutMs?: number): Promise<void> {
    try {
      if (!fs.existsSync(modelPath)) throw new Error(`no such file: ${modelPath}`);
      await this.reset({ full: true, timeoutMs });
      await this.setEnvironment('shown_states', String(this.config.model.shownStates), timeoutMs);
      await this.setEnvironment('input_file', modelPath, timeoutMs);
      await this.warmUp(this.config.model.loadMode, timeoutMs);
    } catch (e) {
      throw new ModelLoadError(modelPath, e);
    }
    this.currentPhase = 'model_loaded';
    this.log('VRB', 'session:model', `model loaded from ${modelPath}`, { mode: this.config.model.loadMode });
  }

  /** Send `reset`. A full reset also puts every changed variable back to its startup value. */
  async reset(opts: { full?: boolean; timeoutMs?: number } = {}): Promise<void> {
    // Cleared first: a failed reset may still have reached the engine.
    this.booleanReadyFlag = false;
    this.symbolicReadyFlag = false;
    await this.execute(RESET_COMMAND, { timeoutMs: opts.timeoutMs });
    if (opts.full !== true) return;
    const names = [...new Set([...Object.keys(this.defaults), ...Object.keys(this.env)])];
    const changed = names.filter((name) => (this.env[name] ?? null) !== (this.defaults[name] ?? null));
    // eslint-disable-next-line functional/no-loop-statements -- one engine command at a time
    for (const name of changed) {
      await this.setEnvironment(name, this.defaults[name] ?? null, opts.timeoutMs);
    }
    this.currentPhase = 'ready';
  }

  async go(timeoutMs?: number): Promise<void> {
    await this.warmUp('bdd', timeoutMs);
  }

  async goMsat(timeoutMs?: number): Promise<void> {
    await this.warmUp('symbolic', timeoutMs);
  }

  async buildBooleanModel(timeoutMs?: number): Promise<void> {
    await this.execute(BUILD_BOOLEAN_MODEL_COMMAND, { timeoutMs });
  }

  async runProperty(kind: PropertyKind, opts: RunPropertyOptions = {}): Promise<string> {
    const command = propertyCommand(kind, { bound: opts.bound, property: opts.property });
    const transcript = await this.execute(command, { mode: propertyMode(kind), timeoutMs: opts.timeoutMs });
    return transcript.text;
  }

  async checkProperty(kind: PropertyKind, opts: RunPropertyOptions = {}): Promise<Outcome[]> {
    return parseOutcomes(await this.runProperty(kind, opts));
  }

  async initSimulationState(heuristic: SimulationHeuristic, opts: SimulationStepOptions = {}): Promise<StrState> {
    const command = pickStateCommand(opts.constraint ?? DEFAULT_CONSTRAINT);
    const committed = await this.commitCandidate(command, heuristic, opts.timeoutMs);
    return committed.state;
  }

  async stepSimulation(heuristic: SimulationHeuristic, opts: SimulationStepOptions = {}): Promise<SimulationStep> {
    const command = simulateStepCommand(opts.constraint ?? DEFAULT_CONSTRAINT);
    const committed = await this.commitCandidate(command, heuristic, opts.timeoutMs);
    return { state: committed.state, sat: committed.after.includes(this.config.markers.simulationSat) };
  }

  /**
   * Pick an initial state, then step until `steps` is reached or the path cannot
   * be extended. States land in the recorder as soon as they are committed.
   */
  async simulate(opts: SimulateOptions): Promise<SimulationRecorder> {
    const recorder = opts.recorder ?? new SimulationRecorder();
    const steps = opts.steps ?? 1;
    const stepOpts: SimulationStepOptions = { constraint: opts.constraint, timeoutMs: opts.timeoutMs };
    recorder.record(await this.initSimulationState(opts.heuristic, stepOpts));
    let taken = 0;
    // eslint-disable-next-line functional/no-loop-statements -- each step depends on the previous choice
    while ((steps === 0 || taken < steps) && opts.signal?.aborted !== true) {
      const step = await this.stepSimulation(opts.heuristic, stepOpts);
      recorder.record(step.state);
      taken += 1;
      if (!step.sat) {
        recorder.markUnsatisfiable();
        break;
      }
    }
    this.log('VRB', 'session:simulate', `simulation recorded ${String(recorder.length)} states`, { satisfiable: recorder.satisfiable });
    return recorder;
  }

  close(): void {
    this.driver.close();
    this.currentPhase = 'uninitialized';
  }

  private async bootstrap(modelPath?: string): Promise<void> {
    this.defaults = await this.getEnvironment(this.config.engine.startupTimeoutMs);
    this.currentPhase = 'ready';
    if (modelPath !== undefined) await this.setEnvironment('input_file', modelPath);
  }

  private async warmUp(mode: EngineMode, timeoutMs?: number): Promise<void> {
    await this.execute(warmUpCommand(mode), { timeoutMs });
    this.markReady(mode);
  }

  private markReady(mode: EngineMode): void {
    if (mode === 'bdd') this.booleanReadyFlag = true;
    else this.symbolicReadyFlag = true;
  }

  private isReady(mode: EngineMode): boolean {
    return mode === 'bdd' ? this.booleanReadyFlag : this.symbolicReadyFlag;
  }

  private async exchange(command: string, opts: ExecuteOptions): Promise<Transcript> {
    await this.driver.send(command);
    return await this.driver.waitFor(opts.patterns ?? [this.config.engine.prompt], opts.timeoutMs);
  }

  /**
   * Send a command, fixing a recoverable refusal at most once. A second refusal,
   * or one raised by the fix itself, is reported as a fault.
   */
  private async execute(command: string, opts: ExecuteOptions): Promise<Transcript> {
    if (opts.mode !== undefined && !this.isReady(opts.mode)) await this.warmUp(opts.mode, opts.timeoutMs);
    try {
      return await this.exchange(command, opts);
    } catch (e) {
      if (!isRecoverablePrecondition(e)) throw e;
      await this.remediate(e, opts);
    }
    try {
      return await this.exchange(command, opts);
    } catch (e) {
      if (isRecoverablePrecondition(e)) throw BackendFaultError.fromPrecondition(e);
      throw e;
    }
  }

  private async remediate(err: RecoverablePreconditionError, opts: ExecuteOptions): Promise<void> {
    const mode = opts.mode ?? this.config.model.loadMode;
    const fix = err.precondition === 'boolean_model_missing' ? BUILD_BOOLEAN_MODEL_COMMAND : warmUpCommand(mode);
    this.log('WRN', 'session:remediate', `engine refused (${err.precondition}), sending ${fix}`, { precondition: err.precondition });
    try {
      await this.exchange(fix, { timeoutMs: opts.timeoutMs });
    } catch (e) {
      if (isRecoverablePrecondition(e)) throw BackendFaultError.fromPrecondition(e);
      throw e;
    }
    if (err.precondition === 'mode_not_engaged') this.markReady(mode);
  }

  private splitCandidates(text: string): string[] {
    return text
      .split(this.config.markers.stateSeparator)
      .slice(1)
      .map((chunk) => chunk.replace(this.candidateHeader, '').trim());
  }

  private parseCandidate(candidate: string): StrState {
    const body = candidate.split('\n').filter((line) => !CANDIDATE_NOISE.test(line)).join('\n');
    // Parsed chunks are cached and shared; callers get their own copy.
    return { ...parseStateChunk(body).state };
  }

  private async commitCandidate(
    command: string,
    heuristic: SimulationHeuristic,
    timeoutMs?: number
  ): Promise<{ state: StrState; after: string }> {
    const { markers, engine } = this.config;
    const offered = await this.execute(command, {
      mode: 'symbolic',
      timeoutMs,
      patterns: [this.choicePrompt, markers.singleCandidatePrompt, engine.prompt],
    });
    if (offered.patternIndex === 2) {
      throw new ParseError('engine returned to its prompt without offering candidate states', excerptOf(offered.text));
    }
    const { choice, state } = await this.chooseCandidate(offered.text, heuristic).catch(async (e: unknown) => {
      await this.abandonChoice(timeoutMs);
      throw e;
    });
    const after = await this.exchange(String(choice), { timeoutMs });
    return { state, after: after.text };
  }

  private async chooseCandidate(text: string, heuristic: SimulationHeuristic): Promise<{ choice: number; state: StrState }> {
    const candidates = this.splitCandidates(text);
    if (candidates.length === 0) {
      throw new ParseError('engine offered no candidate states', excerptOf(text));
    }
    const choice = await heuristic.chooseFrom(candidates);
    if (!Number.isInteger(choice) || choice < 0 || choice >= candidates.length) {
      throw new EngineError('fault', `heuristic chose ${String(choice)} out of ${String(candidates.length)} candidates`);
    }
    return { choice, state: this.parseCandidate(candidates[choice]) };
  }

  // The engine is still waiting for an answer; interrupt it back to the main prompt.
  private async abandonChoice(timeoutMs?: number): Promise<void> {
    this.log('WRN', 'session:simulate', 'no state committed, interrupting the pending choice');
    try {
      this.driver.interrupt();
      await this.driver.waitForPrompt(timeoutMs);
    } catch (e) {
      this.log('WRN', 'session:simulate', `engine did not return to its prompt: ${normalizeErrorMessage(e)}`);
    }
  }

  private log(
    severity: LogEntry['severity'],
    remoteIdentifier: string,
    message: string,
    details?: LogEntry['details']
  ): void {
    this.logSink?.({
      timestamp: Date.now(),
      severity,
      direction: 'request',
      type: 'session',
      remoteIdentifier,
      fatal: false,
      message,
      ...(details !== undefined ? { details } : {}),
    });
  }
}
