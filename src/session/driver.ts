import type { EngineConfig, FatalPhraseConfig, LogEntry, LogSink } from '../types.js';
import type { Disposable, PtyProcess, PtySpawner } from './pty.js';

import { BackendTimeoutError, EngineError, ToolNotFoundError } from '../errors.js';
import { escapeRegExp, normalizeTerminalText } from '../utils.js';

import { assertNoFatalCondition } from './fatal-scan.js';
import { resolveExecutable, spawnPty } from './pty.js';

export type WaitPattern = string | RegExp;

/** Output captured between a command and the marker that ended it. */
export interface Transcript {
  text: string;
  /** Position in the pattern list of the marker that matched. */
  patternIndex: number;
  matched: string;
}

export interface EngineDriverOptions {
  engine: EngineConfig;
  fatal: FatalPhraseConfig;
  log?: LogSink;
  /** Log every command and transcript at TRC. */
  traceEngine?: boolean;
  spawn?: PtySpawner;
  resolveExecutable?: (name: string) => string | undefined;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

interface Waiter {
  patterns: RegExp[];
  resolve: (transcript: Transcript) => void;
  reject: (error: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
}

interface Found {
  index: number;
  length: number;
  patternIndex: number;
}

const INTERRUPT = '\x03';

const compilePattern = (pattern: WaitPattern): RegExp => (
  typeof pattern === 'string'
    ? new RegExp(escapeRegExp(pattern))
    : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
);

// Earliest match in the buffer; on a tie the pattern listed first wins.
function earliestMatch(buffer: string, patterns: readonly RegExp[]): Found | undefined {
  return patterns.reduce<Found | undefined>((best, pattern, patternIndex) => {
    const match = pattern.exec(buffer);
    if (match === null) return best;
    if (best !== undefined && best.index <= match.index) return best;
    return { index: match.index, length: match[0].length, patternIndex };
  }, undefined);
}

/**
 * Owns one engine process behind a pseudo-terminal and turns its output stream
 * into request/response transcripts. One wait may be outstanding at a time.
 */
export class EngineDriver {
  private readonly engine: EngineConfig;
  private readonly fatal: FatalPhraseConfig;
  private readonly logSink?: LogSink;
  private readonly traceEngine: boolean;
  private readonly spawnImpl: PtySpawner;
  private readonly resolveImpl: (name: string) => string | undefined;
  private readonly cwd?: string;
  private readonly env?: NodeJS.ProcessEnv;

  private child?: PtyProcess;
  private subscriptions: Disposable[] = [];
  private buffer = '';
  private waiter?: Waiter;
  private closed = false;
  private exited = false;

  constructor(opts: EngineDriverOptions) {
    this.engine = opts.engine;
    this.fatal = opts.fatal;
    this.logSink = opts.log;
    this.traceEngine = opts.traceEngine ?? false;
    this.spawnImpl = opts.spawn ?? spawnPty;
    this.resolveImpl = opts.resolveExecutable ?? ((name) => resolveExecutable(name));
    this.cwd = opts.cwd;
    this.env = opts.env;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get isOpen(): boolean {
    return this.child !== undefined && !this.closed && !this.exited;
  }

  /** Spawn the engine and block until its first prompt. Resolves with the startup banner. */
  async start(): Promise<Transcript> {
    if (this.child !== undefined) throw new EngineError('session_busy', 'engine session already started');
    const executable = this.resolveImpl(this.engine.executable);
    if (executable === undefined) throw new ToolNotFoundError(this.engine.executable);

    const child = this.spawnImpl({
      executable,
      args: this.engine.args,
      terminal: this.engine.terminal,
      disableEcho: this.engine.disableEcho,
      cwd: this.cwd,
      env: this.env,
    });
    this.child = child;
    this.subscriptions = [
      child.onData((data) => {
        this.handleData(data);
      }),
      child.onExit((exit) => {
        this.handleExit(exit.exitCode, exit.signal);
      }),
    ];
    this.log('VRB', 'request', 'engine:start', `spawned ${executable} ${this.engine.args.join(' ')}`, { pid: child.pid });
    return await this.waitForPrompt(this.engine.startupTimeoutMs);
  }

  /**
   * Write one command line. When echo consumption is on, everything up to and
   * including the echoed command is dropped, along with anything stale before it.
   */
  async send(command: string): Promise<void> {
    const child = this.requireChild();
    if (this.waiter !== undefined) throw new EngineError('session_busy', 'cannot send while a wait is pending');
    const line = command.trim();
    this.log('TRC', 'request', 'engine:send', line);
    child.write(`${line}\r`);
    if (!this.engine.consumeEcho || line.length === 0) return;
    await this.waitRaw([compilePattern(line)], this.engine.echoTimeoutMs);
  }

  /**
   * Wait until one of `patterns` shows up and return the output before it.
   * `timeoutMs` undefined waits forever; 0 only inspects what is already buffered.
   */
  async waitFor(patterns: readonly WaitPattern[], timeoutMs?: number): Promise<Transcript> {
    const transcript = await this.waitRaw(patterns.map(compilePattern), timeoutMs);
    this.log('TRC', 'response', 'engine:transcript', transcript.text, { pattern: transcript.patternIndex });
    assertNoFatalCondition(transcript.text, this.fatal);
    return transcript;
  }

  waitForPrompt(timeoutMs?: number): Promise<Transcript> {
    return this.waitFor([this.engine.prompt], timeoutMs);
  }

  /** Send the interrupt character; the engine abandons the running command and prints its prompt. */
  interrupt(): void {
    const child = this.requireChild();
    this.log('WRN', 'request', 'engine:interrupt', 'interrupting the engine');
    child.write(INTERRUPT);
  }

  /** Kill the engine outright. Safe to call more than once. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.rejectWaiter(new EngineError('session_closed', 'engine session closed'));
    this.subscriptions.forEach((subscription) => {
      subscription.dispose();
    });
    this.subscriptions = [];
    if (this.child !== undefined && !this.exited) {
      this.child.kill('SIGKILL');
      this.log('VRB', 'request', 'engine:close', 'engine killed', { pid: this.child.pid });
    }
  }

  private requireChild(): PtyProcess {
    if (this.closed || this.exited || this.child === undefined) {
      throw new EngineError('session_closed', this.child === undefined ? 'engine session not started' : 'engine session closed');
    }
    return this.child;
  }

  private waitRaw(patterns: RegExp[], timeoutMs?: number): Promise<Transcript> {
    this.requireChild();
    if (this.waiter !== undefined) {
      return Promise.reject(new EngineError('session_busy', 'another wait is already pending on this session'));
    }
    const immediate = this.take(patterns);
    if (immediate !== undefined) return Promise.resolve(immediate);
    if (timeoutMs === 0) {
      this.interruptAfter(0);
      return Promise.reject(new BackendTimeoutError(0, this.buffer));
    }
    return new Promise<Transcript>((resolve, reject) => {
      const waiter: Waiter = { patterns, resolve, reject };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.waiter = undefined;
          this.interruptAfter(timeoutMs);
          reject(new BackendTimeoutError(timeoutMs, this.buffer));
        }, timeoutMs);
      }
      this.waiter = waiter;
    });
  }

  private take(patterns: readonly RegExp[]): Transcript | undefined {
    const found = earliestMatch(this.buffer, patterns);
    if (found === undefined) return undefined;
    const text = this.buffer.slice(0, found.index);
    const matched = this.buffer.slice(found.index, found.index + found.length);
    this.buffer = this.buffer.slice(found.index + found.length);
    return { text, patternIndex: found.patternIndex, matched };
  }

  private interruptAfter(timeoutMs: number): void {
    this.log('WRN', 'request', 'engine:interrupt', `no marker within ${String(timeoutMs)} ms, interrupting`);
    this.child?.write(INTERRUPT);
  }

  private handleData(data: string): void {
    this.buffer += normalizeTerminalText(data);
    const waiter = this.waiter;
    if (waiter === undefined) return;
    const transcript = this.take(waiter.patterns);
    if (transcript === undefined) return;
    this.waiter = undefined;
    if (waiter.timer !== undefined) clearTimeout(waiter.timer);
    waiter.resolve(transcript);
  }

  private handleExit(exitCode: number, signal?: number): void {
    this.exited = true;
    const how = signal !== undefined && signal !== 0 ? `signal ${String(signal)}` : `code ${String(exitCode)}`;
    this.log(this.closed ? 'VRB' : 'WRN', 'response', 'engine:exit', `engine exited with ${how}`);
    this.rejectWaiter(new EngineError('session_closed', `engine exited with ${how}`, { details: { partialOutput: this.buffer } }));
  }

  private rejectWaiter(error: EngineError): void {
    const waiter = this.waiter;
    if (waiter === undefined) return;
    this.waiter = undefined;
    if (waiter.timer !== undefined) clearTimeout(waiter.timer);
    waiter.reject(error);
  }

  private log(
    severity: LogEntry['severity'],
    direction: LogEntry['direction'],
    remoteIdentifier: string,
    message: string,
    details?: LogEntry['details']
  ): void {
    if (this.logSink === undefined) return;
    if (severity === 'TRC' && !this.traceEngine) return;
    this.logSink({
      timestamp: Date.now(),
      severity,
      direction,
      type: 'engine',
      remoteIdentifier,
      fatal: false,
      message,
      ...(details !== undefined ? { details } : {}),
    });
  }
}
