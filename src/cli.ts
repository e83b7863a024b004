#!/usr/bin/env node
import { Command, Option } from 'commander';

import type { CommonCliOptions, PropertyCliOptions, SimulateCliOptions } from './cli-options.js';
import type { Outcome } from './outcome/types.js';
import type { PropertyKind } from './session/commands.js';
import type { Configuration, LogEntry, LogSink } from './types.js';
import type { CommanderError } from 'commander';

import { appendValue, parseNonNegative, parseSeed, parseTimeoutOption } from './cli-options.js';
import { defaultConfiguration, loadConfiguration } from './config.js';
import { ENGINE_ERROR_KIND_MEANINGS, isEngineError, normalizeErrorMessage } from './errors.js';
import { EXIT_CODES, exitCodeForError, exitCodeForVerdict } from './exit-codes.js';
import { HEURISTIC_KINDS, createHeuristic } from './heuristics/heuristics.js';
import { makeTTYLogSink } from './log-sink-tty.js';
import { overallVerdict } from './outcome/outcome.js';
import { configureParserCaches } from './outcome/parser-cache.js';
import { formatOutcomes, formatSimulation, summarizeOutcomes } from './report.js';
import { EngineSession } from './session/engine-session.js';
import { SimulationRecorder } from './session/simulation-recorder.js';
import { ShutdownController } from './shutdown-controller.js';
import { VERSION, engineVersionLine } from './version.js';

// Centralized exit path to guarantee a single, reasoned exit
let hasExited = false;
function exitWith(code: number, reason: string, tag = 'EXIT-CLI'): never {
  try {
    process.stderr.write(`[VRB] ← nuxmv-driver ${tag}: ${reason} (exit=${String(code)})\n`);
  } catch { /* stderr gone */ }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

const shutdownController = new ShutdownController();
let interruptedBy: NodeJS.Signals | undefined;

const exitAndShutdown = async (code: number, reason: string, tag: string, log?: LogSink): Promise<never> => {
  await shutdownController.shutdown({ reason, logger: log });
  exitWith(code, reason, tag);
};

const cliLog = (log: LogSink, severity: LogEntry['severity'], message: string, details?: LogEntry['details']): void => {
  log({
    timestamp: Date.now(),
    severity,
    direction: 'response',
    type: 'cli',
    remoteIdentifier: 'cli',
    fatal: severity === 'ERR',
    message,
    ...(details !== undefined ? { details } : {}),
  });
};

const writeStdout = (text: string): void => {
  process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
};

function describeError(error: unknown): string {
  if (!isEngineError(error)) return normalizeErrorMessage(error);
  return `${error.message} (${ENGINE_ERROR_KIND_MEANINGS[error.kind].summary})`;
}

// SIGINT/SIGTERM close the engine; the pending wait then fails and the caller flushes what it has.
function installSignalHandlers(log: LogSink): () => void {
  const handlers = new Map<NodeJS.Signals, () => void>();
  (['SIGINT', 'SIGTERM'] as const).forEach((sig) => {
    const handler = (): void => {
      interruptedBy = sig;
      cliLog(log, 'WRN', `received ${sig}, stopping the engine`);
      void shutdownController.shutdown({ reason: sig, logger: log });
    };
    handlers.set(sig, handler);
    process.once(sig, handler);
  });
  return () => {
    handlers.forEach((handler, sig) => {
      process.removeListener(sig, handler);
    });
  };
}

interface RunContext {
  session: EngineSession;
  log: LogSink;
  options: CommonCliOptions;
}

/**
 * Load configuration, open the engine on `model` and hand the session to `body`,
 * which returns the exit code. Errors from `body` are handled by `onError`.
 */
async function runWithSession(
  options: CommonCliOptions,
  model: string | undefined,
  body: (ctx: RunContext) => Promise<number>,
  onError?: (error: unknown, ctx: RunContext) => void
): Promise<never> {
  const log = makeTTYLogSink({
    verbose: options.verbose,
    traceEngine: options.traceEngine,
    explicitFormat: options.logFormat,
  });
  let config: Configuration;
  try {
    config = loadConfiguration(options.config);
  } catch (e) {
    cliLog(log, 'ERR', describeError(e));
    exitWith(exitCodeForError(e), `configuration: ${normalizeErrorMessage(e)}`, 'EXIT-CONFIG');
  }
  configureParserCaches(config.cache.maxEntries);
  const uninstall = installSignalHandlers(log);

  let session: EngineSession;
  try {
    session = await EngineSession.open({ config, log, traceEngine: options.traceEngine });
  } catch (e) {
    cliLog(log, 'ERR', describeError(e));
    uninstall();
    return await exitAndShutdown(exitCodeForError(e), `engine start failed: ${normalizeErrorMessage(e)}`, 'EXIT-ENGINE-START', log);
  }
  shutdownController.register('engine', () => {
    session.close();
  });
  const ctx: RunContext = { session, log, options };

  try {
    if (model !== undefined) await session.setModel(model, options.timeout);
    const code = await body(ctx);
    uninstall();
    return await exitAndShutdown(code, 'completed', 'EXIT-DONE', log);
  } catch (e) {
    onError?.(e, ctx);
    uninstall();
    if (interruptedBy !== undefined) {
      return await exitAndShutdown(EXIT_CODES.interrupted, `interrupted by ${interruptedBy}`, 'EXIT-INTERRUPTED', log);
    }
    cliLog(log, 'ERR', describeError(e));
    return await exitAndShutdown(exitCodeForError(e), normalizeErrorMessage(e), 'EXIT-ERROR', log);
  }
}

const program = new Command();

program
  .name('nuxmv-driver')
  .description('Drive an interactive nuXmv session: check properties and run simulations')
  .version(VERSION, '-V, --version', 'Output the current version');

// Force commander to route exits through our single exit path
program.exitOverride((err: CommanderError) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    exitWith(EXIT_CODES.success, err.code, 'EXIT-COMMANDER');
  }
  exitWith(EXIT_CODES.usage, `commander: ${err.message}`, 'EXIT-COMMANDER');
});

function addCommonOptions(cmd: Command): Command {
  return cmd
    .addOption(new Option('--timeout <duration>', 'Per-command deadline in ms or as 30s/5m; 0 waits forever').argParser(parseTimeoutOption))
    .addOption(new Option('--format <format>', 'Result format on stdout').choices(['text', 'json']).default('text'))
    .option('--config <path>', 'YAML file merged over the built-in configuration')
    .option('--verbose', 'Log session activity', false)
    .option('--trace-engine', 'Log every engine command and transcript', false)
    .addOption(new Option('--log-format <format>', 'Log line format on stderr').choices(['logfmt', 'json', 'console', 'none']));
}

addCommonOptions(
  program
    .command('simulate')
    .description('Pick an initial state and step through the model')
    .argument('<model>', 'SMV model file')
    .addOption(new Option('--steps <n>', 'Steps after the initial state; 0 runs until the path cannot be extended').argParser(parseNonNegative).default(1))
    .option('--constraint <expr>', 'Constraint every chosen state must satisfy', 'TRUE')
    .addOption(new Option('--heuristic <kind>', 'How to choose among candidate states').choices(HEURISTIC_KINDS).default('random'))
    .addOption(new Option('--seed <n>', 'Seed for the random heuristic').argParser(parseSeed))
    .option('--full', 'Print every variable at every step', false)
    .option('--parse', 'Print typed values', false)
).action(async (model: string, _opts: unknown, cmd: Command) => {
  const options = cmd.opts<SimulateCliOptions>();
  const recorder = new SimulationRecorder();
  const heuristic = options.heuristic === 'interactive'
    ? createHeuristic({ kind: 'interactive', output: process.stderr })
    : createHeuristic({ kind: 'random', seed: options.seed });
  shutdownController.register('heuristic', () => {
    heuristic.close();
  });
  const report = (interrupted: boolean): void => {
    writeStdout(formatSimulation(recorder, { format: options.format, full: options.full, parse: options.parse, interrupted }));
  };
  await runWithSession(options, model, async ({ session, log }) => {
    await session.simulate({
      steps: options.steps,
      constraint: options.constraint,
      heuristic,
      timeoutMs: options.timeout,
      recorder,
      signal: shutdownController.signal,
    });
    report(interruptedBy !== undefined);
    cliLog(log, 'FIN', `simulation recorded ${String(recorder.length)} states`, { satisfiable: recorder.satisfiable });
    return interruptedBy !== undefined ? EXIT_CODES.interrupted : EXIT_CODES.success;
  }, () => {
    if (recorder.length > 0) report(interruptedBy !== undefined);
  });
});

const PROPERTY_COMMANDS: readonly { name: string; kind: PropertyKind; description: string }[] = [
  { name: 'ltl', kind: 'ltl', description: 'Check LTL properties with BDDs' },
  { name: 'ltl-ic3', kind: 'ltl_ic3', description: 'Check LTL properties with IC3' },
  { name: 'invar', kind: 'invar_ic3', description: 'Check properties as invariants with IC3' },
  { name: 'bmc', kind: 'bmc', description: 'Check LTL properties with bounded model checking' },
];

PROPERTY_COMMANDS.forEach(({ name, kind, description }) => {
  addCommonOptions(
    program
      .command(name)
      .description(description)
      .argument('<model>', 'SMV model file')
      .addOption(new Option('-p, --property <expr>', 'Property to check instead of those in the model (repeatable)')
        .argParser((value: string, previous: string[]) => appendValue(value, previous))
        .default([], undefined))
      .addOption(new Option('-k, --bound <n>', kind === 'bmc' ? 'Search depth (required)' : 'Search bound; 0 uses the engine default')
        .argParser(parseNonNegative)
        .makeOptionMandatory(kind === 'bmc'))
      .option('--full', 'Print every variable at every step of counterexamples', false)
      .option('--parse', 'Print typed values', false)
  ).action(async (model: string, _opts: unknown, cmd: Command) => {
    const options = cmd.opts<PropertyCliOptions>();
    await runWithSession(options, model, async ({ session, log }) => {
      const properties: (string | undefined)[] = options.property.length > 0 ? options.property : [undefined];
      const outcomes: Outcome[] = [];
      // eslint-disable-next-line functional/no-loop-statements -- one engine command at a time
      for (const property of properties) {
        outcomes.push(...await session.checkProperty(kind, { property, bound: options.bound, timeoutMs: options.timeout }));
      }
      writeStdout(formatOutcomes(outcomes, { format: options.format, full: options.full, parse: options.parse }));
      cliLog(log, 'FIN', summarizeOutcomes(outcomes), { properties: outcomes.length });
      return exitCodeForVerdict(overallVerdict(outcomes));
    });
  });
});

addCommonOptions(
  program
    .command('version')
    .description('Print the driver version, and with --engine the engine version')
    .option('--engine', 'Start the engine and report its version', false)
).action(async (_opts: unknown, cmd: Command) => {
  const options = cmd.opts<CommonCliOptions & { engine: boolean }>();
  writeStdout(`nuxmv-driver ${VERSION}`);
  if (!options.engine) exitWith(EXIT_CODES.success, 'version printed', 'EXIT-VERSION');
  await runWithSession(options, undefined, ({ session }) => {
    const line = engineVersionLine(session.banner) ?? `${defaultConfiguration().engine.executable} (version unknown)`;
    writeStdout(line);
    return Promise.resolve(EXIT_CODES.success);
  });
});

process.on('uncaughtException', (e) => {
  const msg = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
  void exitAndShutdown(EXIT_CODES.uncaught, `uncaught exception: ${msg}`, 'EXIT-UNCAUGHT-EXCEPTION');
});
process.on('unhandledRejection', (r) => {
  const msg = r instanceof Error ? `${r.name}: ${r.message}` : String(r);
  void exitAndShutdown(EXIT_CODES.uncaught, `unhandled rejection: ${msg}`, 'EXIT-UNHANDLED-REJECTION');
});

program.parseAsync().catch((e: unknown) => {
  exitWith(EXIT_CODES.uncaught, normalizeErrorMessage(e), 'EXIT-PARSE');
});
