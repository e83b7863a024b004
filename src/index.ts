// Main library exports for programmatic use
export { EngineSession, parseEnvironment } from './session/engine-session.js';
export { EngineDriver } from './session/driver.js';
export { SimulationRecorder } from './session/simulation-recorder.js';
export { propertyCommand, PROPERTY_KINDS, isPropertyKind } from './session/commands.js';
export { resolveExecutable, spawnPty } from './session/pty.js';
export { findFatalCondition } from './session/fatal-scan.js';

export { parseOutcomes, overallVerdict } from './outcome/outcome.js';
export { parseTrace, traceOfStates } from './outcome/trace.js';
export { coerceValue, fullStates, parsedStates, parseState } from './outcome/values.js';
export { outcomeMessage, renderOutcome, renderTrace } from './outcome/render.js';
export { decodeOutcome, decodeOutcomes, encodeOutcome, encodeOutcomes, encodeTrace } from './outcome/codec.js';
export { configureParserCaches } from './outcome/parser-cache.js';

export { createHeuristic, HEURISTIC_KINDS, isHeuristicKind, parseChoice } from './heuristics/heuristics.js';

export { defaultConfiguration, loadConfiguration, parseConfiguration } from './config.js';
export { createStructuredLogger, StructuredLogger } from './logging/structured-logger.js';
export { makeTTYLogSink } from './log-sink-tty.js';
export {
  BackendFaultError,
  BackendTimeoutError,
  EngineError,
  ENGINE_ERROR_KIND_MEANINGS,
  isEngineError,
  ModelLoadError,
  ParseError,
  RecoverablePreconditionError,
  ToolNotFoundError,
  toEngineError,
} from './errors.js';

// Type exports
export type {
  Configuration,
  EngineConfig,
  EngineMode,
  FatalPhraseConfig,
  LoadMode,
  LogEntry,
  LogFormat,
  LogSink,
  MarkerConfig,
  OutputFormat,
  PreconditionKind,
} from './types.js';
export type { EngineErrorKind } from './errors.js';
export type { Environment, EngineSessionOptions, RunPropertyOptions, SessionPhase, SimulateOptions, SimulationStep } from './session/engine-session.js';
export type { Transcript, WaitPattern, EngineDriverOptions } from './session/driver.js';
export type { PtyProcess, PtySpawner, PtySpawnOptions } from './session/pty.js';
export type { PropertyKind } from './session/commands.js';
export type { Outcome, ParsedState, ParsedValue, State, StrState, Trace, Verdict } from './outcome/types.js';
export type { EncodedOutcome, EncodedTrace } from './outcome/codec.js';
export type { RenderTraceOptions } from './outcome/render.js';
export type { HeuristicKind, HeuristicOptions, SimulationHeuristic } from './heuristics/heuristics.js';
