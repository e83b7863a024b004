// Structured logging interface
export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN'; // FIN for end-of-run summary
  direction: 'request' | 'response';    // Towards the engine or back from it
  type: 'engine' | 'session' | 'cli';   // engine = raw conversation, session = command layer
  remoteIdentifier: string;             // e.g. 'engine:send', 'session:remediate'
  fatal: boolean;                       // True if this stops the run
  message: string;                      // Human readable message
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogSink = (entry: LogEntry) => void;

export type LogFormat = 'logfmt' | 'json' | 'console' | 'none';

export type LoadMode = 'symbolic' | 'bdd';

export type EngineMode = 'bdd' | 'symbolic';

export type OutputFormat = 'text' | 'json';

export interface TerminalConfig {
  name: string;
  cols: number;
  rows: number;
}

export interface EngineConfig {
  executable: string;
  args: string[];
  prompt: string;
  disableEcho: boolean;
  consumeEcho: boolean;
  echoTimeoutMs: number;
  startupTimeoutMs: number;
  terminal: TerminalConfig;
}

export interface MarkerConfig {
  stateSeparator: string;
  candidateHeader: string;
  choicePrompt: string;
  singleCandidatePrompt: string;
  simulationSat: string;
}

export type PreconditionKind = 'boolean_model_missing' | 'mode_not_engaged';

export interface FatalPhraseConfig {
  preconditions: Record<PreconditionKind, string[]>;
  faults: string[];
}

export interface Configuration {
  engine: EngineConfig;
  model: {
    shownStates: number;
    loadMode: LoadMode;
  };
  markers: MarkerConfig;
  fatal: FatalPhraseConfig;
  cache: {
    maxEntries: number;
  };
}
