import fs from 'node:fs';
import path from 'node:path';

import * as pty from 'node-pty';

import type { TerminalConfig } from '../types.js';

export interface Disposable {
  dispose: () => void;
}

export interface PtyExit {
  exitCode: number;
  signal?: number;
}

/** The slice of a pseudo-terminal child the driver talks to. */
export interface PtyProcess {
  readonly pid: number;
  write: (data: string) => void;
  onData: (listener: (data: string) => void) => Disposable;
  onExit: (listener: (exit: PtyExit) => void) => Disposable;
  kill: (signal?: string) => void;
}

export interface PtySpawnOptions {
  executable: string;
  args: string[];
  terminal: TerminalConfig;
  disableEcho: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type PtySpawner = (opts: PtySpawnOptions) => PtyProcess;

const isExecutableFile = (candidate: string): boolean => {
  try {
    const stats = fs.statSync(candidate);
    if (!stats.isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

/**
 * Resolve an executable the way a shell would: names containing a separator are
 * taken as paths, bare names are looked up on PATH.
 */
export function resolveExecutable(name: string, searchPath: string | undefined = process.env.PATH): string | undefined {
  if (name.includes(path.sep)) {
    const absolute = path.resolve(name);
    return isExecutableFile(absolute) ? absolute : undefined;
  }
  const dirs = (searchPath ?? '').split(path.delimiter).filter((dir) => dir.length > 0);
  return dirs
    .map((dir) => path.join(dir, name))
    .find((candidate) => isExecutableFile(candidate));
}

const stringEnv = (env: NodeJS.ProcessEnv): Record<string, string> => (
  Object.entries(env).reduce<Record<string, string>>((acc, [key, value]) => {
    if (typeof value === 'string') acc[key] = value;
    return acc;
  }, {})
);

// `stty -echo` has to run inside the terminal before the engine starts reading it.
const ECHO_OFF_WRAPPER = 'stty -echo 2>/dev/null; exec "$0" "$@"';

export const spawnPty: PtySpawner = (opts) => {
  const [file, args] = opts.disableEcho
    ? ['/bin/sh', ['-c', ECHO_OFF_WRAPPER, opts.executable, ...opts.args]]
    : [opts.executable, opts.args];
  const child = pty.spawn(file, args, {
    name: opts.terminal.name,
    cols: opts.terminal.cols,
    rows: opts.terminal.rows,
    cwd: opts.cwd ?? process.cwd(),
    env: stringEnv(opts.env ?? process.env),
  });
  return {
    pid: child.pid,
    write: (data) => {
      child.write(data);
    },
    onData: (listener) => child.onData(listener),
    onExit: (listener) => child.onExit((e) => {
      listener(e.signal === undefined ? { exitCode: e.exitCode } : { exitCode: e.exitCode, signal: e.signal });
    }),
    kill: (signal) => {
      child.kill(signal);
    },
  };
};
