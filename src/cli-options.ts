import { InvalidArgumentError } from 'commander';

import type { HeuristicKind } from './heuristics/heuristics.js';
import type { LogFormat, OutputFormat } from './types.js';

import { parseTimeoutMs } from './utils/duration.js';

export type CommonCliOptions = {
  timeout?: number;
  format: OutputFormat;
  config?: string;
  verbose: boolean;
  traceEngine: boolean;
  logFormat?: LogFormat;
};

// Aliases rather than interfaces: opts<T>() needs an index-compatible shape.
export type SimulateCliOptions = CommonCliOptions & {
  steps: number;
  constraint: string;
  heuristic: HeuristicKind;
  seed?: number;
  full: boolean;
  parse: boolean;
};

export type PropertyCliOptions = CommonCliOptions & {
  property: string[];
  bound?: number;
  full: boolean;
  parse: boolean;
};

export const appendValue = <T>(value: T, previous?: T[]): T[] => {
  const base = Array.isArray(previous) ? [...previous] : [];
  base.push(value);
  return base;
};

export const parseNonNegative = (value: string): number => {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`invalid non-negative integer '${value}'`);
  }
  return Number.parseInt(value, 10);
};

export const parseSeed = (value: string): number => {
  const num = Number(value);
  if (!Number.isSafeInteger(num)) {
    throw new InvalidArgumentError(`invalid seed '${value}'`);
  }
  return num;
};

// `0` disables the deadline.
export const parseTimeoutOption = (value: string): number | undefined => {
  try {
    return parseTimeoutMs(value, 'timeout');
  } catch (e) {
    throw new InvalidArgumentError(e instanceof Error ? e.message : String(e));
  }
};
