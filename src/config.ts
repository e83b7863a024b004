import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import type { Configuration } from './types.js';

import { EngineError } from './errors.js';
import { isPlainObject } from './utils.js';

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../config/engine.yaml', import.meta.url));

export const CONFIG_ENV_VAR = 'NUXMV_DRIVER_CONFIG';

const TerminalSchema = z.object({
  name: z.string().min(1),
  cols: z.number().int().positive().max(65535),
  rows: z.number().int().positive().max(65535),
});

const EngineSchema = z.object({
  executable: z.string().min(1),
  args: z.array(z.string()),
  prompt: z.string().min(1),
  disableEcho: z.boolean(),
  consumeEcho: z.boolean(),
  echoTimeoutMs: z.number().int().nonnegative(),
  startupTimeoutMs: z.number().int().nonnegative(),
  terminal: TerminalSchema,
});

const RegexSource = z.string().min(1).refine((value) => {
  try {
    new RegExp(value);
    return true;
  } catch {
    return false;
  }
}, { message: 'not a valid regular expression' });

const MarkersSchema = z.object({
  stateSeparator: z.string().min(1),
  candidateHeader: RegexSource,
  choicePrompt: RegexSource,
  singleCandidatePrompt: z.string().min(1),
  simulationSat: z.string().min(1),
});

const PhraseList = z.array(z.string().min(1));

const FatalSchema = z.object({
  preconditions: z.object({
    boolean_model_missing: PhraseList,
    mode_not_engaged: PhraseList,
  }),
  faults: PhraseList,
});

const ConfigurationSchema = z.object({
  engine: EngineSchema,
  model: z.object({
    shownStates: z.number().int().positive(),
    loadMode: z.enum(['symbolic', 'bdd']),
  }),
  markers: MarkersSchema,
  fatal: FatalSchema,
  cache: z.object({
    maxEntries: z.number().int().positive(),
  }),
});

function expandEnv(str: string): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (process.env[name] ?? ''));
}

function expandDeep(obj: unknown): unknown {
  if (typeof obj === 'string') return expandEnv(obj);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v));
  if (isPlainObject(obj)) {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v);
      return acc;
    }, {});
  }
  return obj;
}

// Objects merge key by key; arrays and scalars from the overlay replace the base.
export function mergeLayers(base: unknown, overlay: unknown): unknown {
  if (overlay === undefined || overlay === null) return base;
  if (!isPlainObject(base) || !isPlainObject(overlay)) return overlay;
  const keys = new Set([...Object.keys(base), ...Object.keys(overlay)]);
  return [...keys].reduce<Record<string, unknown>>((acc, key) => {
    acc[key] = mergeLayers(base[key], overlay[key]);
    return acc;
  }, {});
}

function readYamlFile(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    throw new EngineError('config_error', `Failed to read configuration file ${file}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  try {
    return yaml.load(raw, { filename: file });
  } catch (e) {
    throw new EngineError('config_error', `Invalid YAML in configuration file ${file}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

function resolveUserConfigPath(configPath?: string): string | undefined {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new EngineError('config_error', `Configuration file not found: ${configPath}`);
    return configPath;
  }
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (typeof fromEnv === 'string' && fromEnv.length > 0) {
    if (!fs.existsSync(fromEnv)) throw new EngineError('config_error', `Configuration file not found: ${fromEnv} (from ${CONFIG_ENV_VAR})`);
    return fromEnv;
  }
  return undefined;
}

export function parseConfiguration(value: unknown, source: string): Configuration {
  const parsed = ConfigurationSchema.safeParse(expandDeep(value));
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new EngineError('config_error', `Configuration validation failed in ${source}:\n${msgs}`);
  }
  return parsed.data;
}

export function loadConfiguration(configPath?: string, opts?: { defaultsPath?: string }): Configuration {
  const defaultsPath = opts?.defaultsPath ?? DEFAULT_CONFIG_PATH;
  const defaults = readYamlFile(defaultsPath);
  const userPath = resolveUserConfigPath(configPath);
  if (userPath === undefined) return parseConfiguration(defaults, defaultsPath);
  const overlay = readYamlFile(userPath);
  if (overlay !== undefined && overlay !== null && !isPlainObject(overlay)) {
    throw new EngineError('config_error', `Configuration file ${userPath} must contain a mapping at the top level`);
  }
  return parseConfiguration(mergeLayers(defaults, overlay), userPath);
}

let cachedDefaults: Configuration | undefined;

export function defaultConfiguration(): Configuration {
  cachedDefaults ??= parseConfiguration(readYamlFile(DEFAULT_CONFIG_PATH), DEFAULT_CONFIG_PATH);
  return cachedDefaults;
}
