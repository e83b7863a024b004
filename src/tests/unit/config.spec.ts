import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CONFIG_ENV_VAR, defaultConfiguration, loadConfiguration, mergeLayers } from '../../config.js';
import { EngineError } from '../../errors.js';

let tmpDir: string;

const writeConfig = (name: string, content: string): string => {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, content, 'utf-8');
  return file;
};

const expectConfigError = (fn: () => unknown, message: string): void => {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(EngineError);
    if (error instanceof EngineError) {
      expect(error.kind).toBe('config_error');
      expect(error.message).toContain(message);
    }
    return;
  }
  throw new Error('expected a configuration error');
};

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'nuxmv-driver-config-'));
  vi.stubEnv(CONFIG_ENV_VAR, '');
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('mergeLayers', () => {
  it('merges mappings and replaces lists and scalars', () => {
    const merged = mergeLayers(
      { engine: { args: ['-int'], prompt: 'p > ' }, cache: { maxEntries: 1 } },
      { engine: { args: ['-quiet'] }, cache: null }
    );
    expect(merged).toEqual({ engine: { args: ['-quiet'], prompt: 'p > ' }, cache: { maxEntries: 1 } });
  });
});

describe('loadConfiguration', () => {
  it('returns the built-in defaults without a user file', () => {
    const config = loadConfiguration();
    expect(config.engine.executable).toBe('nuxmv');
    expect(config.engine.prompt).toBe('nuXmv > ');
    expect(config.model).toEqual({ shownStates: 65535, loadMode: 'symbolic' });
    expect(config.fatal.preconditions.boolean_model_missing).toEqual(['The boolean model must be built before.']);
    expect(config).toEqual(defaultConfiguration());
  });

  it('layers a user file over the defaults and expands variables', () => {
    vi.stubEnv('NUXMV_TEST_BIN', '/opt/engine/bin/nuxmv');
    const file = writeConfig('user.yaml', [
      'engine:',
      '  executable: ${NUXMV_TEST_BIN}',
      '  args: ["-int", "-quiet"]',
      'model:',
      '  loadMode: bdd',
      '',
    ].join('\n'));

    const config = loadConfiguration(file);

    expect(config.engine.executable).toBe('/opt/engine/bin/nuxmv');
    expect(config.engine.args).toEqual(['-int', '-quiet']);
    expect(config.engine.prompt).toBe('nuXmv > ');
    expect(config.model).toEqual({ shownStates: 65535, loadMode: 'bdd' });
  });

  it('finds the user file through the environment', () => {
    const file = writeConfig('env.yaml', 'cache:\n  maxEntries: 8\n');
    vi.stubEnv(CONFIG_ENV_VAR, file);
    expect(loadConfiguration().cache.maxEntries).toBe(8);
  });

  it('reports a missing user file', () => {
    const missing = path.join(tmpDir, 'absent.yaml');
    expectConfigError(() => loadConfiguration(missing), `Configuration file not found: ${missing}`);
  });

  it('reports the path of an invalid value', () => {
    const file = writeConfig('bad.yaml', 'model:\n  loadMode: sat\n');
    expectConfigError(() => loadConfiguration(file), 'model.loadMode');
  });

  it('rejects marker patterns that are not regular expressions', () => {
    const file = writeConfig('regex.yaml', 'markers:\n  choicePrompt: "("\n');
    expectConfigError(() => loadConfiguration(file), 'not a valid regular expression');
  });

  it('rejects a file without a top-level mapping', () => {
    const file = writeConfig('list.yaml', '- engine\n');
    expectConfigError(() => loadConfiguration(file), 'must contain a mapping at the top level');
  });

  it('reports broken YAML', () => {
    const file = writeConfig('broken.yaml', 'engine: [unclosed\n');
    expectConfigError(() => loadConfiguration(file), 'Invalid YAML in configuration file');
  });
});
