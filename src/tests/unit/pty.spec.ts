import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { resolveExecutable } from '../../session/pty.js';

let binDir: string;
let emptyDir: string;

beforeEach(() => {
  binDir = fs.mkdtempSync(path.join(os.tmpdir(), 'nuxmv-driver-bin-'));
  emptyDir = fs.mkdtempSync(path.join(os.tmpdir(), 'nuxmv-driver-empty-'));
  fs.writeFileSync(path.join(binDir, 'nuxmv'), '#!/bin/sh\n', { mode: 0o755 });
  fs.writeFileSync(path.join(binDir, 'notes'), 'text\n', { mode: 0o644 });
  fs.mkdirSync(path.join(binDir, 'subdir'));
});

afterEach(() => {
  fs.rmSync(binDir, { recursive: true, force: true });
  fs.rmSync(emptyDir, { recursive: true, force: true });
});

describe('resolveExecutable', () => {
  it('scans the search path in order', () => {
    const searchPath = [emptyDir, binDir].join(path.delimiter);
    expect(resolveExecutable('nuxmv', searchPath)).toBe(path.join(binDir, 'nuxmv'));
  });

  it('skips files without execute permission and directories', () => {
    expect(resolveExecutable('notes', binDir)).toBeUndefined();
    expect(resolveExecutable('subdir', binDir)).toBeUndefined();
    expect(resolveExecutable('nuxmv', emptyDir)).toBeUndefined();
  });

  it('takes names with a separator as paths', () => {
    expect(resolveExecutable(path.join(binDir, 'nuxmv'), '')).toBe(path.join(binDir, 'nuxmv'));
    expect(resolveExecutable(path.join(binDir, 'notes'), binDir)).toBeUndefined();
  });
});
