import type { StateChunk } from './parser-cache.js';
import type { StrState, Trace } from './types.js';

import { ParseError } from '../errors.js';
import { normalizeTerminalText } from '../utils.js';

import { parserCaches } from './parser-cache.js';

export const TRACE_DESCRIPTION_LABEL = 'Trace Description:';
export const TRACE_TYPE_LABEL = 'Type:';
export const LOOP_MARKER = '-- Loop starts here';

const LOOP_MARKER_PATTERN = /^--\s*Loop starts here/;
const STEP_HEADER_SOURCE = String.raw`^[ \t]*->[ \t]*(State|Input):[ \t]*\S+[ \t]*<-[ \t]*$`;
const EXCERPT_CHARS = 160;

export const excerptOf = (text: string): string => (
  text.length > EXCERPT_CHARS ? `${text.slice(0, EXCERPT_CHARS)}...` : text
);

function scanChunk(text: string): StateChunk {
  const state: StrState = {};
  let loopStartsNext = false;
  text.split('\n').forEach((rawLine) => {
    const line = rawLine.trim();
    if (line.length === 0) return;
    if (line.startsWith('--')) {
      if (LOOP_MARKER_PATTERN.test(line)) loopStartsNext = true;
      return;
    }
    const eq = line.indexOf('=');
    if (eq <= 0) {
      throw new ParseError(`expected "name = value" in trace state, got "${line}"`, excerptOf(text));
    }
    const name = line.slice(0, eq).trim();
    state[name] = line.slice(eq + 1).trim();
  });
  return { state, loopStartsNext };
}

/** Parse the body of one `-> State: x.y <-` block. Memoized on the raw text. */
export function parseStateChunk(text: string): StateChunk {
  const cached = parserCaches.chunks.get(text);
  if (cached !== undefined) return cached;
  const chunk = scanChunk(text);
  parserCaches.chunks.set(text, chunk);
  return chunk;
}

function readPreamble(preamble: string): { description: string; type: string; loopAtStart: boolean } {
  const lines = preamble.split('\n');
  const description = lines[0].slice(TRACE_DESCRIPTION_LABEL.length).trim();
  const typeLine = lines.length > 1 ? lines[1] : '';
  const typeAt = typeLine.indexOf(TRACE_TYPE_LABEL);
  if (typeAt === -1) {
    throw new ParseError(`missing "${TRACE_TYPE_LABEL}" line after the trace description`, excerptOf(preamble));
  }
  const type = typeLine.slice(typeAt + TRACE_TYPE_LABEL.length).trim();
  const loopAtStart = lines.slice(2).some((line) => LOOP_MARKER_PATTERN.test(line.trim()));
  return { description, type, loopAtStart };
}

/**
 * Parse an engine trace report. A loop marker announces that the state printed
 * after it begins the repeating suffix, so `loopIndexes` holds that state's position.
 * `-> Input: x.y <-` blocks are folded into the state they lead to.
 */
export function parseTrace(text: string): Trace {
  const normalized = normalizeTerminalText(text);
  const start = normalized.indexOf(TRACE_DESCRIPTION_LABEL);
  if (start === -1) {
    throw new ParseError(`missing "${TRACE_DESCRIPTION_LABEL}" marker`, excerptOf(normalized));
  }
  const body = normalized.slice(start);
  const headers = [...body.matchAll(new RegExp(STEP_HEADER_SOURCE, 'gm'))].map((match) => ({
    kind: match[1],
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }));
  const preambleEnd = headers.length > 0 ? headers[0].start : body.length;
  const { description, type, loopAtStart } = readPreamble(body.slice(0, preambleEnd));

  const states: StrState[] = [];
  const loopIndexes: number[] = [];
  let pendingLoop = loopAtStart;
  let pendingInputs: StrState = {};

  headers.forEach((header, idx) => {
    const contentEnd = idx + 1 < headers.length ? headers[idx + 1].start : body.length;
    const chunk = parseStateChunk(body.slice(header.end, contentEnd));
    if (header.kind === 'Input') {
      pendingInputs = { ...pendingInputs, ...chunk.state };
      pendingLoop = pendingLoop || chunk.loopStartsNext;
      return;
    }
    if (pendingLoop) loopIndexes.push(states.length);
    states.push({ ...pendingInputs, ...chunk.state });
    pendingInputs = {};
    pendingLoop = chunk.loopStartsNext;
  });

  if (pendingLoop) {
    throw new ParseError('loop marker is not followed by a state', excerptOf(body.slice(-EXCERPT_CHARS)));
  }
  return { description, type, states, loopIndexes };
}

/** Build a finite trace from states collected outside a trace report (e.g. a simulation run). */
export function traceOfStates(states: StrState[], type: string, description: string): Trace {
  return { description, type, states: states.map((state) => ({ ...state })), loopIndexes: [] };
}
