import type { Outcome, Verdict } from './types.js';

import { ParseError } from '../errors.js';
import { normalizeTerminalText } from '../utils.js';

import { excerptOf, parseTrace } from './trace.js';

const VERDICT_PHRASES: readonly (readonly [string, Verdict])[] = [
  ['is true', 'true'],
  ['is false', 'false'],
  ['is unknown', 'unknown'],
];

const HEADER_KEYWORD = /\b(specification|invariant)\b/;

function findAll(text: string, needle: string): number[] {
  const places: number[] = [];
  let at = text.indexOf(needle);
  // eslint-disable-next-line functional/no-loop-statements -- plain scan over occurrences
  while (at !== -1) {
    places.push(at);
    at = text.indexOf(needle, at + 1);
  }
  return places;
}

// Start of the closest line at or before `pos` whose first non-blank characters are `--`.
function commentLineStart(text: string, pos: number): number | undefined {
  let lineStart = text.lastIndexOf('\n', pos - 1) + 1;
  // eslint-disable-next-line functional/no-loop-statements -- walks backward line by line
  while (true) {
    const lineEnd = text.indexOf('\n', lineStart);
    const line = text.slice(lineStart, lineEnd === -1 ? text.length : lineEnd);
    if (line.trimStart().startsWith('--')) return lineStart;
    if (lineStart === 0) return undefined;
    lineStart = lineStart >= 2 ? text.lastIndexOf('\n', lineStart - 2) + 1 : 0;
  }
}

function verdictOf(header: string): { verdict: Verdict; at: number } | undefined {
  return VERDICT_PHRASES
    .map(([phrase, verdict]) => ({ verdict, at: header.lastIndexOf(phrase) }))
    .filter((candidate) => candidate.at !== -1)
    .sort((a, b) => b.at - a.at)[0];
}

function parseBlock(block: string): Outcome {
  const newline = block.indexOf('\n');
  const header = (newline === -1 ? block : block.slice(0, newline)).trim();
  const found = verdictOf(header);
  if (found === undefined) {
    throw new ParseError('property report header carries no verdict', excerptOf(block));
  }
  const keyword = HEADER_KEYWORD.exec(header);
  if (keyword === null || keyword.index > found.at) {
    throw new ParseError('property report header carries no "specification" keyword', excerptOf(header));
  }
  const logic = header.slice(2, keyword.index).trim();
  const specification = header.slice(keyword.index + keyword[0].length, found.at).trim();
  if (found.verdict === 'false') {
    return { logic, specification, verdict: 'false', trace: parseTrace(block), unparsed: block };
  }
  return { logic, specification, verdict: found.verdict, unparsed: block };
}

/**
 * Split a verification transcript into one outcome per reported property.
 * Each verdict phrase is traced back to the comment line that opens its report;
 * a report runs until the next one opens.
 */
export function parseOutcomes(transcript: string): Outcome[] {
  const text = normalizeTerminalText(transcript);
  const places = VERDICT_PHRASES
    .flatMap(([phrase]) => findAll(text, phrase))
    .sort((a, b) => a - b);

  const starts = places.reduce<number[]>((acc, place) => {
    const start = commentLineStart(text, place);
    if (start === undefined) {
      throw new ParseError('verdict phrase outside of a property report', excerptOf(text.slice(Math.max(0, place - 80), place + 20)));
    }
    if (acc.length === 0 || acc[acc.length - 1] !== start) acc.push(start);
    return acc;
  }, []);

  return starts.map((start, idx) => {
    const end = idx + 1 < starts.length ? starts[idx + 1] : text.length;
    return parseBlock(text.slice(start, end));
  });
}

export function overallVerdict(outcomes: readonly Outcome[]): Verdict | undefined {
  if (outcomes.length === 0) return undefined;
  if (outcomes.some((outcome) => outcome.verdict === 'false')) return 'false';
  if (outcomes.some((outcome) => outcome.verdict === 'unknown')) return 'unknown';
  return 'true';
}
