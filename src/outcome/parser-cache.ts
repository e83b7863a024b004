import type { ParsedValue, StrState } from './types.js';

import { LruCache } from '../cache/lru-cache.js';

export interface StateChunk {
  state: StrState;
  /** A loop marker closed this chunk: the next state starts the repeating suffix. */
  loopStartsNext: boolean;
}

interface ParserCaches {
  chunks: LruCache<string, StateChunk>;
  values: LruCache<string, ParsedValue>;
}

export const parserCaches: ParserCaches = {
  chunks: new LruCache<string, StateChunk>(),
  values: new LruCache<string, ParsedValue>(),
};

export function configureParserCaches(maxEntries: number): void {
  parserCaches.chunks = new LruCache<string, StateChunk>(maxEntries);
  parserCaches.values = new LruCache<string, ParsedValue>(maxEntries);
}
