import readline from 'node:readline';

export type HeuristicKind = 'random' | 'interactive';

export const HEURISTIC_KINDS: readonly HeuristicKind[] = ['random', 'interactive'];

/** Picks which of the engine's candidate states to commit to. */
export interface SimulationHeuristic {
  readonly kind: HeuristicKind;
  chooseFrom: (candidates: readonly string[]) => Promise<number>;
  /** Release whatever the strategy holds open (the prompt's input stream). */
  close: () => void;
}

export interface RandomHeuristicOptions {
  kind: 'random';
  /** Defaults to the wall clock. */
  seed?: number;
}

export interface InteractiveHeuristicOptions {
  kind: 'interactive';
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export type HeuristicOptions = RandomHeuristicOptions | InteractiveHeuristicOptions;

export function isHeuristicKind(value: unknown): value is HeuristicKind {
  return typeof value === 'string' && HEURISTIC_KINDS.some((kind) => kind === value);
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

class RandomChoice implements SimulationHeuristic {
  readonly kind = 'random' as const;
  readonly seed: number;
  private readonly next: () => number;

  constructor(seed?: number) {
    this.seed = seed ?? Date.now();
    this.next = mulberry32(this.seed);
  }

  chooseFrom(candidates: readonly string[]): Promise<number> {
    if (candidates.length === 0) {
      return Promise.reject(new RangeError('cannot choose from an empty candidate list'));
    }
    return Promise.resolve(Math.floor(this.next() * candidates.length));
  }

  close(): void {
    /* nothing held */
  }
}

export function parseChoice(answer: string, bound: number): number | undefined {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const choice = Number.parseInt(trimmed, 10);
  return choice < bound ? choice : undefined;
}

class UserChoice implements SimulationHeuristic {
  readonly kind = 'interactive' as const;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private rl?: readline.Interface;
  private lines?: AsyncIterator<string>;

  constructor(opts: Omit<InteractiveHeuristicOptions, 'kind'>) {
    this.input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
  }

  async chooseFrom(candidates: readonly string[]): Promise<number> {
    const bound = candidates.length;
    if (bound === 0) return 0;
    candidates.forEach((candidate, idx) => {
      this.output.write(`[${String(idx)}]\n${candidate.trim()}\n\n`);
    });
    const lines = this.openLines();
    // eslint-disable-next-line functional/no-loop-statements -- re-prompt until the answer is usable
    while (true) {
      this.output.write(`Choose a state (0-${String(bound - 1)}): `);
      const next = await lines.next();
      if (next.done === true) throw new Error('input ended before a state was chosen');
      const choice = parseChoice(next.value, bound);
      if (choice !== undefined) return choice;
    }
  }

  close(): void {
    this.rl?.close();
    this.rl = undefined;
    this.lines = undefined;
  }

  // One reader for the heuristic's lifetime; answers typed ahead stay buffered.
  private openLines(): AsyncIterator<string> {
    if (this.lines !== undefined) return this.lines;
    const rl = readline.createInterface({ input: this.input, terminal: false });
    this.rl = rl;
    this.lines = rl[Symbol.asyncIterator]();
    return this.lines;
  }
}

export function createHeuristic(options: HeuristicOptions): SimulationHeuristic {
  switch (options.kind) {
    case 'random':
      return new RandomChoice(options.seed);
    case 'interactive':
      return new UserChoice(options);
  }
}
