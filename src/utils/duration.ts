export type DurationInput = number | string | null | undefined;

const UNIT_TO_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/** Milliseconds from `1500`, `1.5s`, `5m` or `1h`; undefined when the input is not a duration. */
export const parseDurationMs = (value: DurationInput): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) return undefined;
    return Math.trunc(value);
  }
  const lowered = value.trim().toLowerCase();
  if (lowered.length === 0) return undefined;
  if (/^\d+(\.\d+)?$/.test(lowered)) return Math.trunc(Number.parseFloat(lowered));
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h)$/.exec(lowered);
  if (match === null) return undefined;
  const ms = Number.parseFloat(match[1]) * UNIT_TO_MS[match[2]];
  return Number.isFinite(ms) ? Math.trunc(ms) : undefined;
};

export const parseDurationMsStrict = (value: DurationInput, context: string): number => {
  const parsed = parseDurationMs(value);
  if (parsed === undefined) {
    throw new Error(`${context} must be a millisecond number, or a duration like 30s/5m/1h`);
  }
  return parsed;
};

/** Command deadline from user input: 0 means wait forever, returned as undefined. */
export const parseTimeoutMs = (value: DurationInput, context = 'timeout'): number | undefined => {
  const parsed = parseDurationMsStrict(value, context);
  return parsed === 0 ? undefined : parsed;
};
