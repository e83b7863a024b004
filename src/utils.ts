export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

// Engine transcripts come from a terminal: CRLF line ends and stray CRs from redraws.
export const normalizeTerminalText = (value: string): string => value.replace(/\r\n/g, '\n').replace(/\r/g, '');

export const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// The engine's command reader has no escape syntax; arguments are wrapped as-is.
export const quoteArgument = (value: string): string => `"${value}"`;
