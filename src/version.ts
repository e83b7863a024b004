import fs from 'node:fs';

import { z } from 'zod';

const PackageManifestSchema = z.object({ version: z.string().min(1) });

// package.json sits one level above both src/ and dist/.
const readVersion = (): string => {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    const parsed = PackageManifestSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
};

export const VERSION = readVersion();

/** The `*** This is nuXmv x.y.z ...` line of the engine's startup banner, if any. */
export function engineVersionLine(banner: string): string | undefined {
  return banner
    .split('\n')
    .map((line) => line.replace(/^\*+\s*/, '').trim())
    .find((line) => /^This is \S+ \S+/.test(line));
}
