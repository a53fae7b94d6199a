import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Parse `KEY=value` lines. Blank lines and `#` comments are skipped,
 * surrounding quotes on a value are dropped.
 */
export function parseKeyValue(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    entries.set(key, value);
  }
  return entries;
}

export function serializeKeyValue(entries: Iterable<[string, string]>): string {
  let out = '';
  for (const [key, value] of entries) {
    out += `${key}=${value}\n`;
  }
  return out;
}

/** Read a key/value file; a missing file yields null. */
export async function readKeyValueFile(path: string): Promise<Map<string, string> | null> {
  try {
    return parseKeyValue(await readFile(path, 'utf-8'));
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/** Replace the file in one step so readers never see a partial write. */
export async function writeKeyValueFile(path: string, entries: Iterable<[string, string]>): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, serializeKeyValue(entries), 'utf-8');
  await rename(tmp, path);
}

export function parseEpochSeconds(value: string | undefined): number {
  if (value === undefined) return 0;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) && n > 0 ? n : 0;
}
