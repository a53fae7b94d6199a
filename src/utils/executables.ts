import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

function isExecutableFile(p: string): boolean {
  try {
    const st = fs.statSync(p);
    if (!st.isFile()) return false;
    if (os.platform() === 'win32') return true;
    fs.accessSync(p, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function pathExtCandidates(name: string, env: NodeJS.ProcessEnv): string[] {
  if (os.platform() !== 'win32') return [name];
  const exts = String(env.PATHEXT ?? '.COM;.EXE;.BAT;.CMD')
    .split(';')
    .map((x) => x.trim())
    .filter(Boolean);
  return [name, ...exts.map((x) => `${name}${x}`)];
}

/**
 * Resolve a command name to an executable path using PATH, like `command -v`.
 * Names containing a path separator are checked directly.
 */
export function resolveExecutable(cmd: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const c = cmd.trim();
  if (!c) return null;

  if (c.includes('/') || c.includes('\\')) {
    const abs = path.resolve(c);
    return isExecutableFile(abs) ? abs : null;
  }

  const dirs = String(env.PATH ?? '')
    .split(path.delimiter)
    .map((d) => d.trim())
    .filter(Boolean);

  for (const dir of dirs) {
    for (const name of pathExtCandidates(c, env)) {
      const candidate = path.join(dir, name);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}

export function hasExecutable(cmd: string, env?: NodeJS.ProcessEnv): boolean {
  return resolveExecutable(cmd, env) !== null;
}
