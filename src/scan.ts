import fs from 'fs';
import path from 'path';
import fg from 'fast-glob';
import { PlanError, describeError } from './errors.js';
import { log } from './logging.js';
import type { EntryKind, ScannedEntry } from './types.js';

type DirentLike = { isDirectory(): boolean; isFile(): boolean; isSymbolicLink(): boolean };

function kindOf(d: DirentLike): EntryKind {
  if (d.isSymbolicLink()) return 'symlink';
  if (d.isDirectory()) return 'directory';
  if (d.isFile()) return 'file';
  return 'other';
}

export function assertDirectory(p: string) {
  const st = fs.statSync(p, { throwIfNoEntry: false });
  if (!st) throw new PlanError('PathError', `Path '${p}' does not exist.`);
  if (!st.isDirectory()) throw new PlanError('PathError', `Path '${p}' is not a directory.`);
}

/** Orders names by Unicode code point, not by UTF-16 code unit. */
export function compareNames(a: string, b: string) {
  const x = Array.from(a);
  const y = Array.from(b);
  const n = Math.min(x.length, y.length);
  for (let i = 0; i < n; i++) {
    const d = (x[i].codePointAt(0) ?? 0) - (y[i].codePointAt(0) ?? 0);
    if (d !== 0) return d;
  }
  return x.length - y.length;
}

function listEntries(root: string) {
  try {
    return fg.sync('*', {
      cwd: root,
      dot: true,
      deep: 1,
      onlyFiles: false,
      objectMode: true,
      followSymbolicLinks: false,
      suppressErrors: false,
    });
  } catch (e) {
    throw new PlanError('PathError', `Cannot read directory '${root}': ${describeError(e)}`, { cause: e });
  }
}

/**
 * List the immediate entries of `basePath`, dotfiles included, sorted by name.
 * Symlinks are reported as links and not followed.
 */
export function scanDirectory(basePath: string): ScannedEntry[] {
  const root = path.resolve(basePath);
  assertDirectory(root);
  const entries = listEntries(root).map(e => ({ name: e.name, kind: kindOf(e.dirent) }));
  entries.sort((a, b) => compareNames(a.name, b.name));
  log('debug', `scanDirectory: ${root} (${entries.length} entries)`);
  return entries;
}
