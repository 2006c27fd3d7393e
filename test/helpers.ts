import fs from 'fs';
import os from 'os';
import path from 'path';
import { PlanError, type PlanErrorKind } from '../src/errors.js';
import { DEFAULT_NUMBER_PATTERN } from '../src/tokens.js';
import type { SessionOptions } from '../src/types.js';

export const OPTIONS: SessionOptions = { numberPattern: DEFAULT_NUMBER_PATTERN, preserveConforming: false };

/** Create a throwaway directory holding `files` (content = name) and empty `dirs`. */
export function makeDir(files: string[], dirs: string[] = []) {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'folio-'));
  for (const f of files) fs.writeFileSync(path.join(root, f), f);
  for (const d of dirs) fs.mkdirSync(path.join(root, d));
  return root;
}

export function removeDir(root: string) {
  fs.rmSync(root, { recursive: true, force: true });
}

export function listDir(root: string) {
  return fs.readdirSync(root).sort();
}

export function errorKind(fn: () => unknown): PlanErrorKind | 'other' | undefined {
  try {
    fn();
  } catch (e) {
    return e instanceof PlanError ? e.kind : 'other';
  }
  return undefined;
}
