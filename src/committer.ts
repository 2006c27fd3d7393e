import fs from 'fs';
import path from 'path';
import { InternalConsistencyError, PlanError, describeError } from './errors.js';
import { log } from './logging.js';
import type { RenameEntry } from './types.js';

export interface CommitFailure {
  index: number;
  original: string;
  error: PlanError;
}

export interface CommitReport {
  renamed: number;
  deleted: number;
  skipped: number;
  failures: CommitFailure[];
}

function movePath(from: string, to: string) {
  const existing = fs.lstatSync(to, { throwIfNoEntry: false });
  if (existing) {
    // Same inode means a case-only rename on a case-insensitive filesystem.
    const source = fs.lstatSync(from);
    if (existing.ino !== source.ino || existing.dev !== source.dev) {
      throw new PlanError('FilesystemError', `Target '${to}' already exists.`);
    }
  }
  fs.renameSync(from, to);
}

function removePath(p: string) {
  const st = fs.lstatSync(p);
  if (st.isFile() || st.isSymbolicLink()) {
    fs.unlinkSync(p);
  } else if (st.isDirectory()) {
    fs.rmSync(p, { recursive: true });
  } else {
    throw new InternalConsistencyError(`Path '${p}' is not a file, link, or directory.`);
  }
}

/**
 * Apply a plan in index order. A failing entry is recorded and the rest still run;
 * nothing already applied is rolled back.
 */
export function commitPlan(entries: readonly RenameEntry[], basePath: string): CommitReport {
  const report: CommitReport = { renamed: 0, deleted: 0, skipped: 0, failures: [] };
  entries.forEach((entry, index) => {
    const originalPath = path.join(basePath, entry.original);
    if (entry.action === 'ignore' || (entry.action === 'rename' && entry.proposed === entry.original)) {
      report.skipped++;
      return;
    }
    try {
      if (entry.action === 'rename') {
        const target = path.join(basePath, entry.proposed);
        log('info', `commit - rename: ${originalPath} -> ${target}`);
        movePath(originalPath, target);
        report.renamed++;
      } else {
        log('info', `commit - delete: ${originalPath}`);
        removePath(originalPath);
        report.deleted++;
      }
    } catch (e) {
      if (e instanceof InternalConsistencyError) throw e;
      const error = e instanceof PlanError
        ? e
        : new PlanError('FilesystemError', `${entry.action} of '${entry.original}' failed: ${describeError(e)}`, { cause: e });
      log('error', `commit - index ${index} failed: ${error.message}`);
      report.failures.push({ index, original: entry.original, error });
    }
  });
  return report;
}
