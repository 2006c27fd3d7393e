import path from 'path';
import { commitPlan } from './committer.js';
import { PlanError } from './errors.js';
import { log } from './logging.js';
import { type NumberSource, buildPlan } from './planner.js';
import { assertDirectory, scanDirectory } from './scan.js';
import { compileNumberPattern } from './tokens.js';
import type { Classification, EntryAction, PlanSession, ScannedEntry, SessionOptions } from './types.js';

function rebuild(session: PlanSession, scanned: readonly ScannedEntry[], source: NumberSource): PlanSession {
  const { entries, nextCounter } = buildPlan(scanned, {
    baseName: session.baseName,
    classification: session.classification,
    preserveConforming: session.options.preserveConforming,
  }, source);
  return { ...session, entries, nextCounter };
}

export function openSession(basePath: string, options: SessionOptions): PlanSession {
  const resolved = path.resolve(basePath);
  assertDirectory(resolved);
  const session: PlanSession = {
    basePath: resolved,
    baseName: path.basename(resolved),
    classification: 'None',
    entries: [],
    nextCounter: 1n,
    options,
  };
  return reload(session);
}

/** Re-scan the directory and rebuild every entry with the default grammar. */
export function reload(session: PlanSession): PlanSession {
  const regex = compileNumberPattern(session.options.numberPattern);
  const next = rebuild(session, scanDirectory(session.basePath), { regex, scope: 'stem' });
  log('debug', `reload: ${session.basePath} -> ${next.entries.length} entries, next counter ${next.nextCounter}`);
  return next;
}

/**
 * Rebuild the plan for the current entry list with an operator pattern, searched in each
 * full name. Prior edits, ignores and deletions are discarded.
 */
export function bulk(session: PlanSession, pattern: string): PlanSession {
  const regex = compileNumberPattern(pattern);
  const scanned = session.entries.map(e => ({ name: e.original, kind: e.kind }));
  const next = rebuild(session, scanned, { regex, scope: 'name' });
  log('debug', `bulk: '${pattern}' over ${scanned.length} entries`);
  return next;
}

const CLASSIFICATIONS: Record<string, Classification> = {
  n: 'None', none: 'None',
  s: 'Series', series: 'Series',
  c: 'Chapter', chapter: 'Chapter',
};

export function parseClassification(input: string): Classification {
  const key = input.trim().toLowerCase();
  if (!key) throw new PlanError('MissingArgument', 'No type specified: (n)one, (s)eries, or (c)hapter.');
  const kind = Object.prototype.hasOwnProperty.call(CLASSIFICATIONS, key) ? CLASSIFICATIONS[key] : undefined;
  if (!kind) throw new PlanError('InvalidArgument', `Unknown type '${input.trim()}'.`);
  return kind;
}

/** Names are not regenerated; run reload or bulk afterwards. */
export function setClassification(session: PlanSession, input: string): PlanSession {
  return { ...session, classification: parseClassification(input) };
}

export function assertAddressable(session: PlanSession, index: number) {
  const count = session.entries.length;
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new PlanError('InvalidIndex', `Index (${index}) out of range [0, ${count}).`);
  }
  if (session.entries[index].action === 'ignore') {
    throw new PlanError('InvalidIndex', `Index ${index} is ignored.`);
  }
}

/** Split a leading integer off `arg` and check it addresses a live entry. */
export function parseIndexArgument(session: PlanSession, arg: string) {
  const text = arg.trim();
  if (!text) throw new PlanError('MissingArgument', 'Expecting index.');
  const m = /^(-?\d+)/.exec(text);
  if (!m) throw new PlanError('InvalidIndex', `Expecting index, got '${text}'.`);
  const index = Number.parseInt(m[1], 10);
  assertAddressable(session, index);
  return { index, rest: text.slice(m[1].length).trim() };
}

export function changeDirectory(session: PlanSession, target: string): PlanSession {
  const text = target.trim();
  if (!text) throw new PlanError('MissingArgument', 'No directory specified.');
  let resolved: string;
  if (/^\d+$/.test(text) && Number(text) < session.entries.length) {
    const index = Number(text);
    assertAddressable(session, index);
    resolved = path.join(session.basePath, session.entries[index].original);
  } else {
    resolved = path.resolve(session.basePath, text);
  }
  const next = openSession(resolved, session.options);
  log('info', `changeDirectory: ${session.basePath} -> ${next.basePath}`);
  return next;
}

function withEntry(session: PlanSession, index: number, proposed: string | undefined, action: EntryAction): PlanSession {
  const entries = session.entries.map((e, i) => (i === index ? { ...e, proposed: proposed ?? e.proposed, action } : e));
  return { ...session, entries };
}

function assertPlainName(name: string) {
  if (name === '.' || name === '..' || /[/\\\0]/.test(name)) {
    throw new PlanError('InvalidArgument', `'${name}' is not a plain file name.`);
  }
}

export function editEntry(session: PlanSession, index: number, newName: string): PlanSession {
  assertAddressable(session, index);
  const name = newName.trim();
  if (!name) throw new PlanError('MissingArgument', 'No new name specified.');
  assertPlainName(name);
  return withEntry(session, index, name, 'rename');
}

export function ignoreEntry(session: PlanSession, index: number): PlanSession {
  assertAddressable(session, index);
  return withEntry(session, index, undefined, 'ignore');
}

export function deleteEntry(session: PlanSession, index: number): PlanSession {
  assertAddressable(session, index);
  return withEntry(session, index, undefined, 'delete');
}

/** Apply the plan to disk. The session no longer matches the directory afterwards. */
export function commitSession(session: PlanSession) {
  return commitPlan(session.entries, session.basePath);
}
