import path from 'path';
import { conformsToConvention } from './naming.js';
import { extractToken, formatToken, highestValue } from './tokens.js';
import type { Classification, RenameEntry, ScannedEntry } from './types.js';

export interface PlanTemplate {
  baseName: string;
  classification: Classification;
  preserveConforming: boolean;
}

export interface NumberSource {
  regex: RegExp;
  /** 'stem' searches the name without its extension, 'name' the full name */
  scope: 'stem' | 'name';
}

export interface BuiltName {
  proposed: string;
  highest: bigint;
}

function extensionOf(entry: ScannedEntry) {
  // Dots in a directory name belong to the name: "Vol 1.5" carries no ".5" over.
  return entry.kind === 'directory' ? '' : path.extname(entry.name);
}

export function buildEntry(entry: ScannedEntry, fallbackCounter: bigint, template: PlanTemplate, source: NumberSource): BuiltName {
  const ext = extensionOf(entry);
  const haystack = source.scope === 'stem' && ext ? entry.name.slice(0, -ext.length) : entry.name;
  const token = extractToken(haystack, source.regex) ?? { value: fallbackCounter };
  const highest = highestValue(token);

  if (template.classification === 'None') return { proposed: entry.name, highest };
  if (template.preserveConforming && conformsToConvention(entry)) return { proposed: entry.name, highest };

  const marker = template.classification === 'Series' ? 'c' : 'p';
  return { proposed: `${template.baseName} ${marker}${formatToken(token)}${ext}`, highest };
}

/**
 * Build a fresh plan in the order given. Entries without a usable number take the running
 * counter, which always moves past the highest number used so far.
 */
export function buildPlan(scanned: readonly ScannedEntry[], template: PlanTemplate, source: NumberSource) {
  const entries: RenameEntry[] = [];
  let nextCounter = 1n;
  for (const s of scanned) {
    const built = buildEntry(s, nextCounter, template, source);
    entries.push({ original: s.name, kind: s.kind, proposed: built.proposed, action: 'rename' });
    nextCounter = (built.highest > nextCounter ? built.highest : nextCounter) + 1n;
  }
  return { entries, nextCounter };
}
