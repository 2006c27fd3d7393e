import type { PlanSession } from './types.js';

export const CHECKMARK = '✓';

export type EntryMarker = 'R' | typeof CHECKMARK | 'I' | 'D';

export interface ListingRow {
  index: number;
  marker: EntryMarker;
  original: string;
  /** Only set for entries that will be renamed */
  proposed?: string;
}

export function describePlan(session: PlanSession): ListingRow[] {
  return session.entries.map((e, index): ListingRow => {
    if (e.action === 'ignore') return { index, marker: 'I', original: e.original };
    if (e.action === 'delete') return { index, marker: 'D', original: e.original };
    const marker = e.proposed === e.original ? CHECKMARK : 'R';
    return { index, marker, original: e.original, proposed: e.proposed };
  });
}

export function formatListing(session: PlanSession) {
  const lines = [`${session.basePath} (${session.classification})`];
  for (const row of describePlan(session)) {
    const head = `    ${String(row.index).padStart(3, '0')} (${row.marker}) '${row.original}'`;
    lines.push(row.proposed === undefined ? head : `${head} -> '${row.proposed}'`);
  }
  return lines;
}

export function formatHelp(commands: readonly { name: string; summary: readonly string[] }[]) {
  const lines: string[] = [];
  for (const c of commands) {
    c.summary.forEach((text, i) => {
      lines.push(i === 0 ? `${c.name.padEnd(8)} - ${text}` : `${' '.repeat(11)}${text}`);
    });
  }
  return lines;
}
