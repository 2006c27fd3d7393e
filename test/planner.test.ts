import { describe, it, expect } from 'vitest';
import { type NumberSource, type PlanTemplate, buildEntry, buildPlan } from '../src/planner.js';
import { DEFAULT_NUMBER_PATTERN, compileNumberPattern } from '../src/tokens.js';
import type { Classification, ScannedEntry } from '../src/types.js';

const DEFAULT_SOURCE: NumberSource = { regex: compileNumberPattern(DEFAULT_NUMBER_PATTERN), scope: 'stem' };

function template(classification: Classification, preserveConforming = false): PlanTemplate {
  return { baseName: 'X', classification, preserveConforming };
}

function files(...names: string[]): ScannedEntry[] {
  return names.map(name => ({ name, kind: 'file' }));
}

describe('buildPlan', () => {
  it('numbers unnumbered pages in scan order', () => {
    const plan = buildPlan(files('a.jpg', 'b.jpg', 'c.jpg'), template('Chapter'), DEFAULT_SOURCE);
    expect(plan.entries).toEqual([
      { original: 'a.jpg', kind: 'file', proposed: 'X p001.jpg', action: 'rename' },
      { original: 'b.jpg', kind: 'file', proposed: 'X p002.jpg', action: 'rename' },
      { original: 'c.jpg', kind: 'file', proposed: 'X p003.jpg', action: 'rename' },
    ]);
    expect(plan.nextCounter).toBe(4n);
  });

  it('gives a run of unnumbered names consecutive numbers', () => {
    const plan = buildPlan(files('a.png', 'b.png', 'c.png', 'd.png', 'e.png'), template('Chapter'), DEFAULT_SOURCE);
    expect(plan.entries.map(e => e.proposed)).toEqual(['X p001.png', 'X p002.png', 'X p003.png', 'X p004.png', 'X p005.png']);
  });

  it('keeps names under None but still advances the counter', () => {
    const plan = buildPlan(files('a.jpg', 'b.jpg'), template('None'), DEFAULT_SOURCE);
    expect(plan.entries.map(e => e.proposed)).toEqual(['a.jpg', 'b.jpg']);
    expect(plan.nextCounter).toBe(3n);
  });

  it('uses the chapter marker for Series', () => {
    const plan = buildPlan(files('bar.cbz', 'foo.cbz'), template('Series'), DEFAULT_SOURCE);
    expect(plan.entries.map(e => e.proposed)).toEqual(['X c001.cbz', 'X c002.cbz']);
  });

  it('takes numbers found in names and moves the counter past them', () => {
    const plan = buildPlan(files('page 2.jpg', 'page 5.jpg', 'zz.jpg'), template('Chapter'), DEFAULT_SOURCE);
    expect(plan.entries.map(e => e.proposed)).toEqual(['X p002.jpg', 'X p005.jpg', 'X p006.jpg']);
    expect(plan.nextCounter).toBe(7n);
  });

  it('keeps ranges and advances past their end', () => {
    const plan = buildPlan(files('spread 7-8.png'), template('Chapter'), DEFAULT_SOURCE);
    expect(plan.entries[0].proposed).toBe('X p007-008.png');
    expect(plan.nextCounter).toBe(9n);
  });

  it('counts on from a long numeric id without losing precision', () => {
    const plan = buildPlan(files('img_1234567890123456789012.jpg', 'a.jpg', 'b.jpg'), template('Chapter'), DEFAULT_SOURCE);
    expect(plan.entries.map(e => e.proposed)).toEqual([
      'X p1234567890123456789012.jpg',
      'X p1234567890123456789013.jpg',
      'X p1234567890123456789014.jpg',
    ]);
    expect(plan.nextCounter).toBe(1234567890123456789015n);
  });

  it('ignores digits in the extension', () => {
    const plan = buildPlan(files('clip.mp4'), template('Chapter'), DEFAULT_SOURCE);
    expect(plan.entries[0].proposed).toBe('X p001.mp4');
  });

  it('gives directories no extension', () => {
    const plan = buildPlan([{ name: 'Chapter 12', kind: 'directory' }], template('Series'), DEFAULT_SOURCE);
    expect(plan.entries[0].proposed).toBe('X c012');
  });

  it('keeps dotted directory names whole', () => {
    const plan = buildPlan([{ name: 'Vol 1.5', kind: 'directory' }], template('Series'), DEFAULT_SOURCE);
    expect(plan.entries[0].proposed).toBe('X c005');
  });

  it('leaves conforming names alone when asked to', () => {
    const scanned = files('X v001 c002 p007.jpg', 'z.jpg');
    const preserved = buildPlan(scanned, template('Chapter', true), DEFAULT_SOURCE);
    expect(preserved.entries.map(e => e.proposed)).toEqual(['X v001 c002 p007.jpg', 'X p008.jpg']);

    const rewritten = buildPlan(scanned, template('Chapter'), DEFAULT_SOURCE);
    expect(rewritten.entries.map(e => e.proposed)).toEqual(['X p007.jpg', 'X p008.jpg']);
  });
});

describe('buildEntry', () => {
  it('falls back to the counter it is given', () => {
    expect(buildEntry({ name: 'a.jpg', kind: 'file' }, 4n, template('Chapter'), DEFAULT_SOURCE)).toEqual({ proposed: 'X p004.jpg', highest: 4n });
  });

  it('searches the full name for operator patterns', () => {
    const entry: ScannedEntry = { name: 'p3 (2021).jpg', kind: 'file' };
    const source: NumberSource = { regex: compileNumberPattern('p(\\d+)'), scope: 'name' };
    expect(buildEntry(entry, 1n, template('Chapter'), source)).toEqual({ proposed: 'X p003.jpg', highest: 3n });
    expect(buildEntry(entry, 1n, template('Chapter'), DEFAULT_SOURCE)).toEqual({ proposed: 'X p2021.jpg', highest: 2021n });
  });
});
