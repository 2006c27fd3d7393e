export type Classification = 'None' | 'Series' | 'Chapter';

export type EntryAction = 'rename' | 'ignore' | 'delete';

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface NumberToken {
  value: bigint;
  rangeEnd?: bigint;
  /** Single lowercase letter following the number, e.g. the `b` in `12b` */
  suffix?: string;
}

export interface ScannedEntry {
  name: string;
  kind: EntryKind;
}

export interface RenameEntry {
  original: string;
  kind: EntryKind;
  proposed: string;
  action: EntryAction;
}

export interface SessionOptions {
  /** Single-capture-group pattern used by reload */
  numberPattern: string;
  /** Keep names that already follow the series/volume/chapter convention */
  preserveConforming: boolean;
}

export interface PlanSession {
  basePath: string;
  baseName: string;
  classification: Classification;
  entries: readonly RenameEntry[];
  nextCounter: bigint;
  options: SessionOptions;
}
