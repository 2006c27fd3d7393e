export type PlanErrorKind =
  | 'InvalidIndex'
  | 'InvalidPattern'
  | 'MissingArgument'
  | 'InvalidArgument'
  | 'PathError'
  | 'FilesystemError';

/**
 * An operator-recoverable failure. Session operations throw these before touching any
 * state, so the caller's session is still valid when one is caught.
 */
export class PlanError extends Error {
  readonly kind: PlanErrorKind;

  constructor(kind: PlanErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlanError';
    this.kind = kind;
  }
}

/** A scanned entry that is neither file, link nor directory at commit time. */
export class InternalConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalConsistencyError';
  }
}

export function describeError(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}
