import { PlanError, describeError } from './errors.js';
import type { NumberToken } from './types.js';

// digits, optional "-digits" range end, optional single lowercase suffix
const NUMBER_TOKEN_RE = /^(\d+)(?:-(\d+))?([a-z])?/;

/** Default grammar used when a directory is (re)loaded. */
export const DEFAULT_NUMBER_PATTERN = '(\\d+(?:-\\d+)?[a-z]?)';

const PAD_WIDTH = 3;

function pad(n: bigint) { return String(n).padStart(PAD_WIDTH, '0'); }

/**
 * Parse a number token at the start of `text` (after trimming). Anything after the token
 * is ignored, so `"12b extra"` parses as `12b`.
 */
export function parseToken(text: string): NumberToken | undefined {
  const m = NUMBER_TOKEN_RE.exec(String(text).trim());
  if (!m) return undefined;
  const token: NumberToken = { value: BigInt(m[1]) };
  if (m[2] !== undefined) token.rangeEnd = BigInt(m[2]);
  if (m[3] !== undefined) token.suffix = m[3];
  return token;
}

export function formatToken(token: NumberToken) {
  let text = pad(token.value);
  if (token.rangeEnd !== undefined) text += `-${pad(token.rangeEnd)}`;
  if (token.suffix) text += token.suffix;
  return text;
}

export function highestValue(token: NumberToken) {
  const end = token.rangeEnd ?? token.value;
  return end > token.value ? end : token.value;
}

function captureGroupCount(re: RegExp) {
  // An empty alternative always matches "", exposing every group slot.
  const m = new RegExp(`${re.source}|`).exec('');
  return m ? m.length - 1 : 0;
}

/**
 * Compile an operator-supplied extraction pattern. The pattern must contain exactly one
 * capture group, which selects the number text.
 */
export function compileNumberPattern(pattern: string): RegExp {
  if (!pattern.trim()) throw new PlanError('InvalidPattern', 'Found no pattern for bulk rename.');
  let re: RegExp;
  try {
    re = new RegExp(pattern, 'g');
  } catch (e) {
    throw new PlanError('InvalidPattern', `Pattern '${pattern}' does not compile: ${describeError(e)}`, { cause: e });
  }
  const groups = captureGroupCount(re);
  if (groups !== 1) {
    throw new PlanError('InvalidPattern', `Pattern '${pattern}' must have exactly one capture group (found ${groups}).`);
  }
  return re;
}

/**
 * Search `text` with a compiled pattern and parse the capture of the last match.
 * Earlier numbers in a name (years, resolutions) lose to the one closest to the end.
 */
export function extractToken(text: string, re: RegExp): NumberToken | undefined {
  const global = re.global ? re : new RegExp(re.source, `${re.flags}g`);
  let captured: string | undefined;
  let matched = false;
  for (const m of text.matchAll(global)) {
    matched = true;
    captured = m[1];
  }
  if (!matched || captured === undefined) return undefined;
  return parseToken(captured);
}
