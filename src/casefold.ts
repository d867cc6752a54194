/**
 * Case-insensitive hashing and comparison over borrowed strings.
 *
 * Nothing here builds a folded copy of its input: code points are folded one at a
 * time while hashing or comparing. A code point folds to the fixed point of
 * `lower(upper(c))`, which may be several code points (`ß` folds to `ss`, `ﬁ` to `fi`),
 * so two strings can be equal under folding with different lengths.
 *
 * BMP folds are tabled at module load; astral code points are folded on demand.
 *
 * Hashing and comparison take an optional `[start, end)` UTF-16 range of the query
 * string, letting callers skip surrounding characters without slicing.
 */

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

// ── Fold table ──────────────────────────────────────────────────

/** Marks a BMP entry whose fold is several code points; see `BMP_EXPANSIONS`. */
const EXPANDS = -1;

function foldString(cp: number): string {
  let folded = String.fromCodePoint(cp);
  // ẞ → ß → ss takes two rounds
  for (let round = 0; round < 3; round++) {
    const next = folded.toUpperCase().toLowerCase();
    if (next === folded) break;
    folded = next;
  }
  return folded;
}

function toCodePoints(s: string): number[] {
  const out: number[] = [];
  for (const ch of s) out.push(ch.codePointAt(0) ?? 0);
  return out;
}

function computeFold(cp: number): number[] {
  return toCodePoints(foldString(cp));
}

const BMP_FOLD = new Int32Array(0x10000);
const BMP_EXPANSIONS = new Map<number, readonly number[]>();

for (let cp = 0; cp < 0x10000; cp++) {
  // Surrogate halves fold to themselves.
  if (cp >= 0xd800 && cp <= 0xdfff) {
    BMP_FOLD[cp] = cp;
    continue;
  }
  const folded = foldString(cp);
  const first = folded.codePointAt(0) ?? cp;
  if (folded.length === (first > 0xffff ? 2 : 1)) {
    BMP_FOLD[cp] = first;
  } else {
    BMP_FOLD[cp] = EXPANDS;
    BMP_EXPANSIONS.set(cp, toCodePoints(folded));
  }
}

/** Number of code points `cp` folds to. */
function foldedLength(cp: number): number {
  if (cp > 0xffff) return computeFold(cp).length;
  if (BMP_FOLD[cp] !== EXPANDS) return 1;
  return BMP_EXPANSIONS.get(cp)?.length ?? 1;
}

/** The `k`-th code point of the fold of `cp`. */
function foldedUnit(cp: number, k: number): number {
  if (cp > 0xffff) return computeFold(cp)[k] ?? cp;
  const single = BMP_FOLD[cp] ?? cp;
  if (single !== EXPANDS) return single;
  return BMP_EXPANSIONS.get(cp)?.[k] ?? cp;
}

/** Folded form of `cp`. Allocates; the hash and equality walks do not go through here. */
export function foldCodePoint(cp: number): number[] {
  const length = foldedLength(cp);
  const out: number[] = [];
  for (let k = 0; k < length; k++) out.push(foldedUnit(cp, k));
  return out;
}

// ── Iteration ───────────────────────────────────────────────────

/** Code point starting at UTF-16 index `i`, not reading at or past `end`. Lone surrogates are returned as-is. */
function codePointAt(s: string, i: number, end: number): number {
  const high = s.charCodeAt(i);
  if (high >= 0xd800 && high <= 0xdbff && i + 1 < end) {
    const low = s.charCodeAt(i + 1);
    if (low >= 0xdc00 && low <= 0xdfff) {
      return (high - 0xd800) * 0x400 + (low - 0xdc00) + 0x10000;
    }
  }
  return high;
}

function width(cp: number): number {
  return cp > 0xffff ? 2 : 1;
}

// ── Hash / equality ─────────────────────────────────────────────

/** 32-bit FNV-1a over the folded code points of `s.slice(start, end)`. */
export function caseFoldHash(s: string, start = 0, end = s.length): number {
  let hash = FNV_OFFSET;
  for (let i = start; i < end; ) {
    const cp = codePointAt(s, i, end);
    const length = foldedLength(cp);
    for (let k = 0; k < length; k++) {
      hash = Math.imul(hash ^ foldedUnit(cp, k), FNV_PRIME);
    }
    i += width(cp);
  }
  return hash >>> 0;
}

/**
 * Whether `a` equals `b.slice(start, end)` ignoring letter case.
 * Strings equal here hash equal under `caseFoldHash`.
 */
export function caseFoldEquals(a: string, b: string, start = 0, end = b.length): boolean {
  if (start === 0 && end === b.length && a === b) return true;
  // i, j walk code points; k, l walk the fold of the current one
  let i = 0;
  let k = 0;
  let j = start;
  let l = 0;
  while (i < a.length && j < end) {
    const ca = codePointAt(a, i, a.length);
    const cb = codePointAt(b, j, end);
    if (k === 0 && l === 0 && ca === cb) {
      i += width(ca);
      j += width(cb);
      continue;
    }
    if (foldedUnit(ca, k) !== foldedUnit(cb, l)) return false;
    if (++k === foldedLength(ca)) {
      k = 0;
      i += width(ca);
    }
    if (++l === foldedLength(cb)) {
      l = 0;
      j += width(cb);
    }
  }
  return i === a.length && j === end;
}
