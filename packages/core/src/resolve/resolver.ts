/**
 * Candidate resolver.
 *
 * Picks exactly one identifier from a candidate set. Matching is exact and
 * case-sensitive; there is no prefix or fuzzy matching.
 */

import type { KindLabel, Resolution } from './types.js';

export function resolve(
  hint: string | undefined,
  candidates: readonly string[],
  label: KindLabel,
): Resolution<string> {
  if (candidates.length === 0) {
    return { ok: false, error: { kind: 'not_found', label } };
  }

  if (hint !== undefined) {
    if (candidates.includes(hint)) {
      return { ok: true, value: hint };
    }
    return { ok: false, error: { kind: 'no_match', label, hint, available: [...candidates] } };
  }

  if (candidates.length === 1) {
    return { ok: true, value: candidates[0] };
  }
  return { ok: false, error: { kind: 'ambiguous', label, available: [...candidates] } };
}

/**
 * Resolve over records rather than bare ids. The first record carrying the
 * resolved id wins.
 */
export function resolveCandidate<T>(
  hint: string | undefined,
  candidates: readonly T[],
  idOf: (candidate: T) => string,
  label: KindLabel,
): Resolution<T> {
  const result = resolve(hint, candidates.map(idOf), label);
  if (!result.ok) return result;

  const match = candidates.find((candidate) => idOf(candidate) === result.value);
  if (match === undefined) {
    // resolve() only returns ids taken from the list
    throw new Error(`Resolved ${label} "${result.value}" is missing from its candidate list.`);
  }
  return { ok: true, value: match };
}
