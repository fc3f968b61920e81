import { CompletionCandidate, SYMBOL_KINDS } from '../domain/entities';

export type MatchMode = 'contains' | 'prefix';

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Lowercase text first; exact text and kind only break ties.
export function compareCandidates(a: CompletionCandidate, b: CompletionCandidate): number {
  return (
    compareStrings(a.text.toLowerCase(), b.text.toLowerCase()) ||
    compareStrings(a.text, b.text) ||
    SYMBOL_KINDS.indexOf(a.kind) - SYMBOL_KINDS.indexOf(b.kind)
  );
}

export function dedupeCandidates(candidates: CompletionCandidate[]): CompletionCandidate[] {
  const seen = new Set<string>();
  return candidates.filter((c) => {
    const key = `${c.kind}\u0000${c.text}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Keeps the candidates matching `prefix` (case-insensitive) and orders them in
 * two tiers: those starting with the prefix, then those merely containing it.
 * Each tier is sorted by `compareCandidates`.
 */
export function rankCandidates(
  candidates: CompletionCandidate[],
  prefix: string,
  mode: MatchMode = 'contains',
): CompletionCandidate[] {
  const needle = prefix.toLowerCase();
  const starting: CompletionCandidate[] = [];
  const containing: CompletionCandidate[] = [];

  for (const candidate of dedupeCandidates(candidates)) {
    const haystack = candidate.text.toLowerCase();
    if (haystack.startsWith(needle)) {
      starting.push(candidate);
    } else if (mode === 'contains' && haystack.includes(needle)) {
      containing.push(candidate);
    }
  }

  return [...starting.sort(compareCandidates), ...containing.sort(compareCandidates)];
}
