import { CompletionCandidate } from '../domain/entities';
import { compareCandidates, dedupeCandidates, rankCandidates } from './sorter';

describe('sorter', () => {
  describe('compareCandidates', () => {
    it('should compare by lowercase text first', () => {
      expect(compareCandidates({ kind: 'type', text: 'FILE' }, { kind: 'function', text: 'fopen' })).toBeLessThan(0);
      expect(compareCandidates({ kind: 'function', text: 'free' }, { kind: 'type', text: 'FILE' })).toBeGreaterThan(0);
    });

    it('should break ties by exact text and then kind', () => {
      expect(compareCandidates({ kind: 'type', text: 'Point' }, { kind: 'type', text: 'point' })).toBeLessThan(0);
      expect(compareCandidates({ kind: 'keyword', text: 'int' }, { kind: 'type', text: 'int' })).toBeLessThan(0);
      expect(compareCandidates({ kind: 'type', text: 'int' }, { kind: 'type', text: 'int' })).toBe(0);
    });
  });

  describe('dedupeCandidates', () => {
    it('should drop repeated kind/text pairs but keep the same text under another kind', () => {
      const result = dedupeCandidates([
        { kind: 'function', text: 'printf' },
        { kind: 'snippet', text: 'printf' },
        { kind: 'function', text: 'printf' },
      ]);
      expect(result).toEqual([
        { kind: 'function', text: 'printf' },
        { kind: 'snippet', text: 'printf' },
      ]);
    });
  });

  describe('rankCandidates', () => {
    const pool: CompletionCandidate[] = [
      { kind: 'function', text: 'sprintf' },
      { kind: 'function', text: 'printf' },
      { kind: 'function', text: 'fprintf' },
      { kind: 'variable', text: 'PRIORITY' },
      { kind: 'function', text: 'puts' },
    ];

    it('should rank prefix matches before contains-only matches', () => {
      expect(rankCandidates(pool, 'pri').map((c) => c.text)).toEqual([
        'printf',
        'PRIORITY',
        'fprintf',
        'sprintf',
      ]);
    });

    it('should drop contains-only matches in prefix mode', () => {
      expect(rankCandidates(pool, 'pri', 'prefix').map((c) => c.text)).toEqual(['printf', 'PRIORITY']);
    });

    it('should return an empty list when nothing matches', () => {
      expect(rankCandidates(pool, 'zz')).toEqual([]);
    });
  });
});
