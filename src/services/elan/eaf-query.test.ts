import { fromValues } from './eaf-builder';
import { parseEaf } from './eaf-parser';
import { createEaf } from './eaf-document';
import { documentNgrams, documentTokens, query, queryRegex, stats } from './eaf-query';
import { sampleXml } from './__fixtures__/documents';

describe('eaf-query', () => {
  const doc = parseEaf(sampleXml());

  describe('query', () => {
    it('returns matches with their position in the tier', () => {
      expect(query(doc, 'bye')).toEqual([
        { index: 3, tierId: 'utterance', annotationId: 'a3', value: 'bye bye' },
        { index: 1, tierId: 'words', annotationId: 'a7', value: 'bye', annotationRef: 'a3' },
        { index: 2, tierId: 'words', annotationId: 'a8', value: 'bye', annotationRef: 'a3' },
      ]);
    });

    it('matches case sensitively unless asked not to', () => {
      expect(query(doc, 'hello').map((m) => m.annotationId)).toEqual(['a1']);
      expect(query(doc, 'hello', true).map((m) => m.annotationId)).toEqual(['a1', 'a4']);
    });

    it('matches regular expressions', () => {
      expect(queryRegex(doc, /^good/i).map((m) => m.annotationId)).toEqual(['a2', 'a5']);
      expect(queryRegex(doc, /o/g).map((m) => m.annotationId)).toEqual(['a1', 'a2', 'a6']);
    });
  });

  describe('documentTokens', () => {
    it('lists every token sorted', () => {
      expect(documentTokens(doc)).toEqual([
        '&', 'GOOD', 'HELLO', 'MORNING', 'bye', 'bye', 'bye', 'bye', 'good', 'hello', 'hi', 'morning', 'welcome',
      ]);
    });

    it('folds case and removes repeats', () => {
      expect(documentTokens(doc, { unique: true, ignoreCase: true })).toEqual([
        '&', 'bye', 'good', 'hello', 'hi', 'morning', 'welcome',
      ]);
    });

    it('strips affix characters', () => {
      const marked = fromValues([['<hi> *there*', 0, 100]]);
      expect(documentTokens(marked, { stripPrefix: '<*', stripSuffix: '>*' })).toEqual(['hi', 'there']);
    });
  });

  describe('documentNgrams', () => {
    it('sums tier sequences over the whole file', () => {
      expect(Object.fromEntries(documentNgrams(doc, 2))).toEqual({
        'hello good': 2,
        'good morning': 2,
        'morning bye': 1,
        'bye bye': 2,
        'hi &': 1,
        '& welcome': 1,
      });
    });

    it('keeps n-grams inside annotations in annotation scope', () => {
      const counts = documentNgrams(doc, 2, { scope: { kind: 'annotation', tierId: 'utterance' } });
      expect(Object.fromEntries(counts)).toEqual({ 'good morning': 1, 'bye bye': 1 });
    });

    it('crosses annotation boundaries in tier scope', () => {
      const counts = documentNgrams(doc, 2, { scope: { kind: 'tier', tierId: 'utterance' } });
      expect([...counts.keys()]).toEqual(['hello good', 'good morning', 'morning bye', 'bye bye']);
    });

    it('removes matches before counting', () => {
      const counts = documentNgrams(fromValues([['Hello, world.', 0, 100]]), 1, { remove: /[.,]/ });
      expect(Object.fromEntries(counts)).toEqual({ hello: 1, world: 1 });
    });

    it('returns nothing for an unknown tier', () => {
      expect(documentNgrams(doc, 1, { scope: { kind: 'tier', tierId: 'nope' } }).size).toBe(0);
    });
  });

  describe('stats', () => {
    it('counts annotations, tiers and tokens', () => {
      const s = stats(doc);
      expect(s).toMatchObject({ annotationCount: 8, tierCount: 4, tokenCount: 13, averageAnnotationsPerTier: 2 });
      expect(s.averageTokensPerAnnotation).toBeCloseTo(13 / 8);
      expect(s.averageTokenLength).toBeCloseTo(54 / 13);
    });

    it('reports zeros for an empty document', () => {
      expect(stats(createEaf())).toEqual({
        annotationCount: 0,
        tierCount: 0,
        tokenCount: 0,
        averageTokensPerAnnotation: 0,
        averageAnnotationsPerTier: 0,
        averageTokenLength: 0,
      });
    });
  });
});
