import { isEafError } from '../../errors';
import { configureSettings, settingsStore } from '../../stores/settings-store';
import type { Eaf } from '../../types/elan';
import { alignableAnnotation, referredAnnotation } from './annotation';
import { createEaf } from './eaf-document';
import { merge, resolveOverlaps, unionByValue } from './eaf-merger';
import { validateEaf } from './eaf-validate';
import { createTier } from './tier';
import { spanDoc, thrown, wordsDoc } from './__fixtures__/documents';

/** Main tier "m" with one annotation split into a two-token run on tier "tok", same ids every time */
function tokenDoc(start: number, end: number, words: [string, string]): Eaf {
  return createEaf({
    timeOrder: [
      { id: 'ts1', value: start },
      { id: 'ts2', value: end },
    ],
    tiers: [
      createTier('m', [alignableAnnotation('a1', 'ts1', 'ts2', words.join(' '))]),
      createTier('tok', [referredAnnotation('r1', 'a1', words[0]), referredAnnotation('r2', 'a1', words[1], 'r1')], {
        parentRef: 'm',
        linguisticTypeRef: 'tok-lt',
      }),
    ],
    linguisticTypes: [
      { id: 'default-lt', timeAlignable: true, graphicReferences: false },
      { id: 'tok-lt', timeAlignable: false, constraints: 'Symbolic_Subdivision', graphicReferences: false },
    ],
  });
}

describe('merge', () => {
  afterEach(() => settingsStore.getState().reset());

  it('joins tiers with the same id and regenerates the time order', () => {
    const first = spanDoc('speaker1', [['one', 0, 100], ['three', 400, 500], ['five', 800, 900]], 'x');
    const second = spanDoc('speaker1', [['two', 200, 300], ['four', 600, 700]], 'y');
    const doc = merge([first, second]);

    expect(doc.tiers).toHaveLength(1);
    expect(doc.tiers[0].annotations.map((a) => [a.id, a.value, a.start])).toEqual([
      ['a1', 'one', 0],
      ['a2', 'two', 200],
      ['a3', 'three', 400],
      ['a4', 'four', 600],
      ['a5', 'five', 800],
    ]);
    expect(doc.timeOrder).toHaveLength(10);
    expect(doc.timeOrder.map((ts) => ts.id)).toEqual(Array.from({ length: 10 }, (_, i) => `ts${i + 1}`));
    expect(doc.timeOrder.map((ts) => ts.value)).toEqual([0, 100, 200, 300, 400, 500, 600, 700, 800, 900]);
  });

  it('gives colliding ids distinct identities', () => {
    const doc = merge([spanDoc('left', [['l', 0, 100]]), spanDoc('right', [['r', 0, 100]])]);
    const ids = doc.tiers.flatMap((t) => t.annotations.map((a) => a.id));
    expect(ids).toEqual(['a1', 'a2']);
    expect(doc.tiers.map((t) => t.id)).toEqual(['left', 'right']);
  });

  it('keeps parent and token references apart when both inputs use the same ids', () => {
    const doc = merge([tokenDoc(0, 500, ['good', 'day']), tokenDoc(1000, 1500, ['bye', 'now'])]);

    expect(doc.tiers.map((t) => t.id)).toEqual(['m', 'tok']);
    expect(doc.tiers[0].annotations.map((a) => [a.id, a.value])).toEqual([
      ['a1', 'good day'],
      ['a2', 'bye now'],
    ]);
    expect(
      doc.tiers[1].annotations.map((a) =>
        a.kind === 'referred' ? [a.id, a.annotationRef, a.previousAnnotation ?? null, a.value, a.start] : [a.id]
      )
    ).toEqual([
      ['a3', 'a1', null, 'good', 0],
      ['a4', 'a1', 'a3', 'day', 0],
      ['a5', 'a2', null, 'bye', 1000],
      ['a6', 'a2', 'a5', 'now', 1000],
    ]);
    expect(() => validateEaf(doc)).not.toThrow();
  });

  it('sorts the time order with unaligned slots next to their annotation', () => {
    const subdivided = createEaf({
      timeOrder: [
        { id: 'ts1', value: 0 },
        { id: 'ts2', value: 1000 },
        { id: 'ts3', value: null },
      ],
      tiers: [
        createTier('m', [alignableAnnotation('a1', 'ts1', 'ts2', 'whole')]),
        createTier(
          'sub',
          [alignableAnnotation('a2', 'ts1', 'ts3', 'first'), alignableAnnotation('a3', 'ts3', 'ts2', 'second')],
          { parentRef: 'm', linguisticTypeRef: 'sub-lt' }
        ),
      ],
      linguisticTypes: [
        { id: 'default-lt', timeAlignable: true, graphicReferences: false },
        { id: 'sub-lt', timeAlignable: true, constraints: 'Time_Subdivision', graphicReferences: false },
      ],
    });
    const doc = merge([subdivided, spanDoc('m', [['later', 2000, 3000]], 'z')]);

    expect(doc.timeOrder.map((ts) => ts.value)).toEqual([0, 0, null, null, 1000, 1000, 2000, 3000]);
    expect(doc.tiers[1].annotations.map((a) => [a.value, a.start, a.end])).toEqual([
      ['first', 0, null],
      ['second', null, 1000],
    ]);
  });

  it('carries referred tiers along with their parents', () => {
    const doc = merge([wordsDoc(), spanDoc('words', [['again', 2000, 2500]], 'z')]);

    expect(doc.tiers.map((t) => t.id)).toEqual(['translit', 'words']);
    const [translit, words] = doc.tiers;
    expect(words.annotations.map((a) => [a.id, a.value])).toEqual([
      ['a2', 'hello'],
      ['a3', 'world'],
      ['a4', 'again'],
    ]);
    expect(translit.annotations[0]).toMatchObject({ id: 'a1', annotationRef: 'a2', start: 0, end: 500 });
    expect(doc.linguisticTypes.map((lt) => lt.id)).toEqual(['default-lt', 'translit-lt']);
    expect(doc.constraints).toHaveLength(4);
  });

  it('fails on overlapping annotations by default', () => {
    const err = thrown(() => merge([spanDoc('t', [['a', 0, 500]]), spanDoc('t', [['b', 300, 800]])]));
    expect(isEafError(err, 'AnnotationOverlap')).toBe(true);
  });

  it('ends the earlier annotation where the later one starts', () => {
    const doc = merge([spanDoc('t', [['a', 0, 500]]), spanDoc('t', [['b', 300, 800]])], {
      overlap: 'prioritize-first',
    });
    expect(doc.tiers[0].annotations.map((a) => [a.value, a.start, a.end])).toEqual([
      ['a', 0, 300],
      ['b', 300, 800],
    ]);
  });

  it('starts the later annotation where the earlier one ends, using the configured strategy', () => {
    configureSettings({ overlapStrategy: 'prioritize-last' });
    const doc = merge([spanDoc('t', [['a', 0, 500]]), spanDoc('t', [['b', 300, 800]])]);
    expect(doc.tiers[0].annotations.map((a) => [a.value, a.start, a.end])).toEqual([
      ['a', 0, 500],
      ['b', 500, 800],
    ]);
  });

  it('rejects nothing to merge', () => {
    expect(isEafError(thrown(() => merge([])), 'NoData')).toBe(true);
  });

  it('rejects a tier that is main in one document and referred in another', () => {
    const referred = createEaf({
      timeOrder: [
        { id: 'ts1', value: 0 },
        { id: 'ts2', value: 100 },
      ],
      tiers: [
        createTier('top', [alignableAnnotation('a1', 'ts1', 'ts2', 'x')]),
        createTier('t', [referredAnnotation('a2', 'a1', 'y')], { parentRef: 'top' }),
      ],
    });
    const err = thrown(() => merge([spanDoc('t', [['a', 0, 100]]), referred]));
    expect(isEafError(err, 'TierTypeMismatch')).toBe(true);
  });
});

describe('resolveOverlaps', () => {
  it('rejects a trim that would empty an annotation', () => {
    const tier = createTier('t', [
      { ...alignableAnnotation('a1', 'ts1', 'ts2', 'long'), start: 0, end: 1000 },
      { ...alignableAnnotation('a2', 'ts3', 'ts4', 'inner'), start: 200, end: 300 },
    ]);
    expect(isEafError(thrown(() => resolveOverlaps(tier, 'prioritize-last')), 'AnnotationOverlap')).toBe(true);
    expect(resolveOverlaps(tier, 'prioritize-first').annotations.map((a) => [a.start, a.end])).toEqual([
      [0, 200],
      [200, 300],
    ]);
  });

  it('rejects ending an annotation before it starts', () => {
    const tier = createTier('t', [
      { ...alignableAnnotation('a1', 'ts1', 'ts2', 'x'), start: 100, end: 400 },
      { ...alignableAnnotation('a2', 'ts3', 'ts4', 'y'), start: 100, end: 200 },
    ]);
    expect(isEafError(thrown(() => resolveOverlaps(tier, 'prioritize-first')), 'AnnotationOverlap')).toBe(true);
  });

  it('leaves touching annotations alone', () => {
    const tier = createTier('t', [
      { ...alignableAnnotation('a1', 'ts1', 'ts2', 'x'), start: 0, end: 100 },
      { ...alignableAnnotation('a2', 'ts3', 'ts4', 'y'), start: 100, end: 200 },
    ]);
    expect(resolveOverlaps(tier, 'fail')).toBe(tier);
  });
});

describe('unionByValue', () => {
  it('keeps the first of entries that are equal by value', () => {
    const merged = unionByValue([
      [{ languageCode: 'en' }, { languageCode: 'sv', countryCode: 'SE' }],
      [{ countryCode: 'SE', languageCode: 'sv' }, { languageCode: 'de' }],
    ]);
    expect(merged).toEqual([{ languageCode: 'en' }, { languageCode: 'sv', countryCode: 'SE' }, { languageCode: 'de' }]);
  });
});
