import { isEafError } from '../../errors';
import type { DerivedEaf } from '../../types/elan';
import { configureSettings, settingsStore } from '../../stores/settings-store';
import { prepareEaf } from './eaf-derive';
import {
  annotations,
  childTiers,
  createEaf,
  exists,
  firstAnnotation,
  getTier,
  isTokenized,
  lastAnnotation,
  mainAnnotation,
  mainTier,
  mainTierIds,
  parentTier,
  properties,
  refTierIds,
  requireTier,
  tierIds,
  timeSlotIdForValue,
  timeSlotValue,
} from './eaf-document';
import { addTier } from './eaf-editor';
import { parseEaf } from './eaf-parser';
import { createTier } from './tier';
import { sampleXml, thrown } from './__fixtures__/documents';

describe('eaf-document', () => {
  let doc: DerivedEaf;

  beforeEach(() => {
    doc = prepareEaf(parseEaf(sampleXml()));
  });

  afterEach(() => settingsStore.getState().reset());

  it('creates an empty document from the settings', () => {
    configureSettings({ author: 'test-author', defaultLinguisticType: 'main-lt' });
    const created = createEaf();
    expect(created.author).toBe('test-author');
    expect(created.linguisticTypes.map((lt) => lt.id)).toEqual(['main-lt']);
    expect(created.constraints).toHaveLength(4);
    expect(created.locales).toEqual([{ languageCode: 'en' }]);
    expect(created.tiers).toEqual([]);
  });

  it('looks up tiers', () => {
    expect(getTier(doc, 'words')?.parentRef).toBe('utterance');
    expect(getTier(doc, 'nope')).toBeUndefined();
    expect(isEafError(thrown(() => requireTier(doc, 'nope')), 'TierIdInvalid')).toBe(true);
  });

  it('walks tier ancestry', () => {
    expect(mainTier(doc, 'comment')?.id).toBe('utterance');
    expect(mainTier(doc, 'utterance')?.id).toBe('utterance');
    expect(parentTier(doc, 'comment')?.id).toBe('translation');
    expect(parentTier(doc, 'utterance')).toBeUndefined();
    expect(childTiers(doc, 'utterance').map((t) => t.id)).toEqual(['translation', 'words']);
  });

  it('lists tier ids by kind', () => {
    expect(tierIds(doc)).toEqual(['utterance', 'translation', 'comment', 'words']);
    expect(mainTierIds(doc)).toEqual(['utterance']);
    expect(refTierIds(doc)).toEqual(['translation', 'comment', 'words']);
  });

  it('resolves main annotations', () => {
    expect(mainAnnotation(doc, 'a6')?.id).toBe('a1');
    expect(mainAnnotation(doc, 'a2')?.id).toBe('a2');
    expect(mainAnnotation(doc, 'a99')).toBeUndefined();
  });

  it('reports which kind of object an id names', () => {
    expect(exists(doc, 'ts3')).toEqual({ tier: false, annotation: false, timeSlot: true });
    expect(exists(doc, 'words')).toEqual({ tier: true, annotation: false, timeSlot: false });
    expect(exists(doc, 'a8')).toEqual({ tier: false, annotation: true, timeSlot: false });
  });

  it('lists annotations and finds the first and last', () => {
    expect(annotations(doc)).toHaveLength(8);
    expect(annotations(doc, 'words').map((a) => a.id)).toEqual(['a7', 'a8']);
    expect(firstAnnotation(doc)?.id).toBe('a1');
    expect(lastAnnotation(doc)?.id).toBe('a3');
  });

  it('detects token runs, optionally through ancestors', () => {
    expect(isTokenized(doc, 'words')).toBe(true);
    expect(isTokenized(doc, 'utterance')).toBe(false);

    const withSub = prepareEaf(
      addTier(doc, createTier('sub', [], { parentRef: 'words', linguisticTypeRef: 'translation' }))
    );
    expect(isTokenized(withSub, 'sub')).toBe(false);
    expect(isTokenized(withSub, 'sub', true)).toBe(true);
  });

  it('reads time slots and header properties', () => {
    expect(timeSlotValue(doc, 'ts4')).toBe(1200);
    expect(timeSlotValue(doc, 'ts99')).toBeUndefined();
    expect(timeSlotIdForValue(doc, 1500)).toBe('ts5');
    expect(properties(doc).get('lastUsedAnnotationId')).toBe('8');
  });
});
