import { isEafError } from '../../errors';
import { fromValues } from './eaf-builder';
import { importEaf } from './eaf-importer';
import { parseEaf } from './eaf-parser';
import { writeEaf } from './eaf-writer';
import { sampleXml, spanDoc, thrown } from './__fixtures__/documents';

describe('parseEaf', () => {
  const doc = parseEaf(sampleXml());

  it('reads the document attributes and header', () => {
    expect([doc.author, doc.version, doc.format]).toEqual(['test-author', '3.0', '3.0']);
    expect(doc.header.mediaDescriptors).toEqual([
      { mediaUrl: 'file:///media/session-01.mp4', relativeMediaUrl: './session-01.mp4', mimeType: 'video/mp4' },
    ]);
    expect(doc.header.properties).toEqual([{ name: 'lastUsedAnnotationId', value: '8' }]);
  });

  it('reads both annotation kinds', () => {
    const [utterance, , comment, words] = doc.tiers;
    expect(utterance.annotations[1]).toEqual({
      kind: 'alignable',
      id: 'a2',
      value: 'good morning',
      timeSlotRef1: 'ts3',
      timeSlotRef2: 'ts4',
    });
    expect(comment.annotations[0]).toMatchObject({ kind: 'referred', annotationRef: 'a4', value: 'hi & welcome' });
    expect(words.annotations[1]).toMatchObject({ annotationRef: 'a3', previousAnnotation: 'a7' });
  });

  it('reads the metadata sections', () => {
    expect(doc.linguisticTypes[1]).toEqual({
      id: 'translation',
      timeAlignable: false,
      constraints: 'Symbolic_Association',
      graphicReferences: false,
    });
    expect(doc.locales).toEqual([{ languageCode: 'en', countryCode: 'GB' }]);
    expect(doc.languages).toEqual([{ id: 'eng', label: 'English (eng)' }]);
    expect(doc.constraints.map((c) => c.stereotype)).toEqual(['Symbolic_Association', 'Symbolic_Subdivision']);
    expect(doc.controlledVocabularies).toEqual([
      {
        id: 'handshape',
        descriptions: [{ value: 'Handshapes', langRef: 'eng' }],
        entries: [{ id: 'cveid1', values: [{ value: 'B', langRef: 'eng', description: 'flat hand' }] }],
      },
    ]);
  });

  it('reads legacy vocabulary entries', () => {
    const xml = sampleXml().replace(
      /<CV_ENTRY_ML[\s\S]*<\/CV_ENTRY_ML>/,
      '<CV_ENTRY DESCRIPTION="flat hand">B</CV_ENTRY>'
    );
    expect(parseEaf(xml).controlledVocabularies[0].entries).toEqual([{ values: [{ value: 'B', description: 'flat hand' }] }]);
  });

  it('rejects input that is not an EAF document', () => {
    expect(isEafError(thrown(() => parseEaf('not xml')), 'ParseError')).toBe(true);
    expect(isEafError(thrown(() => parseEaf('<FOO/>')), 'ParseError')).toBe(true);
  });

  it('rejects a non-numeric time value', () => {
    const xml = sampleXml().replace('TIME_VALUE="500"', 'TIME_VALUE="soon"');
    expect(isEafError(thrown(() => parseEaf(xml)), 'ParseError')).toBe(true);
  });

  it('reads a slot without a value as unaligned', () => {
    const xml = sampleXml().replace('TIME_SLOT_ID="ts2" TIME_VALUE="500"', 'TIME_SLOT_ID="ts2"');
    expect(parseEaf(xml).timeOrder[1]).toEqual({ id: 'ts2', value: null });
  });
});

describe('writeEaf', () => {
  it('writes what the parser reads back', () => {
    const doc = parseEaf(sampleXml());
    expect(parseEaf(writeEaf(doc))).toEqual(doc);
  });

  it('escapes values and leaves out derived fields', () => {
    const xml = writeEaf(fromValues([['a < b & "c"', 0, 100]]));
    const lines = xml.split('\n');
    expect(lines).toContain('            <ALIGNABLE_ANNOTATION ANNOTATION_ID="a1" TIME_SLOT_REF1="ts1" TIME_SLOT_REF2="ts2">');
    expect(lines).toContain('                <ANNOTATION_VALUE>a &lt; b &amp; &quot;c&quot;</ANNOTATION_VALUE>');
  });

  it('writes empty sections as empty elements', () => {
    const lines = writeEaf(fromValues([])).split('\n');
    expect(lines).toContain('    <TIME_ORDER/>');
    expect(lines).toContain('    <TIER TIER_ID="default" LINGUISTIC_TYPE_REF="default-lt"/>');
  });
});

describe('importEaf', () => {
  it('returns a derived document', () => {
    const doc = importEaf(sampleXml());
    expect(doc.derived).toBe(true);
    expect(doc.tiers[3].annotations[0]).toMatchObject({ start: 1500, end: 2000, mainAnnotationId: 'a3' });
  });

  it('validates on request', () => {
    const xml = writeEaf(spanDoc('t', [['a', 0, 500], ['b', 300, 800]]));
    expect(importEaf(xml).tiers[0].annotations).toHaveLength(2);
    expect(isEafError(thrown(() => importEaf(xml, { validate: true })), 'AnnotationOverlap')).toBe(true);
  });

  it('rejects duplicate annotation ids', () => {
    const xml = sampleXml().replace('ANNOTATION_ID="a5"', 'ANNOTATION_ID="a1"');
    const err = thrown(() => importEaf(xml));
    expect(isEafError(err, 'AnnotationIdExists')).toBe(true);
    expect(isEafError(err) && err.details).toEqual({ annotationId: 'a1' });
  });

  it('rejects duplicate time slot ids', () => {
    const xml = sampleXml().replace('TIME_SLOT_ID="ts6" TIME_VALUE="2000"', 'TIME_SLOT_ID="ts4" TIME_VALUE="2000"');
    const err = thrown(() => importEaf(xml));
    expect(isEafError(err, 'TimeslotIdExists')).toBe(true);
    expect(isEafError(err) && err.details).toEqual({ timeSlotId: 'ts4' });
  });
});
