import type {
  Annotation,
  ControlledVocabulary,
  Eaf,
  Header,
  LinguisticType,
  Tier,
} from '../../types/elan';
import { attrs, escapeXml } from '../../utils/xml';

const SCHEMA_ATTRS =
  'xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"\n    xsi:noNamespaceSchemaLocation="http://www.mpi.nl/tools/elan/EAFv3.0.xsd"';

function headerXml(header: Header): string {
  const lines = [
    ...header.mediaDescriptors.map(
      (md) =>
        `        <MEDIA_DESCRIPTOR${attrs([
          ['MEDIA_URL', md.mediaUrl],
          ['MIME_TYPE', md.mimeType],
          ['RELATIVE_MEDIA_URL', md.relativeMediaUrl],
          ['TIME_ORIGIN', md.timeOrigin],
          ['EXTRACTED_FROM', md.extractedFrom],
        ])}/>`
    ),
    ...header.properties.map(
      (p) => `        <PROPERTY${attrs([['NAME', p.name]])}>${escapeXml(p.value)}</PROPERTY>`
    ),
  ];
  const open = `    <HEADER${attrs([['MEDIA_FILE', header.mediaFile], ['TIME_UNITS', header.timeUnits]])}`;
  return lines.length > 0 ? `${open}>\n${lines.join('\n')}\n    </HEADER>` : `${open}/>`;
}

function annotationXml(a: Annotation): string {
  const common: [string, string | undefined][] = [
    ['ANNOTATION_ID', a.id],
    ['EXT_REF', a.extRef],
    ['LANG_REF', a.langRef],
    ['CVE_REF', a.cveRef],
  ];
  const [tag, refs]: [string, [string, string | undefined][]] =
    a.kind === 'alignable'
      ? ['ALIGNABLE_ANNOTATION', [['TIME_SLOT_REF1', a.timeSlotRef1], ['TIME_SLOT_REF2', a.timeSlotRef2]]]
      : ['REF_ANNOTATION', [['ANNOTATION_REF', a.annotationRef], ['PREVIOUS_ANNOTATION', a.previousAnnotation]]];
  return `        <ANNOTATION>
            <${tag}${attrs([...common, ...refs])}>
                <ANNOTATION_VALUE>${escapeXml(a.value)}</ANNOTATION_VALUE>
            </${tag}>
        </ANNOTATION>`;
}

function tierXml(tier: Tier): string {
  const open = `    <TIER${attrs([
    ['TIER_ID', tier.id],
    ['LINGUISTIC_TYPE_REF', tier.linguisticTypeRef],
    ['PARTICIPANT', tier.participant],
    ['ANNOTATOR', tier.annotator],
    ['PARENT_REF', tier.parentRef],
    ['DEFAULT_LOCALE', tier.defaultLocale],
    ['LANG_REF', tier.langRef],
    ['EXT_REF', tier.extRef],
  ])}`;
  if (tier.annotations.length === 0) return `${open}/>`;
  return `${open}>\n${tier.annotations.map(annotationXml).join('\n')}\n    </TIER>`;
}

function linguisticTypeXml(lt: LinguisticType): string {
  return `    <LINGUISTIC_TYPE${attrs([
    ['LINGUISTIC_TYPE_ID', lt.id],
    ['TIME_ALIGNABLE', lt.timeAlignable],
    ['CONSTRAINTS', lt.constraints],
    ['GRAPHIC_REFERENCES', lt.graphicReferences],
    ['CONTROLLED_VOCABULARY_REF', lt.controlledVocabulary],
    ['EXT_REF', lt.extRef],
    ['LEXICON_REF', lt.lexiconRef],
  ])}/>`;
}

function vocabularyXml(cv: ControlledVocabulary): string {
  const children = [
    ...cv.descriptions.map(
      (d) => `        <DESCRIPTION${attrs([['LANG_REF', d.langRef]])}>${escapeXml(d.value)}</DESCRIPTION>`
    ),
    ...cv.entries.map((entry) => {
      const values = entry.values.map(
        (v) =>
          `            <CVE_VALUE${attrs([['LANG_REF', v.langRef], ['DESCRIPTION', v.description]])}>${escapeXml(v.value)}</CVE_VALUE>`
      );
      return `        <CV_ENTRY_ML${attrs([['CVE_ID', entry.id], ['EXT_REF', entry.extRef]])}>\n${values.join('\n')}\n        </CV_ENTRY_ML>`;
    }),
  ];
  const open = `    <CONTROLLED_VOCABULARY${attrs([['CV_ID', cv.id], ['EXT_REF', cv.extRef]])}`;
  return children.length > 0 ? `${open}>\n${children.join('\n')}\n    </CONTROLLED_VOCABULARY>` : `${open}/>`;
}

/** Serialize a document as EAF 3.0 XML. Derived annotation fields are not written. */
export function writeEaf(doc: Eaf): string {
  const sections = [
    doc.license
      ? [`    <LICENSE${attrs([['LICENSE_URL', doc.license.url]])}>${escapeXml(doc.license.text)}</LICENSE>`]
      : [],
    [headerXml(doc.header)],
    doc.timeOrder.length > 0
      ? [
          `    <TIME_ORDER>\n${doc.timeOrder
            .map((ts) => `        <TIME_SLOT${attrs([['TIME_SLOT_ID', ts.id], ['TIME_VALUE', ts.value]])}/>`)
            .join('\n')}\n    </TIME_ORDER>`,
        ]
      : ['    <TIME_ORDER/>'],
    doc.tiers.map(tierXml),
    doc.linguisticTypes.map(linguisticTypeXml),
    doc.locales.map(
      (l) =>
        `    <LOCALE${attrs([['LANGUAGE_CODE', l.languageCode], ['COUNTRY_CODE', l.countryCode], ['VARIANT', l.variant]])}/>`
    ),
    doc.languages.map(
      (l) => `    <LANGUAGE${attrs([['LANG_ID', l.id], ['LANG_DEF', l.def], ['LANG_LABEL', l.label]])}/>`
    ),
    doc.constraints.map(
      (c) => `    <CONSTRAINT${attrs([['DESCRIPTION', c.description], ['STEREOTYPE', c.stereotype]])}/>`
    ),
    doc.controlledVocabularies.map(vocabularyXml),
    doc.lexiconRefs.map(
      (lr) =>
        `    <LEXICON_REF${attrs([
          ['LEX_REF_ID', lr.id],
          ['NAME', lr.name],
          ['TYPE', lr.type],
          ['URL', lr.url],
          ['LEXICON_ID', lr.lexiconId],
          ['LEXICON_NAME', lr.lexiconName],
          ['DATCAT_NAME', lr.dataCategory],
          ['DATCAT_ID', lr.dataCategoryId],
        ])}/>`
    ),
  ];

  return `<?xml version="1.0" encoding="UTF-8"?>
<ANNOTATION_DOCUMENT${attrs([
    ['AUTHOR', doc.author],
    ['DATE', doc.date],
    ['FORMAT', doc.format],
    ['VERSION', doc.version],
  ])} ${SCHEMA_ATTRS}>
${sections.flat().join('\n')}
</ANNOTATION_DOCUMENT>
`;
}
