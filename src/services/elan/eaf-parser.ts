import type {
  Annotation,
  Constraint,
  ControlledVocabulary,
  CvEntry,
  Eaf,
  Header,
  Language,
  LexiconRef,
  LinguisticType,
  Locale,
  Tier,
  TimeSlot,
} from '../../types/elan';
import { EafError } from '../../errors';
import { isStereotype } from '../../constants/annotation-types';
import { attr, childElement, childElements, parseXml } from '../../utils/xml';
import { log } from '../../utils/log';

function text(el: Element | undefined): string {
  return el?.textContent ?? '';
}

function required(el: Element, name: string): string {
  const value = attr(el, name);
  if (value === undefined) {
    throw new EafError('ParseError', `<${el.nodeName}> is missing attribute ${name}`);
  }
  return value;
}

function numberAttr(el: Element, name: string): number | undefined {
  const raw = attr(el, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new EafError('ParseError', `<${el.nodeName}> ${name}="${raw}" is not a number`);
  }
  return value;
}

function parseHeader(el: Element | undefined): Header {
  if (!el) return { mediaFile: '', timeUnits: 'milliseconds', mediaDescriptors: [], properties: [] };
  return {
    mediaFile: attr(el, 'MEDIA_FILE') ?? '',
    timeUnits: attr(el, 'TIME_UNITS') ?? 'milliseconds',
    mediaDescriptors: childElements(el, 'MEDIA_DESCRIPTOR').map((md) => ({
      mediaUrl: required(md, 'MEDIA_URL'),
      relativeMediaUrl: attr(md, 'RELATIVE_MEDIA_URL'),
      mimeType: attr(md, 'MIME_TYPE') ?? 'unknown',
      timeOrigin: numberAttr(md, 'TIME_ORIGIN'),
      extractedFrom: attr(md, 'EXTRACTED_FROM'),
    })),
    properties: childElements(el, 'PROPERTY').map((p) => ({ name: attr(p, 'NAME'), value: text(p) })),
  };
}

function parseTimeOrder(el: Element | undefined): TimeSlot[] {
  if (!el) return [];
  return childElements(el, 'TIME_SLOT').map((ts) => ({
    id: required(ts, 'TIME_SLOT_ID'),
    value: numberAttr(ts, 'TIME_VALUE') ?? null,
  }));
}

function parseAnnotation(wrapper: Element): Annotation {
  const el = childElements(wrapper)[0];
  if (!el) throw new EafError('ParseError', 'Empty <ANNOTATION> element');
  const common = {
    id: required(el, 'ANNOTATION_ID'),
    value: text(childElement(el, 'ANNOTATION_VALUE')),
    extRef: attr(el, 'EXT_REF'),
    langRef: attr(el, 'LANG_REF'),
    cveRef: attr(el, 'CVE_REF'),
  };
  switch (el.nodeName) {
    case 'ALIGNABLE_ANNOTATION':
      return {
        kind: 'alignable',
        ...common,
        timeSlotRef1: required(el, 'TIME_SLOT_REF1'),
        timeSlotRef2: required(el, 'TIME_SLOT_REF2'),
      };
    case 'REF_ANNOTATION':
      return {
        kind: 'referred',
        ...common,
        annotationRef: required(el, 'ANNOTATION_REF'),
        previousAnnotation: attr(el, 'PREVIOUS_ANNOTATION'),
      };
    default:
      throw new EafError('ParseError', `Unknown annotation element <${el.nodeName}>`);
  }
}

function parseTier(el: Element): Tier {
  return {
    id: required(el, 'TIER_ID'),
    linguisticTypeRef: required(el, 'LINGUISTIC_TYPE_REF'),
    participant: attr(el, 'PARTICIPANT'),
    annotator: attr(el, 'ANNOTATOR'),
    parentRef: attr(el, 'PARENT_REF'),
    defaultLocale: attr(el, 'DEFAULT_LOCALE'),
    langRef: attr(el, 'LANG_REF'),
    extRef: attr(el, 'EXT_REF'),
    annotations: childElements(el, 'ANNOTATION').map(parseAnnotation),
  };
}

function parseLinguisticType(el: Element): LinguisticType {
  const stereotype = attr(el, 'CONSTRAINTS');
  const graphic = attr(el, 'GRAPHIC_REFERENCES');
  return {
    id: required(el, 'LINGUISTIC_TYPE_ID'),
    timeAlignable: attr(el, 'TIME_ALIGNABLE') !== 'false',
    constraints: stereotype !== undefined && isStereotype(stereotype) ? stereotype : undefined,
    graphicReferences: graphic === undefined ? undefined : graphic === 'true',
    controlledVocabulary: attr(el, 'CONTROLLED_VOCABULARY_REF'),
    extRef: attr(el, 'EXT_REF'),
    lexiconRef: attr(el, 'LEXICON_REF'),
  };
}

function parseConstraint(el: Element): Constraint | undefined {
  const stereotype = required(el, 'STEREOTYPE');
  if (!isStereotype(stereotype)) {
    log.warn(`Skipping unknown constraint stereotype '${stereotype}'`);
    return undefined;
  }
  return { stereotype, description: attr(el, 'DESCRIPTION') ?? '' };
}

function parseCvEntries(el: Element): CvEntry[] {
  const multilingual = childElements(el, 'CV_ENTRY_ML').map((entry) => ({
    id: attr(entry, 'CVE_ID'),
    extRef: attr(entry, 'EXT_REF'),
    values: childElements(entry, 'CVE_VALUE').map((v) => ({
      value: text(v),
      langRef: attr(v, 'LANG_REF'),
      description: attr(v, 'DESCRIPTION'),
    })),
  }));
  // EAF 2.x vocabularies
  const legacy = childElements(el, 'CV_ENTRY').map((entry) => ({
    extRef: attr(entry, 'EXT_REF'),
    values: [{ value: text(entry), description: attr(entry, 'DESCRIPTION') }],
  }));
  return [...multilingual, ...legacy];
}

function parseVocabulary(el: Element): ControlledVocabulary {
  return {
    id: required(el, 'CV_ID'),
    extRef: attr(el, 'EXT_REF'),
    descriptions: childElements(el, 'DESCRIPTION').map((d) => ({ value: text(d), langRef: attr(d, 'LANG_REF') })),
    entries: parseCvEntries(el),
  };
}

function parseLexiconRef(el: Element): LexiconRef {
  return {
    id: required(el, 'LEX_REF_ID'),
    name: attr(el, 'NAME') ?? '',
    type: attr(el, 'TYPE') ?? '',
    url: attr(el, 'URL') ?? '',
    lexiconId: attr(el, 'LEXICON_ID') ?? '',
    lexiconName: attr(el, 'LEXICON_NAME') ?? '',
    dataCategory: attr(el, 'DATCAT_NAME'),
    dataCategoryId: attr(el, 'DATCAT_ID'),
  };
}

function parseLocale(el: Element): Locale {
  return {
    languageCode: required(el, 'LANGUAGE_CODE'),
    countryCode: attr(el, 'COUNTRY_CODE'),
    variant: attr(el, 'VARIANT'),
  };
}

function parseLanguage(el: Element): Language {
  return { id: required(el, 'LANG_ID'), def: attr(el, 'LANG_DEF'), label: attr(el, 'LANG_LABEL') };
}

/**
 * Parse an ELAN .eaf file into a raw document. Derived annotation fields are left
 * unset; run the result through `prepareEaf` before using it.
 */
export function parseEaf(xmlString: string): Eaf {
  const root = parseXml(xmlString).documentElement;
  if (root.nodeName !== 'ANNOTATION_DOCUMENT') {
    throw new EafError('ParseError', `Expected <ANNOTATION_DOCUMENT>, found <${root.nodeName}>`);
  }

  const license = childElement(root, 'LICENSE');
  const doc: Eaf = {
    author: attr(root, 'AUTHOR') ?? '',
    date: attr(root, 'DATE') ?? '',
    version: attr(root, 'VERSION') ?? '3.0',
    format: attr(root, 'FORMAT') ?? attr(root, 'VERSION') ?? '3.0',
    ...(license ? { license: { url: attr(license, 'LICENSE_URL'), text: text(license) } } : {}),
    header: parseHeader(childElement(root, 'HEADER')),
    timeOrder: parseTimeOrder(childElement(root, 'TIME_ORDER')),
    tiers: childElements(root, 'TIER').map(parseTier),
    linguisticTypes: childElements(root, 'LINGUISTIC_TYPE').map(parseLinguisticType),
    locales: childElements(root, 'LOCALE').map(parseLocale),
    languages: childElements(root, 'LANGUAGE').map(parseLanguage),
    constraints: childElements(root, 'CONSTRAINT').flatMap((c) => parseConstraint(c) ?? []),
    controlledVocabularies: childElements(root, 'CONTROLLED_VOCABULARY').map(parseVocabulary),
    lexiconRefs: childElements(root, 'LEXICON_REF').map(parseLexiconRef),
  };
  log.debug(`Parsed ${doc.tiers.length} tiers and ${doc.timeOrder.length} time slots`);
  return doc;
}
