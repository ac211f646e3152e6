import type {
  AlignableAnnotation,
  Annotation,
  DerivedEaf,
  Eaf,
  Header,
  IndexedEaf,
  Tier,
} from '../../types/elan';
import { EafError } from '../../errors';
import { getSettings } from '../../stores/settings-store';
import { STEREOTYPES, constraintFor, defaultLinguisticType } from '../../constants/annotation-types';
import { today } from '../../utils/time';
import { annotationById, resolveMainAnnotation } from './eaf-derive';
import { isMainTier, isRefTier, isTokenizedTier } from './tier';

export function emptyHeader(): Header {
  return { mediaFile: '', timeUnits: 'milliseconds', mediaDescriptors: [], properties: [] };
}

/** New empty document with the default linguistic type, all four constraints and an English locale */
export function createEaf(init: Partial<Eaf> = {}): Eaf {
  const { author, defaultLinguisticType: ltId } = getSettings();
  return {
    author,
    date: today(),
    version: '3.0',
    format: '3.0',
    header: emptyHeader(),
    timeOrder: [],
    tiers: [],
    linguisticTypes: [defaultLinguisticType(ltId)],
    locales: [{ languageCode: 'en' }],
    languages: [],
    constraints: STEREOTYPES.map(constraintFor),
    controlledVocabularies: [],
    lexiconRefs: [],
    ...init,
  };
}

export function getTier(doc: IndexedEaf, tierId: string): Tier | undefined {
  const pos = doc.index.tierPosition.get(tierId);
  return pos === undefined ? undefined : doc.tiers[pos];
}

export function requireTier(doc: IndexedEaf, tierId: string): Tier {
  const tier = getTier(doc, tierId);
  if (!tier) throw new EafError('TierIdInvalid', `No tier with id '${tierId}'`, { tierId });
  return tier;
}

export function getAnnotation(doc: IndexedEaf, id: string): Annotation | undefined {
  return annotationById(doc, id);
}

export function requireAnnotation(doc: IndexedEaf, id: string): Annotation {
  const annotation = annotationById(doc, id);
  if (!annotation) throw new EafError('AnnotationIdInvalid', `No annotation with id '${id}'`, { annotationId: id });
  return annotation;
}

/** The alignable annotation at the top of `id`'s parent chain; itself if alignable */
export function mainAnnotation(doc: IndexedEaf, id: string): AlignableAnnotation | undefined {
  const annotation = annotationById(doc, id);
  if (!annotation) return undefined;
  if (annotation.kind === 'alignable') return annotation;
  if (annotation.mainAnnotationId) {
    const main = annotationById(doc, annotation.mainAnnotationId);
    if (main?.kind === 'alignable') return main;
  }
  return resolveMainAnnotation(doc, annotation);
}

/** The main tier at the top of `tierId`'s parent chain; itself for a main tier */
export function mainTier(doc: IndexedEaf, tierId: string): Tier | undefined {
  const seen = new Set<string>();
  let tier = getTier(doc, tierId);
  while (tier) {
    const parentRef = tier.parentRef;
    if (parentRef === undefined) return tier;
    if (seen.has(tier.id)) {
      throw new EafError('TierCycle', `Tier '${tierId}' is its own ancestor`, { tierId });
    }
    seen.add(tier.id);
    tier = getTier(doc, parentRef);
  }
  return undefined;
}

export function parentTier(doc: IndexedEaf, tierId: string): Tier | undefined {
  const parentId = doc.index.tierParent.get(tierId);
  return parentId === undefined ? undefined : getTier(doc, parentId);
}

/** Tiers whose parent is `tierId` */
export function childTiers(doc: IndexedEaf, tierId: string): Tier[] {
  requireTier(doc, tierId);
  return doc.tiers.filter((t) => t.parentRef === tierId);
}

export function mainTiers(doc: Eaf): Tier[] {
  return doc.tiers.filter(isMainTier);
}

export function refTiers(doc: Eaf): Tier[] {
  return doc.tiers.filter(isRefTier);
}

export function tierIds(doc: Eaf): string[] {
  return doc.tiers.map((t) => t.id);
}

export function mainTierIds(doc: Eaf): string[] {
  return mainTiers(doc).map((t) => t.id);
}

export function refTierIds(doc: Eaf): string[] {
  return refTiers(doc).map((t) => t.id);
}

export interface Existence {
  tier: boolean;
  annotation: boolean;
  timeSlot: boolean;
}

/** Whether `id` names a tier, an annotation or a time slot */
export function exists(doc: IndexedEaf, id: string): Existence {
  return {
    tier: doc.index.tierPosition.has(id),
    annotation: doc.index.annotationPosition.has(id),
    timeSlot: doc.index.timeSlotValues.has(id),
  };
}

/** Annotations of one tier, or of all tiers in document order */
export function annotations(doc: IndexedEaf, tierId?: string): Annotation[] {
  if (tierId !== undefined) return requireTier(doc, tierId).annotations;
  return doc.tiers.flatMap((t) => t.annotations);
}

/** Annotation with the earliest start across all tiers */
export function firstAnnotation(doc: DerivedEaf): Annotation | undefined {
  let first: Annotation | undefined;
  for (const a of annotations(doc)) {
    if (typeof a.start !== 'number') continue;
    if (first === undefined || a.start < (first.start ?? Infinity)) first = a;
  }
  return first;
}

/** Annotation with the latest end across all tiers */
export function lastAnnotation(doc: DerivedEaf): Annotation | undefined {
  let last: Annotation | undefined;
  for (const a of annotations(doc)) {
    if (typeof a.end !== 'number') continue;
    if (last === undefined || a.end > (last.end ?? -Infinity)) last = a;
  }
  return last;
}

/**
 * Whether the tier holds token runs. With `recursive`, a tokenized ancestor
 * counts as well.
 */
export function isTokenized(doc: IndexedEaf, tierId: string, recursive = false): boolean {
  const seen = new Set<string>();
  let tier: Tier | undefined = requireTier(doc, tierId);
  while (tier) {
    if (isTokenizedTier(tier)) return true;
    if (!recursive || tier.parentRef === undefined || seen.has(tier.id)) return false;
    seen.add(tier.id);
    tier = getTier(doc, tier.parentRef);
  }
  return false;
}

export function timeSlotValue(doc: IndexedEaf, timeSlotId: string): number | null | undefined {
  return doc.index.timeSlotValues.get(timeSlotId);
}

export function timeSlotIdForValue(doc: IndexedEaf, value: number): string | undefined {
  return doc.index.timeValueSlots.get(value);
}

/** Header properties by name; unnamed properties are skipped */
export function properties(doc: Eaf): Map<string, string> {
  const out = new Map<string, string>();
  for (const p of doc.header.properties) {
    if (p.name !== undefined) out.set(p.name, p.value);
  }
  return out;
}
