import type { Annotation, Eaf, IndexedEaf, LinguisticType, Tier, TimeSlot } from '../../types/elan';
import { EafError } from '../../errors';
import { resolvedSpan } from './annotation';
import { isMainTier } from './tier';
import { TIME_ALIGNABLE_STEREOTYPES } from '../../constants/annotation-types';

/** Resolved span or a `TimeValueMissing` error */
export function requireSpan(annotation: Annotation): [number, number] {
  const span = resolvedSpan(annotation);
  if (!span) {
    throw new EafError('TimeValueMissing', `Annotation '${annotation.id}' has no resolved time span`, {
      annotationId: annotation.id,
    });
  }
  return span;
}

/**
 * `true` if any two of the half-open spans `[start, end)` overlap. Every annotation
 * must be derived with both values present.
 */
export function overlap(annotations: Annotation[]): boolean {
  const spans = annotations.map(requireSpan).sort((a, b) => a[0] - b[0]);
  for (let i = 0; i + 1 < spans.length; i++) {
    if (spans[i][1] > spans[i + 1][0]) return true;
  }
  return false;
}

export function hasDuplicateTimeSlots(timeOrder: TimeSlot[]): boolean {
  return new Set(timeOrder.map((ts) => ts.id)).size < timeOrder.length;
}

export function duplicateTierIds(tiers: Tier[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const t of tiers) {
    if (seen.has(t.id)) dupes.add(t.id);
    seen.add(t.id);
  }
  return [...dupes];
}

/**
 * Kind of annotation a tier must hold. Main tiers hold alignable annotations,
 * referred tiers referred ones, except where the linguistic type is a time-alignable
 * subdivision (Time_Subdivision, Included_In), which keeps its own time slots.
 */
export function expectedAnnotationKind(tier: Tier, linguisticType?: LinguisticType): Annotation['kind'] {
  if (isMainTier(tier)) return 'alignable';
  const stereotype = linguisticType?.constraints;
  return linguisticType?.timeAlignable && stereotype && TIME_ALIGNABLE_STEREOTYPES.has(stereotype)
    ? 'alignable'
    : 'referred';
}

/** Every annotation of the tier has the kind it calls for */
export function tierTypeMatches(tier: Tier, linguisticType?: LinguisticType): boolean {
  const kind = expectedAnnotationKind(tier, linguisticType);
  return tier.annotations.every((a) => a.kind === kind);
}

function checkTierAncestry(doc: IndexedEaf, tierId: string): void {
  const seen = new Set([tierId]);
  let parent = doc.index.tierParent.get(tierId);
  while (parent !== undefined) {
    if (seen.has(parent)) {
      throw new EafError('TierCycle', `Tier '${tierId}' is its own ancestor`, { tierId });
    }
    if (!doc.index.tierPosition.has(parent)) {
      throw new EafError('TierIdInvalid', `Tier '${tierId}' refers to missing parent tier '${parent}'`, {
        tierId,
        parentRef: parent,
      });
    }
    seen.add(parent);
    parent = doc.index.tierParent.get(parent);
  }
}

/** Tier, annotation and time slot ids must each be unique within the document */
export function checkUniqueIds(doc: Eaf): void {
  const dupeTiers = duplicateTierIds(doc.tiers);
  if (dupeTiers.length > 0) {
    throw new EafError('TierIdExists', `Duplicate tier id '${dupeTiers[0]}'`, { tierId: dupeTiers[0] });
  }

  const annotationIds = new Set<string>();
  for (const tier of doc.tiers) {
    for (const a of tier.annotations) {
      if (annotationIds.has(a.id)) {
        throw new EafError('AnnotationIdExists', `Duplicate annotation id '${a.id}'`, { annotationId: a.id });
      }
      annotationIds.add(a.id);
    }
  }

  const slotIds = new Set<string>();
  for (const ts of doc.timeOrder) {
    if (slotIds.has(ts.id)) {
      throw new EafError('TimeslotIdExists', `Duplicate time slot id '${ts.id}'`, { timeSlotId: ts.id });
    }
    slotIds.add(ts.id);
  }
}

/**
 * Check the structural invariants of an indexed document, throwing the first
 * violation found. Overlaps are only checked when annotations carry derived spans.
 */
export function validateEaf(doc: IndexedEaf): void {
  checkUniqueIds(doc);

  const linguisticTypes = new Map(doc.linguisticTypes.map((lt) => [lt.id, lt]));

  for (const tier of doc.tiers) {
    checkTierAncestry(doc, tier.id);

    const lt = linguisticTypes.get(tier.linguisticTypeRef);
    const kind = expectedAnnotationKind(tier, lt);
    const parentAnnotations = new Set<string>(tier.parentRef ? doc.index.tierAnnotations.get(tier.parentRef) : []);

    for (const a of tier.annotations) {
      if (a.kind !== kind) {
        throw new EafError(
          'AnnotationTypeMismatch',
          `Annotation '${a.id}' is ${a.kind} but tier '${tier.id}' takes ${kind} annotations`,
          { annotationId: a.id, tierId: tier.id }
        );
      }
      if (a.kind === 'alignable') {
        for (const ref of [a.timeSlotRef1, a.timeSlotRef2]) {
          if (!doc.index.timeSlotValues.has(ref)) {
            throw new EafError('TimeslotRefMissing', `Annotation '${a.id}' refers to missing time slot '${ref}'`, {
              annotationId: a.id,
              timeSlotRef: ref,
            });
          }
        }
      } else if (!parentAnnotations.has(a.annotationRef)) {
        throw new EafError(
          'AnnotationIdInvalid',
          `Annotation '${a.id}' refers to '${a.annotationRef}', which is not in parent tier '${tier.parentRef}'`,
          { annotationId: a.id, annotationRef: a.annotationRef }
        );
      }
    }

    if (tier.parentRef && lt?.constraints === 'Symbolic_Association') {
      const parentCount = parentAnnotations.size;
      if (tier.annotations.length > parentCount) {
        throw new EafError(
          'TierAlignment',
          `Tier '${tier.id}' has ${tier.annotations.length} annotations for ${parentCount} parent annotations`,
          { tierId: tier.id }
        );
      }
    }

    if (isMainTier(tier) && tier.annotations.every((a) => resolvedSpan(a) !== null) && overlap(tier.annotations)) {
      throw new EafError('AnnotationOverlap', `Overlapping annotations in tier '${tier.id}'`, { tierId: tier.id });
    }
  }
}
