import type {
  Annotation,
  Constraint,
  DerivedEaf,
  Eaf,
  IndexedEaf,
  LinguisticType,
  Stereotype,
  Tier,
  TimeSlot,
} from '../../types/elan';
import { EafError } from '../../errors';
import { getSettings } from '../../stores/settings-store';
import { constraintFor, defaultLinguisticType } from '../../constants/annotation-types';
import { annotationId, maxIdNumber } from '../../utils/id-generator';
import { alignableAnnotation, withValue } from './annotation';
import { toRawEaf } from './eaf-index';
import { getTier, requireAnnotation, requireTier } from './eaf-document';
import { expectedAnnotationKind, hasDuplicateTimeSlots } from './eaf-validate';
import { nextTimeSlotIds, pruneTimeOrder, shiftTimeOrder } from './time-order';
import { isMainTier, tierTimeSlots } from './tier';

/** `count` fresh annotation ids numbered after the highest existing one */
export function nextAnnotationIds(doc: Eaf, count: number): string[] {
  const start = maxIdNumber(doc.tiers.flatMap((t) => t.annotations.map((a) => a.id))) + 1;
  return Array.from({ length: count }, (_, i) => annotationId(start + i));
}

function usedTimeSlotRefs(tiers: Tier[]): Set<string> {
  const refs = new Set<string>();
  for (const tier of tiers) {
    for (const a of tier.annotations) {
      if (a.kind !== 'alignable') continue;
      refs.add(a.timeSlotRef1);
      refs.add(a.timeSlotRef2);
    }
  }
  return refs;
}

/** Add a linguistic type unless one with the same id exists, with its constraint if requested */
export function addLinguisticType(doc: Eaf, linguisticType: LinguisticType, withConstraint = true): Eaf {
  let next = toRawEaf(doc);
  if (!next.linguisticTypes.some((lt) => lt.id === linguisticType.id)) {
    next = { ...next, linguisticTypes: [...next.linguisticTypes, linguisticType] };
  }
  if (withConstraint && linguisticType.constraints) {
    next = addConstraint(next, constraintFor(linguisticType.constraints));
  }
  return next;
}

export function addConstraint(doc: Eaf, constraint: Constraint): Eaf {
  const raw = toRawEaf(doc);
  if (raw.constraints.some((c) => c.stereotype === constraint.stereotype)) return raw;
  return { ...raw, constraints: [...raw.constraints, constraint] };
}

/**
 * Append a tier. Time slots for its alignable annotations are taken from their
 * derived spans; a missing linguistic type is created, using `stereotype` for
 * referred tiers.
 */
export function addTier(doc: IndexedEaf, tier: Tier, stereotype?: Stereotype): Eaf {
  if (doc.index.tierPosition.has(tier.id)) {
    throw new EafError('TierIdExists', `Tier '${tier.id}' already exists`, { tierId: tier.id });
  }
  if (tier.parentRef !== undefined && !doc.index.tierPosition.has(tier.parentRef)) {
    throw new EafError('TierIdInvalid', `Parent tier '${tier.parentRef}' does not exist`, {
      tierId: tier.id,
      parentRef: tier.parentRef,
    });
  }

  const linguisticType =
    doc.linguisticTypes.find((lt) => lt.id === tier.linguisticTypeRef) ??
    defaultLinguisticType(tier.linguisticTypeRef, isMainTier(tier) ? undefined : stereotype ?? 'Symbolic_Association');
  const kind = expectedAnnotationKind(tier, linguisticType);
  for (const a of tier.annotations) {
    if (doc.index.annotationPosition.has(a.id)) {
      throw new EafError('AnnotationIdExists', `Annotation '${a.id}' already exists`, { annotationId: a.id });
    }
    if (a.kind !== kind) {
      throw new EafError('AnnotationTypeMismatch', `Annotation '${a.id}' does not fit tier '${tier.id}'`, {
        annotationId: a.id,
        tierId: tier.id,
      });
    }
  }

  const slots: TimeSlot[] = [];
  for (const ts of tierTimeSlots(tier)) {
    const existing = doc.index.timeSlotValues.get(ts.id);
    if (existing === undefined) slots.push(ts);
    else if (existing !== ts.value) {
      throw new EafError('TimeslotIdExists', `Time slot '${ts.id}' already exists with another value`, {
        timeSlotId: ts.id,
      });
    }
  }

  const raw = addLinguisticType(doc, linguisticType);
  return { ...raw, timeOrder: [...raw.timeOrder, ...slots], tiers: [...raw.tiers, tier] };
}

/** Remove a tier together with every tier below it, and the time slots left unused */
export function removeTier(doc: IndexedEaf, tierId: string): Eaf {
  requireTier(doc, tierId);
  const removed = new Set([tierId]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const t of doc.tiers) {
      if (t.parentRef !== undefined && removed.has(t.parentRef) && !removed.has(t.id)) {
        removed.add(t.id);
        grew = true;
      }
    }
  }
  const tiers = doc.tiers.filter((t) => !removed.has(t.id));
  return { ...toRawEaf(doc), tiers, timeOrder: pruneTimeOrder(doc.timeOrder, usedTimeSlotRefs(tiers)) };
}

function insertionIndex(tier: Tier, annotation: Annotation, start: number | null): number {
  if (annotation.kind === 'referred') {
    const prev = annotation.previousAnnotation ?? annotation.annotationRef;
    const last = tier.annotations.reduce(
      (idx, a, i) => (a.id === prev || (a.kind === 'referred' && a.annotationRef === annotation.annotationRef) ? i : idx),
      -1
    );
    return last >= 0 ? last + 1 : tier.annotations.length;
  }
  if (start === null) return tier.annotations.length;
  const idx = tier.annotations.findIndex((a) => typeof a.start === 'number' && a.start > start);
  return idx < 0 ? tier.annotations.length : idx;
}

/**
 * Insert an annotation into a tier. Alignable annotations whose time slots do not
 * exist yet get new slots from their `start`/`end` values; referred annotations must
 * point into the parent tier.
 */
export function addAnnotation(doc: DerivedEaf, tierId: string, annotation: Annotation): Eaf {
  const tier = requireTier(doc, tierId);
  if (doc.index.annotationPosition.has(annotation.id)) {
    throw new EafError('AnnotationIdExists', `Annotation '${annotation.id}' already exists`, {
      annotationId: annotation.id,
    });
  }
  const linguisticType = doc.linguisticTypes.find((lt) => lt.id === tier.linguisticTypeRef);
  if (annotation.kind !== expectedAnnotationKind(tier, linguisticType)) {
    throw new EafError('AnnotationTypeMismatch', `Annotation '${annotation.id}' does not fit tier '${tierId}'`, {
      annotationId: annotation.id,
      tierId,
    });
  }

  const slots: TimeSlot[] = [];
  let start: number | null = null;
  if (annotation.kind === 'alignable') {
    const refs: [string, number | null | undefined][] = [
      [annotation.timeSlotRef1, annotation.start],
      [annotation.timeSlotRef2, annotation.end],
    ];
    for (const [ref, value] of refs) {
      const existing = doc.index.timeSlotValues.get(ref);
      if (existing !== undefined) continue;
      if (value === undefined) {
        throw new EafError('TimeslotRefMissing', `Time slot '${ref}' does not exist and has no value`, {
          annotationId: annotation.id,
          timeSlotRef: ref,
        });
      }
      slots.push({ id: ref, value });
    }
    start = doc.index.timeSlotValues.get(annotation.timeSlotRef1) ?? annotation.start ?? null;
  } else {
    const parentTierAnnotations = new Set<string>(tier.parentRef ? doc.index.tierAnnotations.get(tier.parentRef) : []);
    if (!parentTierAnnotations.has(annotation.annotationRef)) {
      throw new EafError('AnnotationIdInvalid', `Parent annotation '${annotation.annotationRef}' is not in the parent tier`, {
        annotationId: annotation.id,
        annotationRef: annotation.annotationRef,
      });
    }
    const prev = annotation.previousAnnotation;
    if (prev !== undefined && doc.index.annotationTier.get(prev) !== tierId) {
      throw new EafError('AnnotationIdInvalid', `Previous annotation '${prev}' is not in tier '${tierId}'`, {
        annotationId: annotation.id,
        annotationRef: prev,
      });
    }
  }

  const at = insertionIndex(tier, annotation, start);
  const updated: Tier = {
    ...tier,
    annotations: [...tier.annotations.slice(0, at), annotation, ...tier.annotations.slice(at)],
  };
  const timeOrder = [...doc.timeOrder, ...slots];
  if (hasDuplicateTimeSlots(timeOrder)) {
    throw new EafError('TimeslotIdExists', `Duplicate time slot ids after adding '${annotation.id}'`, {
      annotationId: annotation.id,
    });
  }
  return {
    ...toRawEaf(doc),
    timeOrder,
    tiers: doc.tiers.map((t) => (t.id === tierId ? updated : t)),
  };
}

/** Add an alignable annotation spanning `start`-`end` with fresh annotation and slot ids */
export function addSpan(doc: DerivedEaf, tierId: string, start: number, end: number, value: string): Eaf {
  if (end < start) {
    throw new EafError('TimeSpanInvalid', `Invalid time span ${start}-${end}`, { start, end });
  }
  const [id] = nextAnnotationIds(doc, 1);
  const [ref1, ref2] = nextTimeSlotIds(doc.timeOrder, 2);
  return addAnnotation(doc, tierId, { ...alignableAnnotation(id, ref1, ref2, value), start, end });
}

/**
 * Remove an annotation and every annotation referring to it, directly or further
 * down. Token runs are relinked past removed tokens; unused time slots are dropped.
 */
export function removeAnnotation(doc: IndexedEaf, id: string): Eaf {
  requireAnnotation(doc, id);
  const removed = new Set([id]);
  let grew = true;
  while (grew) {
    grew = false;
    for (const [child, parent] of doc.index.annotationParent) {
      if (removed.has(parent) && !removed.has(child)) {
        removed.add(child);
        grew = true;
      }
    }
  }

  const previousOf = new Map<string, string | undefined>();
  for (const tier of doc.tiers) {
    for (const a of tier.annotations) {
      if (removed.has(a.id) && a.kind === 'referred') previousOf.set(a.id, a.previousAnnotation);
    }
  }
  const relink = (prev: string | undefined): string | undefined => {
    let current = prev;
    while (current !== undefined && removed.has(current)) current = previousOf.get(current);
    return current;
  };

  const tiers = doc.tiers.map((tier) => ({
    ...tier,
    annotations: tier.annotations
      .filter((a) => !removed.has(a.id))
      .map((a): Annotation => {
        if (a.kind !== 'referred' || a.previousAnnotation === undefined || !removed.has(a.previousAnnotation)) return a;
        const { previousAnnotation, ...rest } = a;
        const prev = relink(previousAnnotation);
        return prev === undefined ? rest : { ...rest, previousAnnotation: prev };
      }),
  }));

  return { ...toRawEaf(doc), tiers, timeOrder: pruneTimeOrder(doc.timeOrder, usedTimeSlotRefs(tiers)) };
}

export function updateAnnotationValue(doc: IndexedEaf, id: string, value: string): Eaf {
  requireAnnotation(doc, id);
  const tierId = doc.index.annotationTier.get(id);
  return {
    ...toRawEaf(doc),
    tiers: doc.tiers.map((t) =>
      t.id !== tierId ? t : { ...t, annotations: t.annotations.map((a) => (a.id === id ? withValue(a, value) : a)) }
    ),
  };
}

/** Shift all time values; negative results follow the `allowNegativeTime` setting by default */
export function shiftEaf(doc: Eaf, shiftMs: number, allowNegative = getSettings().allowNegativeTime): Eaf {
  return { ...toRawEaf(doc), timeOrder: shiftTimeOrder(doc.timeOrder, shiftMs, allowNegative) };
}

export interface AffixOptions {
  prefix?: string;
  suffix?: string;
  /** Only this tier (and the parent refs pointing at it); all tiers if omitted */
  tierId?: string;
}

export function affixTierIds(doc: IndexedEaf, options: AffixOptions): Eaf {
  const { prefix = '', suffix = '', tierId } = options;
  const rename = (id: string) => (tierId === undefined || id === tierId ? `${prefix}${id}${suffix}` : id);
  if (tierId !== undefined && !getTier(doc, tierId)) {
    throw new EafError('TierIdInvalid', `No tier with id '${tierId}'`, { tierId });
  }
  return {
    ...toRawEaf(doc),
    tiers: doc.tiers.map((t) => ({
      ...t,
      id: rename(t.id),
      ...(t.parentRef !== undefined ? { parentRef: rename(t.parentRef) } : {}),
    })),
  };
}

/** Template copy (ETF): structure and metadata only, no annotations, time slots or media */
export function toTemplate(doc: Eaf): Eaf {
  const raw = toRawEaf(doc);
  return {
    ...raw,
    header: { ...raw.header, mediaFile: '', mediaDescriptors: [] },
    timeOrder: [],
    tiers: raw.tiers.map((t) => ({ ...t, annotations: [] })),
  };
}
