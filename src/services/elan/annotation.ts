import type { AlignableAnnotation, Annotation, ReferredAnnotation } from '../../types/elan';

type Extras = Pick<Annotation, 'extRef' | 'langRef' | 'cveRef'>;

export function alignableAnnotation(
  id: string,
  timeSlotRef1: string,
  timeSlotRef2: string,
  value: string,
  extras: Extras = {}
): AlignableAnnotation {
  return { kind: 'alignable', id, timeSlotRef1, timeSlotRef2, value, ...extras };
}

export function referredAnnotation(
  id: string,
  annotationRef: string,
  value: string,
  previousAnnotation?: string,
  extras: Extras = {}
): ReferredAnnotation {
  return {
    kind: 'referred',
    id,
    annotationRef,
    value,
    ...(previousAnnotation ? { previousAnnotation } : {}),
    ...extras,
  };
}

export function isAlignable(annotation: Annotation): annotation is AlignableAnnotation {
  return annotation.kind === 'alignable';
}

export function isReferred(annotation: Annotation): annotation is ReferredAnnotation {
  return annotation.kind === 'referred';
}

/** Parent annotation id of a referred annotation */
export function annotationRef(annotation: Annotation): string | undefined {
  return annotation.kind === 'referred' ? annotation.annotationRef : undefined;
}

export function previousAnnotation(annotation: Annotation): string | undefined {
  return annotation.kind === 'referred' ? annotation.previousAnnotation : undefined;
}

export function annotationTimeSlots(annotation: Annotation): [string, string] | undefined {
  return annotation.kind === 'alignable'
    ? [annotation.timeSlotRef1, annotation.timeSlotRef2]
    : undefined;
}

export function withId(annotation: Annotation, id: string): Annotation {
  return { ...annotation, id };
}

export function withValue(annotation: Annotation, value: string): Annotation {
  return { ...annotation, value };
}

/**
 * Rewrite the references an annotation holds. Time slot refs go through `slotIds`,
 * parent and previous annotation refs through `annotationIds`; ids missing from a
 * map are kept as they are.
 */
export function withRefs(
  annotation: Annotation,
  annotationIds: ReadonlyMap<string, string>,
  slotIds?: ReadonlyMap<string, string>
): Annotation {
  if (annotation.kind === 'alignable') {
    if (!slotIds) return annotation;
    return {
      ...annotation,
      timeSlotRef1: slotIds.get(annotation.timeSlotRef1) ?? annotation.timeSlotRef1,
      timeSlotRef2: slotIds.get(annotation.timeSlotRef2) ?? annotation.timeSlotRef2,
    };
  }
  const prev = annotation.previousAnnotation;
  return {
    ...annotation,
    annotationRef: annotationIds.get(annotation.annotationRef) ?? annotation.annotationRef,
    ...(prev ? { previousAnnotation: annotationIds.get(prev) ?? prev } : {}),
    ...(annotation.mainAnnotationId
      ? { mainAnnotationId: annotationIds.get(annotation.mainAnnotationId) ?? annotation.mainAnnotationId }
      : {}),
  };
}

/** Resolved `[start, end]`, or `null` when either end has no value */
export function resolvedSpan(annotation: Annotation): [number, number] | null {
  const { start, end } = annotation;
  return typeof start === 'number' && typeof end === 'number' ? [start, end] : null;
}
