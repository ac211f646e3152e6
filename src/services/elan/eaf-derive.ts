import type {
  AlignableAnnotation,
  Annotation,
  DerivedEaf,
  Eaf,
  EafIndex,
  IndexedEaf,
  ReferredAnnotation,
} from '../../types/elan';
import { EafError } from '../../errors';
import { log } from '../../utils/log';
import { indexEaf, toRawEaf } from './eaf-index';
import { checkUniqueIds } from './eaf-validate';

interface Resolved {
  tierId: string;
  start: number | null;
  end: number | null;
  mainAnnotationId?: string;
}

export function annotationById(doc: IndexedEaf, id: string): Annotation | undefined {
  const pos = doc.index.annotationPosition.get(id);
  return pos ? doc.tiers[pos[0]]?.annotations[pos[1]] : undefined;
}

/**
 * Follow parent references up to the alignable annotation at the top of the chain.
 * `memo` maps already resolved annotation ids to their main annotation.
 */
export function resolveMainAnnotation(
  doc: IndexedEaf,
  annotation: ReferredAnnotation,
  memo: Map<string, AlignableAnnotation> = new Map()
): AlignableAnnotation {
  const visited = [annotation.id];
  let current: Annotation = annotation;

  while (current.kind === 'referred') {
    const parentId: string = doc.index.annotationParent.get(current.id) ?? current.annotationRef;
    const cached: AlignableAnnotation | undefined = memo.get(parentId);
    if (!cached && visited.includes(parentId)) {
      throw new EafError(
        'AnnotationCycle',
        `Annotation '${annotation.id}' has a cyclic parent chain through '${parentId}'`,
        { annotationId: annotation.id, annotationRef: parentId }
      );
    }
    const parent: Annotation | undefined = cached ?? annotationById(doc, parentId);
    if (!parent) {
      throw new EafError(
        'AnnotationMainMissing',
        `No main annotation for '${annotation.id}': parent '${parentId}' does not exist`,
        { annotationId: annotation.id, annotationRef: parentId }
      );
    }
    visited.push(parentId);
    current = parent;
  }

  for (const id of visited) memo.set(id, current);
  return current;
}

function slotValue(index: EafIndex, ref: string, annotationId: string): number | null {
  const value = index.timeSlotValues.get(ref);
  if (value === undefined) {
    throw new EafError('TimeslotRefMissing', `Annotation '${annotationId}' refers to missing time slot '${ref}'`, {
      annotationId,
      timeSlotRef: ref,
    });
  }
  return value;
}

/**
 * Resolve the time span of every annotation, and the main annotation of every
 * referred one. Duplicate tier, annotation or time slot ids are rejected first.
 * Values are collected into a side table first and applied to copies
 * of the tiers afterwards, so the walk only ever reads the document it was given.
 */
export function deriveEaf(doc: IndexedEaf): DerivedEaf {
  checkUniqueIds(doc);
  const { index } = doc;
  const memo = new Map<string, AlignableAnnotation>();

  const table: Resolved[][] = doc.tiers.map((tier) =>
    tier.annotations.map((a): Resolved => {
      if (a.kind === 'alignable') {
        return {
          tierId: tier.id,
          start: slotValue(index, a.timeSlotRef1, a.id),
          end: slotValue(index, a.timeSlotRef2, a.id),
        };
      }
      const main = resolveMainAnnotation(doc, a, memo);
      return {
        tierId: tier.id,
        start: slotValue(index, main.timeSlotRef1, a.id),
        end: slotValue(index, main.timeSlotRef2, a.id),
        mainAnnotationId: main.id,
      };
    })
  );

  const tiers = doc.tiers.map((tier, t) => ({
    ...tier,
    annotations: tier.annotations.map((a, i): Annotation => ({ ...a, ...table[t][i] })),
  }));

  log.debug(`Derived ${index.annotationTier.size} annotations`);
  return { ...toRawEaf(doc), tiers, index, derived: true };
}

/** Index then derive */
export function prepareEaf(doc: Eaf): DerivedEaf {
  return deriveEaf(indexEaf(doc));
}

export function isDerived(doc: Eaf): doc is DerivedEaf {
  return 'derived' in doc && 'index' in doc;
}

/** `doc` itself when it is already derived, otherwise a freshly prepared copy */
export function ensureDerived(doc: Eaf): DerivedEaf {
  return isDerived(doc) ? doc : prepareEaf(doc);
}
