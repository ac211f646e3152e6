import type { Eaf, EafIndex, IndexedEaf } from '../../types/elan';
import { log } from '../../utils/log';

/**
 * Build the lookup tables for `doc` in one pass over its time order, tiers and
 * annotations, in document order. Never fails; dangling references simply have
 * no entry.
 */
export function buildIndex(doc: Eaf): EafIndex {
  const index: EafIndex = {
    annotationTier: new Map(),
    annotationParent: new Map(),
    tierAnnotations: new Map(),
    tierParent: new Map(),
    timeSlotValues: new Map(),
    timeValueSlots: new Map(),
    annotationTimeSlots: new Map(),
    annotationPosition: new Map(),
    tierPosition: new Map(),
  };

  for (const ts of doc.timeOrder) {
    index.timeSlotValues.set(ts.id, ts.value);
    if (ts.value !== null && !index.timeValueSlots.has(ts.value)) {
      index.timeValueSlots.set(ts.value, ts.id);
    }
  }

  doc.tiers.forEach((tier, tierIdx) => {
    index.tierPosition.set(tier.id, tierIdx);
    if (tier.parentRef !== undefined) index.tierParent.set(tier.id, tier.parentRef);

    const ids: string[] = [];
    tier.annotations.forEach((a, annotIdx) => {
      ids.push(a.id);
      index.annotationTier.set(a.id, tier.id);
      index.annotationPosition.set(a.id, [tierIdx, annotIdx]);
      if (a.kind === 'alignable') {
        index.annotationTimeSlots.set(a.id, [a.timeSlotRef1, a.timeSlotRef2]);
      } else {
        index.annotationParent.set(a.id, a.annotationRef);
      }
    });
    index.tierAnnotations.set(tier.id, ids);
  });

  return index;
}

export function indexEaf(doc: Eaf): IndexedEaf {
  const index = buildIndex(doc);
  log.debug(`Indexed ${index.annotationTier.size} annotations in ${doc.tiers.length} tiers`);
  return { ...toRawEaf(doc), index };
}

/** Drop the index and derived marker so a mutated copy cannot pass as current */
export function toRawEaf(doc: Eaf): Eaf {
  const {
    author,
    date,
    version,
    format,
    license,
    header,
    timeOrder,
    tiers,
    linguisticTypes,
    locales,
    languages,
    constraints,
    controlledVocabularies,
    lexiconRefs,
  } = doc;
  return {
    author,
    date,
    version,
    format,
    ...(license ? { license } : {}),
    header,
    timeOrder,
    tiers,
    linguisticTypes,
    locales,
    languages,
    constraints,
    controlledVocabularies,
    lexiconRefs,
  };
}

export function isIndexed(doc: Eaf): doc is IndexedEaf {
  return 'index' in doc;
}
