import type { DerivedEaf, Tier, TimeSlot } from '../../types/elan';
import { EafError } from '../../errors';
import { annotationId, maxIdNumber, timeSlotId } from '../../utils/id-generator';
import { defaultLinguisticType } from '../../constants/annotation-types';
import { alignableAnnotation, referredAnnotation } from './annotation';
import { prepareEaf } from './eaf-derive';
import { createEaf } from './eaf-document';
import { hasDuplicateTimeSlots, overlap } from './eaf-validate';
import { createTier, tierTimeSlots } from './tier';

/** `[value, startMs, endMs]` */
export type SpanValue = [string, number, number];

/**
 * Main tier from values in chronological order. Annotation `n` (counting from
 * `startIndex`) gets id `a{n}` and time slots `ts{2n-1}`, `ts{2n}`.
 */
export function mainTierFromValues(values: SpanValue[], tierId: string, startIndex = 1): Tier {
  return createTier(
    tierId,
    values.map(([value, start, end], i) => {
      const n = i + startIndex;
      return { ...alignableAnnotation(annotationId(n), timeSlotId(n * 2 - 1), timeSlotId(n * 2), value), start, end };
    })
  );
}

/**
 * Referred tier pairing each value with the parent annotation at the same position.
 * Ids continue after the parent's highest annotation id unless `startIndex` is given.
 */
export function refTierFromValues(
  values: string[],
  tierId: string,
  parent: Tier,
  linguisticTypeRef: string,
  startIndex?: number
): Tier {
  if (values.length > parent.annotations.length) {
    throw new EafError(
      'TierAlignment',
      `${values.length} values for tier '${tierId}' but only ${parent.annotations.length} annotations in '${parent.id}'`,
      { tierId, parentRef: parent.id }
    );
  }
  const first = startIndex ?? maxIdNumber(parent.annotations.map((a) => a.id)) + 1;
  return createTier(
    tierId,
    values.map((value, i) => referredAnnotation(annotationId(first + i), parent.annotations[i].id, value)),
    { parentRef: parent.id, linguisticTypeRef }
  );
}

function buildEaf(tiers: Tier[]): DerivedEaf {
  const timeOrder: TimeSlot[] = tiers.flatMap(tierTimeSlots);
  if (hasDuplicateTimeSlots(timeOrder)) {
    throw new EafError('TimeslotIdExists', 'Built tiers share time slot ids');
  }
  const doc = prepareEaf({ ...createEaf(), timeOrder, tiers });
  for (const tier of doc.tiers) {
    if (overlap(tier.annotations)) {
      throw new EafError('AnnotationOverlap', `Overlapping values in tier '${tier.id}'`, { tierId: tier.id });
    }
  }
  return doc;
}

/** Document with a single main tier built from `values` */
export function fromValues(values: SpanValue[], tierId = 'default'): DerivedEaf {
  return buildEaf([mainTierFromValues(values, tierId)]);
}

/**
 * Document with one main tier per distinct tier id, in order of first appearance.
 * Annotation and slot numbering runs on across tiers.
 */
export function fromValuesMulti(values: [...SpanValue, string][]): DerivedEaf {
  const groups = new Map<string, SpanValue[]>();
  for (const [value, start, end, tierId] of values) {
    const group = groups.get(tierId) ?? [];
    group.push([value, start, end]);
    groups.set(tierId, group);
  }
  let startIndex = 1;
  const tiers = [...groups].map(([tierId, group]) => {
    const tier = mainTierFromValues(group, tierId, startIndex);
    startIndex += group.length;
    return tier;
  });
  return buildEaf(tiers);
}

/** Add a Symbolic_Association tier under `parentId` holding `values` */
export function withRefTier(doc: DerivedEaf, values: string[], tierId: string, parentId: string): DerivedEaf {
  const parent = doc.tiers.find((t) => t.id === parentId);
  if (!parent) throw new EafError('TierIdInvalid', `No tier with id '${parentId}'`, { tierId: parentId });
  const ltId = 'symbolic-association';
  const start = maxIdNumber(doc.tiers.flatMap((t) => t.annotations.map((a) => a.id))) + 1;
  const tier = refTierFromValues(values, tierId, parent, ltId, start);
  const linguisticTypes = doc.linguisticTypes.some((lt) => lt.id === ltId)
    ? doc.linguisticTypes
    : [...doc.linguisticTypes, defaultLinguisticType(ltId, 'Symbolic_Association')];
  return prepareEaf({ ...doc, linguisticTypes, tiers: [...doc.tiers, tier] });
}
