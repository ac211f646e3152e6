import type { Annotation, DerivedEaf, Eaf, Tier, TimeSlot } from '../../types/elan';
import { EafError } from '../../errors';
import { getSettings, type OverlapStrategy } from '../../stores/settings-store';
import { generateId, timeSlotId } from '../../utils/id-generator';
import { log } from '../../utils/log';
import { withRefs } from './annotation';
import { prepareEaf } from './eaf-derive';
import { toRawEaf } from './eaf-index';
import { remap } from './eaf-remap';
import { overlap, requireSpan } from './eaf-validate';
import { isMainTier } from './tier';

export interface MergeOptions {
  /** What to do when annotations in a merged main tier overlap. Defaults to the settings. */
  overlap?: OverlapStrategy;
}

/** Give every annotation a fresh unique id and rewrite the references between them */
export function tagAnnotations(doc: DerivedEaf): Tier[] {
  const { annotationIdPrefix } = getSettings();
  const ids = new Map<string, string>();
  for (const tier of doc.tiers) {
    for (const a of tier.annotations) ids.set(a.id, generateId(annotationIdPrefix));
  }
  return doc.tiers.map((tier) => ({
    ...tier,
    annotations: tier.annotations.map((a) => ({ ...withRefs(a, ids), id: ids.get(a.id) ?? a.id })),
  }));
}

function stableKey(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableKey).join(',')}]`;
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableKey(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'undefined';
}

/** Concatenate, keeping the first of any entries that are equal by value */
export function unionByValue<T>(lists: T[][]): T[] {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const item of lists.flat()) {
    const key = stableKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

/** Tiers grouped by id; the first tier seen supplies the attributes */
export function unionTiers(tierLists: Tier[][]): Tier[] {
  const merged = new Map<string, Tier>();
  for (const tier of tierLists.flat()) {
    const existing = merged.get(tier.id);
    if (!existing) {
      merged.set(tier.id, { ...tier, annotations: [...tier.annotations] });
      continue;
    }
    if (isMainTier(existing) !== isMainTier(tier)) {
      throw new EafError('TierTypeMismatch', `Tier '${tier.id}' is a main tier in one document and referred in another`, {
        tierId: tier.id,
      });
    }
    existing.annotations.push(...tier.annotations);
  }
  return [...merged.values()];
}

function compareStart(a: Annotation, b: Annotation): number {
  const sa = a.start ?? null;
  const sb = b.start ?? null;
  if (sa === null || sb === null) return sa === sb ? 0 : sa === null ? 1 : -1;
  return sa - sb;
}

function overlapError(tier: Tier, a: Annotation, b: Annotation): EafError {
  return new EafError('AnnotationOverlap', `Annotations overlap in tier '${tier.id}'`, {
    tierId: tier.id,
    annotationId: a.id,
    otherAnnotationId: b.id,
  });
}

/**
 * Apply the overlap strategy to a main tier whose annotations are sorted by start.
 * `prioritize-first` ends the earlier annotation where the later one starts;
 * `prioritize-last` starts the later annotation where the earlier one ends.
 */
export function resolveOverlaps(tier: Tier, strategy: OverlapStrategy): Tier {
  if (strategy === 'fail') {
    if (overlap(tier.annotations)) {
      throw new EafError('AnnotationOverlap', `Annotations overlap in tier '${tier.id}'`, { tierId: tier.id });
    }
    return tier;
  }

  const annotations = [...tier.annotations];
  for (let i = 0; i + 1 < annotations.length; i++) {
    const [aStart, aEnd] = requireSpan(annotations[i]);
    const [bStart, bEnd] = requireSpan(annotations[i + 1]);
    if (aEnd <= bStart) continue;
    if (strategy === 'prioritize-first') {
      if (bStart <= aStart) throw overlapError(tier, annotations[i], annotations[i + 1]);
      annotations[i] = { ...annotations[i], end: bStart };
    } else {
      if (aEnd >= bEnd) throw overlapError(tier, annotations[i], annotations[i + 1]);
      annotations[i + 1] = { ...annotations[i + 1], start: aEnd };
    }
  }
  return { ...tier, annotations };
}

interface SortableSlot {
  slot: TimeSlot;
  key: number;
  rank: number;
}

/**
 * Sort position of an annotation's two slots. A slot without a value sorts next to
 * its partner: an unaligned end right after the start, an unaligned start right
 * before the end. Slots of fully unaligned annotations go last.
 */
function sortableSlots(ref1: TimeSlot, ref2: TimeSlot): SortableSlot[] {
  const start = ref1.value;
  const end = ref2.value;
  if (start === null && end === null) {
    return [
      { slot: ref1, key: Infinity, rank: 0 },
      { slot: ref2, key: Infinity, rank: 0 },
    ];
  }
  return [
    start === null ? { slot: ref1, key: end ?? 0, rank: -1 } : { slot: ref1, key: start, rank: 0 },
    end === null ? { slot: ref2, key: start ?? 0, rank: 1 } : { slot: ref2, key: end, rank: 0 },
  ];
}

/**
 * Build a new time order from the derived spans of all alignable annotations, two
 * slots per annotation, and point the annotations at them. The time order comes out
 * sorted by value.
 */
export function generateTimeOrder(tiers: Tier[]): { timeOrder: TimeSlot[]; tiers: Tier[] } {
  const slots: SortableSlot[] = [];
  let n = 1;
  const aligned = tiers.map((tier) => ({
    ...tier,
    annotations: tier.annotations.map((a): Annotation => {
      if (a.kind !== 'alignable') return a;
      const ref1 = timeSlotId(n++);
      const ref2 = timeSlotId(n++);
      slots.push(...sortableSlots({ id: ref1, value: a.start ?? null }, { id: ref2, value: a.end ?? null }));
      return { ...a, timeSlotRef1: ref1, timeSlotRef2: ref2 };
    }),
  }));

  slots.sort((a, b) => (a.key === b.key ? a.rank - b.rank : a.key < b.key ? -1 : 1));
  return { timeOrder: slots.map((s) => s.slot), tiers: aligned };
}

/**
 * Merge documents into one. Each input is indexed and derived on its own, its
 * annotations re-identified so ids cannot collide, and tiers sharing an id are
 * joined. The result gets a fresh time order and sequential ids.
 */
export function merge(docs: Eaf[], options: MergeOptions = {}): DerivedEaf {
  if (docs.length === 0) {
    throw new EafError('NoData', 'Nothing to merge');
  }
  const strategy = options.overlap ?? getSettings().overlapStrategy;

  const prepared = docs.map((doc) => prepareEaf(doc));
  const tiers = unionTiers(prepared.map(tagAnnotations)).map((tier) => {
    const sorted = { ...tier, annotations: [...tier.annotations].sort(compareStart) };
    return isMainTier(sorted) ? resolveOverlaps(sorted, strategy) : sorted;
  });

  const generated = generateTimeOrder(tiers);
  const sortedTiers = [...generated.tiers].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  const first = prepared[0];
  const merged: Eaf = {
    ...toRawEaf(first),
    timeOrder: generated.timeOrder,
    tiers: sortedTiers,
    linguisticTypes: unionByValue(prepared.map((d) => d.linguisticTypes)),
    locales: unionByValue(prepared.map((d) => d.locales)),
    languages: unionByValue(prepared.map((d) => d.languages)),
    constraints: unionByValue(prepared.map((d) => d.constraints)),
    controlledVocabularies: unionByValue(prepared.map((d) => d.controlledVocabularies)),
    lexiconRefs: unionByValue(prepared.map((d) => d.lexiconRefs)),
  };

  const result = remap(prepareEaf(merged), 1, 1);
  log.debug(`Merged ${docs.length} documents into ${result.tiers.length} tiers`);
  return result;
}
