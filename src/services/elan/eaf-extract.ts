import type { DerivedEaf, Eaf } from '../../types/elan';
import { EafError } from '../../errors';
import { ensureDerived, prepareEaf } from './eaf-derive';
import { toRawEaf } from './eaf-index';
import { remap } from './eaf-remap';
import { filterTimeOrder, pruneTimeOrder, shiftTimeOrder } from './time-order';

/**
 * Cut out the time window `[start, end]` (milliseconds).
 *
 * Annotations are kept only when both time slots of their main annotation fall inside
 * the window; anything straddling a boundary is dropped whole, along with time slots
 * nothing refers to any more. The result is renumbered from 1 and shifted so that
 * `start` becomes 0.
 */
export function extract(doc: Eaf, start: number, end: number): DerivedEaf {
  if (start > end) {
    throw new EafError('TimeSpanInvalid', `Invalid time span ${start}-${end}`, { start, end });
  }
  const derived = ensureDerived(doc);
  const timeOrder = filterTimeOrder(derived.timeOrder, start, end);
  const inWindow = new Set(timeOrder.map((ts) => ts.id));

  const tiers = derived.tiers.map((tier) => ({
    ...tier,
    annotations: tier.annotations.filter((a) => {
      const mainId = a.kind === 'alignable' ? a.id : a.mainAnnotationId;
      const refs = mainId === undefined ? undefined : derived.index.annotationTimeSlots.get(mainId);
      return refs !== undefined && inWindow.has(refs[0]) && inWindow.has(refs[1]);
    }),
  }));

  const used = new Set(
    tiers.flatMap((t) => t.annotations.flatMap((a) => (a.kind === 'alignable' ? [a.timeSlotRef1, a.timeSlotRef2] : [])))
  );
  const subset = remap(prepareEaf({ ...toRawEaf(derived), timeOrder: pruneTimeOrder(timeOrder, used), tiers }), 1, 1);
  return prepareEaf({ ...toRawEaf(subset), timeOrder: shiftTimeOrder(subset.timeOrder, -start, false) });
}
