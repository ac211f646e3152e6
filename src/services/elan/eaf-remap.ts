import type { Annotation, DerivedEaf } from '../../types/elan';
import { EafError } from '../../errors';
import { annotationId, timeSlotId } from '../../utils/id-generator';
import { log } from '../../utils/log';
import { withRefs } from './annotation';
import { prepareEaf } from './eaf-derive';
import { toRawEaf } from './eaf-index';

export interface RemapTables {
  annotationIds: Map<string, string>;
  timeSlotIds: Map<string, string>;
}

/**
 * Old -> new id tables: time slots numbered from `timeSlotStart` in time order,
 * annotations from `annotationStart` in document order.
 */
export function remapTables(doc: DerivedEaf, annotationStart = 1, timeSlotStart = 1): RemapTables {
  const timeSlotIds = new Map<string, string>();
  doc.timeOrder.forEach((ts, i) => {
    if (timeSlotIds.has(ts.id)) {
      throw new EafError('TimeslotIdExists', `Duplicate time slot id '${ts.id}'`, { timeSlotId: ts.id });
    }
    timeSlotIds.set(ts.id, timeSlotId(timeSlotStart + i));
  });

  const annotationIds = new Map<string, string>();
  let n = annotationStart;
  for (const tier of doc.tiers) {
    for (const a of tier.annotations) {
      if (annotationIds.has(a.id)) {
        throw new EafError('AnnotationIdExists', `Duplicate annotation id '${a.id}'`, { annotationId: a.id });
      }
      annotationIds.set(a.id, annotationId(n++));
    }
  }

  return { annotationIds, timeSlotIds };
}

function remapAnnotation(a: Annotation, tables: RemapTables): Annotation {
  if (a.kind === 'alignable') {
    for (const ref of [a.timeSlotRef1, a.timeSlotRef2]) {
      if (!tables.timeSlotIds.has(ref)) {
        throw new EafError('TimeslotIdInvalid', `Annotation '${a.id}' refers to unknown time slot '${ref}'`, {
          annotationId: a.id,
          timeSlotRef: ref,
        });
      }
    }
  }
  const renamed = withRefs(a, tables.annotationIds, tables.timeSlotIds);
  return { ...renamed, id: tables.annotationIds.get(a.id) ?? a.id };
}

/**
 * Renumber every annotation and time slot id and rewrite all references to match.
 * Returns a re-indexed, re-derived copy; `doc` is left as it was.
 */
export function remap(doc: DerivedEaf, annotationStart = 1, timeSlotStart = 1): DerivedEaf {
  const tables = remapTables(doc, annotationStart, timeSlotStart);

  const timeOrder = doc.timeOrder.map((ts) => ({ ...ts, id: tables.timeSlotIds.get(ts.id) ?? ts.id }));
  const tiers = doc.tiers.map((tier) => ({
    ...tier,
    annotations: tier.annotations.map((a) => remapAnnotation(a, tables)),
  }));

  log.debug(`Remapped ${tables.annotationIds.size} annotations and ${tables.timeSlotIds.size} time slots`);
  return prepareEaf({ ...toRawEaf(doc), timeOrder, tiers });
}
