import { createStore } from 'zustand/vanilla';
import { temporal } from 'zundo';
import type { Annotation, DerivedEaf, Eaf, Stereotype, Tier } from '../types/elan';
import { EafError } from '../errors';
import { log } from '../utils/log';
import { prepareEaf } from '../services/elan/eaf-derive';
import {
  addAnnotation,
  addSpan,
  addTier,
  affixTierIds,
  removeAnnotation,
  removeTier,
  shiftEaf,
  updateAnnotationValue,
  type AffixOptions,
} from '../services/elan/eaf-editor';
import { extract } from '../services/elan/eaf-extract';
import { importEaf } from '../services/elan/eaf-importer';
import { merge, type MergeOptions } from '../services/elan/eaf-merger';
import { remap } from '../services/elan/eaf-remap';
import { writeEaf } from '../services/elan/eaf-writer';

interface DocumentState {
  /** The current document, always indexed and derived */
  doc: DerivedEaf | null;

  load: (xml: string) => void;
  setDocument: (doc: Eaf) => void;
  clear: () => void;

  addTier: (tier: Tier, stereotype?: Stereotype) => void;
  removeTier: (tierId: string) => void;
  addAnnotation: (tierId: string, annotation: Annotation) => void;
  addSpan: (tierId: string, start: number, end: number, value: string) => void;
  removeAnnotation: (annotationId: string) => void;
  updateAnnotationValue: (annotationId: string, value: string) => void;
  shift: (shiftMs: number, allowNegative?: boolean) => void;
  remap: (annotationStart?: number, timeSlotStart?: number) => void;
  mergeWith: (others: Eaf[], options?: MergeOptions) => void;
  affixTierIds: (options: AffixOptions) => void;

  /** A new document for the window; the current one is left as is */
  extract: (start: number, end: number) => DerivedEaf;
  toXml: () => string;
}

/**
 * Document store with undo history. Each command computes the next document from
 * the current one and commits it only if every step succeeds; a failed command logs,
 * rethrows and leaves the state (and the history) untouched.
 */
export function createDocumentStore() {
  return createStore<DocumentState>()(
    temporal(
      (set, get) => {
        const current = (): DerivedEaf => {
          const { doc } = get();
          if (!doc) throw new EafError('NoData', 'No document loaded');
          return doc;
        };

        const commit = (name: string, next: (doc: DerivedEaf) => Eaf) => {
          let doc: DerivedEaf;
          try {
            doc = prepareEaf(next(current()));
          } catch (err) {
            log.warn(`${name} rejected:`, err instanceof Error ? err.message : err);
            throw err;
          }
          set({ doc });
        };

        return {
          doc: null,

          load: (xml) => set({ doc: importEaf(xml) }),
          setDocument: (doc) => set({ doc: prepareEaf(doc) }),
          clear: () => set({ doc: null }),

          addTier: (tier, stereotype) => commit('addTier', (doc) => addTier(doc, tier, stereotype)),
          removeTier: (tierId) => commit('removeTier', (doc) => removeTier(doc, tierId)),
          addAnnotation: (tierId, annotation) =>
            commit('addAnnotation', (doc) => addAnnotation(doc, tierId, annotation)),
          addSpan: (tierId, start, end, value) => commit('addSpan', (doc) => addSpan(doc, tierId, start, end, value)),
          removeAnnotation: (annotationId) => commit('removeAnnotation', (doc) => removeAnnotation(doc, annotationId)),
          updateAnnotationValue: (annotationId, value) =>
            commit('updateAnnotationValue', (doc) => updateAnnotationValue(doc, annotationId, value)),
          shift: (shiftMs, allowNegative) =>
            commit('shift', (doc) => (allowNegative === undefined ? shiftEaf(doc, shiftMs) : shiftEaf(doc, shiftMs, allowNegative))),
          remap: (annotationStart, timeSlotStart) =>
            commit('remap', (doc) => remap(doc, annotationStart, timeSlotStart)),
          mergeWith: (others, options) => commit('mergeWith', (doc) => merge([doc, ...others], options)),
          affixTierIds: (options) => commit('affixTierIds', (doc) => affixTierIds(doc, options)),

          extract: (start, end) => extract(current(), start, end),
          toXml: () => writeEaf(current()),
        };
      },
      {
        limit: 100,
        partialize: (state) => ({ doc: state.doc }),
      }
    )
  );
}

export const documentStore = createDocumentStore();
