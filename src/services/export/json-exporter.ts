import type { DerivedEaf } from '../../types/elan';
import { toRawEaf } from '../elan/eaf-index';

export interface JsonExportOptions {
  /** Tiers and annotations with resolved times only, instead of the full document */
  simple?: boolean;
  /** Indentation passed to `JSON.stringify` */
  indent?: number;
}

export interface SimpleJsonAnnotation {
  id: string;
  start: number | null;
  end: number | null;
  value: string;
  annotationRef?: string;
}

export interface SimpleJsonTier {
  id: string;
  parentRef?: string;
  annotations: SimpleJsonAnnotation[];
}

export function simpleJson(doc: DerivedEaf): { tiers: SimpleJsonTier[] } {
  return {
    tiers: doc.tiers.map((t) => ({
      id: t.id,
      ...(t.parentRef !== undefined ? { parentRef: t.parentRef } : {}),
      annotations: t.annotations.map((a) => ({
        id: a.id,
        start: a.start ?? null,
        end: a.end ?? null,
        value: a.value,
        ...(a.kind === 'referred' ? { annotationRef: a.annotationRef } : {}),
      })),
    })),
  };
}

/** JSON for a derived document; the full form keeps every field but the lookup index */
export function exportEafJson(doc: DerivedEaf, options: JsonExportOptions = {}): string {
  const { simple = false, indent = 2 } = options;
  return JSON.stringify(simple ? simpleJson(doc) : toRawEaf(doc), null, indent);
}
