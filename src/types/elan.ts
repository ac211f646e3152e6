export interface TimeSlot {
  id: string;
  /** milliseconds; ELAN allows unaligned slots without a value */
  value: number | null;
}

/**
 * Fields shared by both annotation kinds. `tierId`, `start`, `end` (and
 * `mainAnnotationId` on referred annotations) are derived and never written to disk.
 */
export interface AnnotationBase {
  id: string;
  value: string;
  extRef?: string;
  langRef?: string;
  cveRef?: string;
  tierId?: string;
  start?: number | null;
  end?: number | null;
}

export interface AlignableAnnotation extends AnnotationBase {
  kind: 'alignable';
  timeSlotRef1: string;
  timeSlotRef2: string;
}

export interface ReferredAnnotation extends AnnotationBase {
  kind: 'referred';
  annotationRef: string;
  previousAnnotation?: string;
  mainAnnotationId?: string;
}

export type Annotation = AlignableAnnotation | ReferredAnnotation;

export interface Tier {
  id: string;
  linguisticTypeRef: string;
  participant?: string;
  annotator?: string;
  parentRef?: string;
  defaultLocale?: string;
  langRef?: string;
  extRef?: string;
  annotations: Annotation[];
}

export type Stereotype =
  | 'Time_Subdivision'
  | 'Symbolic_Subdivision'
  | 'Symbolic_Association'
  | 'Included_In';

export interface MediaDescriptor {
  mediaUrl: string;
  relativeMediaUrl?: string;
  mimeType: string;
  timeOrigin?: number;
  extractedFrom?: string;
}

export interface Property {
  name?: string;
  value: string;
}

export interface Header {
  mediaFile: string;
  timeUnits: string;
  mediaDescriptors: MediaDescriptor[];
  properties: Property[];
}

export interface LinguisticType {
  id: string;
  timeAlignable: boolean;
  constraints?: Stereotype;
  graphicReferences?: boolean;
  controlledVocabulary?: string;
  extRef?: string;
  lexiconRef?: string;
}

export interface Constraint {
  stereotype: Stereotype;
  description: string;
}

export interface Locale {
  languageCode: string;
  countryCode?: string;
  variant?: string;
}

export interface Language {
  id: string;
  def?: string;
  label?: string;
}

export interface CvEntryValue {
  value: string;
  langRef?: string;
  description?: string;
}

export interface CvEntry {
  id?: string;
  extRef?: string;
  values: CvEntryValue[];
}

export interface ControlledVocabulary {
  id: string;
  extRef?: string;
  descriptions: { value: string; langRef?: string }[];
  entries: CvEntry[];
}

export interface LexiconRef {
  id: string;
  name: string;
  type: string;
  url: string;
  lexiconId: string;
  lexiconName: string;
  dataCategory?: string;
  dataCategoryId?: string;
}

export interface License {
  url?: string;
  text: string;
}

export interface Eaf {
  author: string;
  date: string;
  version: string;
  format: string;
  license?: License;
  header: Header;
  timeOrder: TimeSlot[];
  tiers: Tier[];
  linguisticTypes: LinguisticType[];
  locales: Locale[];
  languages: Language[];
  constraints: Constraint[];
  controlledVocabularies: ControlledVocabulary[];
  lexiconRefs: LexiconRef[];
}

/** Lookup tables rebuilt wholesale from an `Eaf`, never patched. */
export interface EafIndex {
  /** annotation id -> tier id */
  annotationTier: Map<string, string>;
  /** referred annotation id -> parent annotation id */
  annotationParent: Map<string, string>;
  /** tier id -> annotation ids in tier order */
  tierAnnotations: Map<string, string[]>;
  /** referred tier id -> parent tier id */
  tierParent: Map<string, string>;
  timeSlotValues: Map<string, number | null>;
  timeValueSlots: Map<number, string>;
  /** alignable annotation id -> [ref1, ref2] */
  annotationTimeSlots: Map<string, [string, string]>;
  /** annotation id -> [tier position, annotation position] */
  annotationPosition: Map<string, [number, number]>;
  tierPosition: Map<string, number>;
}

export interface IndexedEaf extends Eaf {
  index: EafIndex;
}

export interface DerivedEaf extends IndexedEaf {
  derived: true;
}
