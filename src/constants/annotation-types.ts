import type { Constraint, LinguisticType, Stereotype } from '../types/elan';

export const STEREOTYPES: Stereotype[] = [
  'Time_Subdivision',
  'Symbolic_Subdivision',
  'Symbolic_Association',
  'Included_In',
];

export const STEREOTYPE_DESCRIPTIONS: Record<Stereotype, string> = {
  Time_Subdivision:
    "Time subdivision of parent annotation's time interval, no time gaps allowed within this interval",
  Symbolic_Subdivision:
    'Symbolic subdivision of a parent annotation. Annotations refering to the same parent are ordered',
  Symbolic_Association: '1-1 association with a parent annotation',
  Included_In:
    "Time alignable annotations within the parent annotation's time interval, gaps are allowed",
};

/** Stereotypes whose tiers are still time-alignable */
export const TIME_ALIGNABLE_STEREOTYPES: ReadonlySet<Stereotype> = new Set<Stereotype>([
  'Time_Subdivision',
  'Included_In',
]);

export function isStereotype(value: string): value is Stereotype {
  return STEREOTYPES.some((s) => s === value);
}

export function constraintFor(stereotype: Stereotype): Constraint {
  return { stereotype, description: STEREOTYPE_DESCRIPTIONS[stereotype] };
}

export function defaultLinguisticType(id: string, stereotype?: Stereotype): LinguisticType {
  return {
    id,
    timeAlignable: stereotype === undefined || TIME_ALIGNABLE_STEREOTYPES.has(stereotype),
    constraints: stereotype,
    graphicReferences: false,
  };
}
