import type { Annotation, Tier, TimeSlot } from '../../types/elan';
import { getSettings } from '../../stores/settings-store';

export interface TierOptions {
  linguisticTypeRef?: string;
  parentRef?: string;
  participant?: string;
  annotator?: string;
}

export function createTier(id: string, annotations: Annotation[] = [], options: TierOptions = {}): Tier {
  const { linguisticTypeRef = getSettings().defaultLinguisticType, ...rest } = options;
  return { id, linguisticTypeRef, ...rest, annotations };
}

export function isMainTier(tier: Tier): boolean {
  return tier.parentRef === undefined;
}

export function isRefTier(tier: Tier): boolean {
  return tier.parentRef !== undefined;
}

/** A tier is tokenized when any of its annotations continues a token run */
export function isTokenizedTier(tier: Tier): boolean {
  return tier.annotations.some((a) => a.kind === 'referred' && a.previousAnnotation !== undefined);
}

/**
 * Time slots implied by a tier's alignable annotations, with the values taken from
 * their derived spans. Used when a tier is brought in from another document.
 */
export function tierTimeSlots(tier: Tier): TimeSlot[] {
  const slots = new Map<string, number | null>();
  for (const a of tier.annotations) {
    if (a.kind !== 'alignable') continue;
    slots.set(a.timeSlotRef1, a.start ?? null);
    slots.set(a.timeSlotRef2, a.end ?? null);
  }
  return [...slots].map(([id, value]) => ({ id, value }));
}

export function tierValues(tier: Tier): string[] {
  return tier.annotations.map((a) => a.value);
}
