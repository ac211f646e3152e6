import { randomUUID } from 'node:crypto';
import { getSettings } from '../stores/settings-store';

export function generateId(prefix = ''): string {
  const uuid = randomUUID();
  return prefix ? `${prefix}_${uuid}` : uuid;
}

export function annotationId(n: number): string {
  return `${getSettings().annotationIdPrefix}${n}`;
}

export function timeSlotId(n: number): string {
  return `${getSettings().timeSlotIdPrefix}${n}`;
}

/** Numeric tail of an id, e.g. 12 for "ts12". `null` if there is none. */
export function idNumber(id: string): number | null {
  const match = id.match(/(\d+)$/);
  return match ? parseInt(match[1], 10) : null;
}

/** Highest numeric tail among `ids`, 0 if none carries one */
export function maxIdNumber(ids: Iterable<string>): number {
  let max = 0;
  for (const id of ids) {
    const n = idNumber(id);
    if (n !== null && n > max) max = n;
  }
  return max;
}
