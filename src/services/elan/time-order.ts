import type { TimeSlot } from '../../types/elan';
import { EafError } from '../../errors';
import { maxIdNumber, timeSlotId } from '../../utils/id-generator';

export function findTimeSlot(timeOrder: TimeSlot[], id: string): TimeSlot | undefined {
  return timeOrder.find((ts) => ts.id === id);
}

function values(timeOrder: TimeSlot[]): number[] {
  return timeOrder.flatMap((ts) => (ts.value === null ? [] : [ts.value]));
}

/** Smallest time value; slots without a value are ignored */
export function minTime(timeOrder: TimeSlot[]): number | null {
  const vals = values(timeOrder);
  return vals.length > 0 ? Math.min(...vals) : null;
}

export function maxTime(timeOrder: TimeSlot[]): number | null {
  const vals = values(timeOrder);
  return vals.length > 0 ? Math.max(...vals) : null;
}

/**
 * Shift every time value by `shiftMs`. Unless `allowNegative` is set, a shift that
 * would take the smallest value below zero raises `ValueTooSmall`.
 */
export function shiftTimeOrder(
  timeOrder: TimeSlot[],
  shiftMs: number,
  allowNegative: boolean
): TimeSlot[] {
  if (!allowNegative) {
    const min = minTime(timeOrder);
    if (min !== null && min + shiftMs < 0) {
      throw new EafError('ValueTooSmall', `Shifting by ${shiftMs} ms gives negative time value ${min + shiftMs}`, {
        value: min + shiftMs,
      });
    }
  }
  return timeOrder.map((ts) => (ts.value === null ? ts : { ...ts, value: ts.value + shiftMs }));
}

/** `count` fresh slot ids numbered after the highest existing one */
export function nextTimeSlotIds(timeOrder: TimeSlot[], count: number): string[] {
  const start = maxIdNumber(timeOrder.map((ts) => ts.id)) + 1;
  return Array.from({ length: count }, (_, i) => timeSlotId(start + i));
}

/** Keep slots with a value inside `[start, end]`; valueless slots are dropped */
export function filterTimeOrder(timeOrder: TimeSlot[], start: number, end: number): TimeSlot[] {
  return timeOrder.filter((ts) => ts.value !== null && ts.value >= start && ts.value <= end);
}

/** Remove slots no alignable annotation points at */
export function pruneTimeOrder(timeOrder: TimeSlot[], usedRefs: ReadonlySet<string>): TimeSlot[] {
  return timeOrder.filter((ts) => usedRefs.has(ts.id));
}
