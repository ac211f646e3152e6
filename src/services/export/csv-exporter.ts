import type { DerivedEaf } from '../../types/elan';
import { formatTime, msToSec } from '../../utils/time';

/** Escape a CSV field: wrap in double-quotes and escape internal double-quotes */
function csvEscape(value: string): string {
  if (value.includes('"') || value.includes(',') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return `"${value}"`;
}

function timeColumns(start: number | null | undefined, end: number | null | undefined): string[] {
  if (typeof start !== 'number' || typeof end !== 'number') return ['', '', '', '', ''];
  return [String(start), String(end), formatTime(start), formatTime(end), msToSec(end - start).toFixed(3)];
}

/** One row per annotation in document order, with times resolved through referred tiers */
export function exportAnnotationsCsv(doc: DerivedEaf): string {
  const rows = [
    ['Tier', 'Parent Tier', 'Annotation ID', 'Start (ms)', 'End (ms)', 'Start', 'End', 'Duration (s)', 'Value'].join(','),
  ];
  for (const tier of doc.tiers) {
    for (const a of tier.annotations) {
      rows.push(
        [
          csvEscape(tier.id),
          csvEscape(tier.parentRef ?? ''),
          csvEscape(a.id),
          ...timeColumns(a.start, a.end),
          csvEscape(a.value),
        ].join(',')
      );
    }
  }

  // UTF-8 BOM for Excel compatibility
  return '\uFEFF' + rows.join('\n');
}
