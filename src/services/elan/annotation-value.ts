/** Whitespace separated tokens. Scripts without word spacing are out of reach. */
export function tokens(value: string): string[] {
  return value.split(/\s+/).filter((t) => t.length > 0);
}

export function tokenCount(value: string): number {
  return tokens(value).length;
}

/** Code point count */
export function charCount(value: string): number {
  return [...value].length;
}

export function averageTokenLength(value: string): number {
  const lengths = tokens(value).map(charCount);
  return lengths.length === 0 ? 0 : lengths.reduce((sum, n) => sum + n, 0) / lengths.length;
}

/** Lower cased tokens, with `remove` matches deleted from each */
export function normalizedTokens(value: string, remove?: RegExp): string[] {
  return tokens(value).map((t) => {
    const lower = t.toLowerCase();
    return remove ? lower.replace(toGlobal(remove), '') : lower;
  });
}

/** Count space-joined windows of `size` tokens into `counts` */
export function countNgrams(
  words: string[],
  size: number,
  counts: Map<string, number> = new Map()
): Map<string, number> {
  if (size < 1) return counts;
  for (let i = 0; i + size <= words.length; i++) {
    const gram = words.slice(i, i + size).join(' ');
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

export function ngrams(value: string, size: number, remove?: RegExp): Map<string, number> {
  return countNgrams(normalizedTokens(value, remove), size);
}

function toGlobal(rx: RegExp): RegExp {
  return rx.global ? rx : new RegExp(rx.source, rx.flags + 'g');
}
