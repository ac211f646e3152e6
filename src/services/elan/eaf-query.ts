import type { Annotation, Eaf, Tier } from '../../types/elan';
import { annotationRef } from './annotation';
import { countNgrams, normalizedTokens, tokenCount, tokens } from './annotation-value';

export interface QueryMatch {
  /** 1-based position of the annotation within its tier */
  index: number;
  tierId: string;
  annotationId: string;
  value: string;
  /** Parent annotation id for referred annotations */
  annotationRef?: string;
}

function matches(tier: Tier, test: (value: string) => boolean): QueryMatch[] {
  const out: QueryMatch[] = [];
  tier.annotations.forEach((a, i) => {
    if (!test(a.value)) return;
    out.push({ index: i + 1, tierId: tier.id, annotationId: a.id, value: a.value, annotationRef: annotationRef(a) });
  });
  return out;
}

/** Annotations whose value contains `pattern`, in document order */
export function query(doc: Eaf, pattern: string, ignoreCase = false): QueryMatch[] {
  const needle = ignoreCase ? pattern.toLowerCase() : pattern;
  return doc.tiers.flatMap((tier) =>
    matches(tier, (value) => (ignoreCase ? value.toLowerCase() : value).includes(needle))
  );
}

export function queryRegex(doc: Eaf, regex: RegExp): QueryMatch[] {
  // a global regex keeps lastIndex between calls to test()
  const rx = regex.global || regex.sticky ? new RegExp(regex.source, regex.flags.replace(/[gy]/g, '')) : regex;
  return doc.tiers.flatMap((tier) => matches(tier, (value) => rx.test(value)));
}

export interface TokenOptions {
  /** Characters stripped from the start of each token, e.g. "<*" */
  stripPrefix?: string;
  /** Characters stripped from the end of each token */
  stripSuffix?: string;
  unique?: boolean;
  ignoreCase?: boolean;
}

function trimChars(token: string, prefix: string, suffix: string): string {
  const chars = [...token];
  let start = 0;
  let end = chars.length;
  while (start < end && prefix.includes(chars[start])) start++;
  while (end > start && suffix.includes(chars[end - 1])) end--;
  return chars.slice(start, end).join('');
}

/** Every whitespace separated token of every annotation, sorted */
export function documentTokens(doc: Eaf, options: TokenOptions = {}): string[] {
  const { stripPrefix = '', stripSuffix = '', unique = false, ignoreCase = false } = options;
  const all = doc.tiers
    .flatMap((t) => t.annotations)
    .flatMap((a) => tokens(a.value))
    .map((t) => trimChars(t, stripPrefix, stripSuffix))
    .map((t) => (ignoreCase ? t.toLowerCase() : t))
    .sort();
  return unique ? [...new Set(all)] : all;
}

/**
 * - `annotation`: n-grams never cross annotation boundaries
 * - `tier`: the tier's tokens form one sequence
 * - `file`: every tier as with `tier`, counts summed
 */
export type NgramScope = { kind: 'annotation'; tierId: string } | { kind: 'tier'; tierId: string } | { kind: 'file' };

export interface NgramOptions {
  /** Deleted from each lower cased token before counting */
  remove?: RegExp;
  scope?: NgramScope;
}

function tierNgrams(tier: Tier, size: number, remove: RegExp | undefined, counts: Map<string, number>) {
  countNgrams(
    tier.annotations.flatMap((a) => normalizedTokens(a.value, remove)),
    size,
    counts
  );
}

/** Case-insensitive n-gram counts. An unknown tier id gives an empty result. */
export function documentNgrams(doc: Eaf, size: number, options: NgramOptions = {}): Map<string, number> {
  const { remove, scope = { kind: 'file' } } = options;
  const counts = new Map<string, number>();
  if (scope.kind === 'file') {
    for (const tier of doc.tiers) tierNgrams(tier, size, remove, counts);
    return counts;
  }
  const tier = doc.tiers.find((t) => t.id === scope.tierId);
  if (!tier) return counts;
  if (scope.kind === 'tier') {
    tierNgrams(tier, size, remove, counts);
  } else {
    for (const a of tier.annotations) countNgrams(normalizedTokens(a.value, remove), size, counts);
  }
  return counts;
}

export interface EafStats {
  annotationCount: number;
  tierCount: number;
  tokenCount: number;
  averageTokensPerAnnotation: number;
  averageAnnotationsPerTier: number;
  averageTokenLength: number;
}

/** Counts and averages over annotation values; averages are 0 for an empty document */
export function stats(doc: Eaf): EafStats {
  const all: Annotation[] = doc.tiers.flatMap((t) => t.annotations);
  const words = all.flatMap((a) => tokens(a.value));
  const tokenTotal = all.reduce((sum, a) => sum + tokenCount(a.value), 0);
  const charTotal = words.reduce((sum, w) => sum + [...w].length, 0);
  return {
    annotationCount: all.length,
    tierCount: doc.tiers.length,
    tokenCount: tokenTotal,
    averageTokensPerAnnotation: all.length === 0 ? 0 : tokenTotal / all.length,
    averageAnnotationsPerTier: doc.tiers.length === 0 ? 0 : all.length / doc.tiers.length,
    averageTokenLength: words.length === 0 ? 0 : charTotal / words.length,
  };
}
