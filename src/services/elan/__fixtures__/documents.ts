import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Eaf } from '../../../types/elan';
import { alignableAnnotation, referredAnnotation } from '../annotation';
import { createEaf } from '../eaf-document';
import { createTier } from '../tier';

export function sampleXml(): string {
  return readFileSync(join(__dirname, 'sample.eaf'), 'utf8');
}

/** Main tier "words" with a1, a2 and a referred tier "translit" with r1 -> a1 */
export function wordsDoc(): Eaf {
  return createEaf({
    timeOrder: [
      { id: 'ts1', value: 0 },
      { id: 'ts2', value: 500 },
      { id: 'ts3', value: 500 },
      { id: 'ts4', value: 1000 },
    ],
    tiers: [
      createTier('words', [
        alignableAnnotation('a1', 'ts1', 'ts2', 'hello'),
        alignableAnnotation('a2', 'ts3', 'ts4', 'world'),
      ]),
      createTier('translit', [referredAnnotation('r1', 'a1', 'HELLO')], {
        parentRef: 'words',
        linguisticTypeRef: 'translit-lt',
      }),
    ],
    linguisticTypes: [
      { id: 'default-lt', timeAlignable: true, graphicReferences: false },
      { id: 'translit-lt', timeAlignable: false, constraints: 'Symbolic_Association', graphicReferences: false },
    ],
  });
}

/** Single main tier with one annotation per `[value, start, end]`, ids prefixed with `tag` */
export function spanDoc(tierId: string, spans: [string, number, number][], tag = ''): Eaf {
  return createEaf({
    timeOrder: spans.flatMap(([, start, end], i) => [
      { id: `${tag}ts${i * 2 + 1}`, value: start },
      { id: `${tag}ts${i * 2 + 2}`, value: end },
    ]),
    tiers: [
      createTier(
        tierId,
        spans.map(([value], i) => alignableAnnotation(`${tag}a${i + 1}`, `${tag}ts${i * 2 + 1}`, `${tag}ts${i * 2 + 2}`, value))
      ),
    ],
  });
}

/** The value `fn` throws; fails the test when it returns normally */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}
