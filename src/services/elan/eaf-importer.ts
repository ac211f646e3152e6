import type { DerivedEaf } from '../../types/elan';
import { prepareEaf } from './eaf-derive';
import { parseEaf } from './eaf-parser';
import { validateEaf } from './eaf-validate';

export interface ImportOptions {
  /** Run the structural checks of `validateEaf` on the parsed document */
  validate?: boolean;
}

/** Parse, index and derive an .eaf string in one step */
export function importEaf(xml: string, options: ImportOptions = {}): DerivedEaf {
  const doc = prepareEaf(parseEaf(xml));
  if (options.validate) validateEaf(doc);
  return doc;
}
