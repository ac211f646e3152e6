import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import type { DerivedEaf, Eaf } from '../../types/elan';
import { importEaf, type ImportOptions } from '../elan/eaf-importer';
import { writeEaf } from '../elan/eaf-writer';
import { log } from '../../utils/log';

/** Read and prepare an .eaf file */
export async function readEafFile(path: string, options: ImportOptions = {}): Promise<DerivedEaf> {
  const xml = await readFile(path, 'utf8');
  log.debug(`Read ${xml.length} characters from ${path}`);
  return importEaf(xml, options);
}

/** Write a document as .eaf XML. The file is replaced only once the new content is on disk. */
export async function writeEafFile(path: string, doc: Eaf): Promise<void> {
  const tmp = `${path}.tmp`;
  try {
    await writeFile(tmp, writeEaf(doc), 'utf8');
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
  log.debug(`Wrote ${doc.tiers.length} tiers to ${path}`);
}
