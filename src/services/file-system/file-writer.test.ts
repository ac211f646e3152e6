import { mkdir, mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fromValues } from '../elan/eaf-builder';
import { readEafFile, writeEafFile } from './file-writer';

describe('file-writer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'eafkit-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a document and reads it back prepared', async () => {
    const path = join(dir, 'out.eaf');
    await writeEafFile(path, fromValues([['one', 0, 100]]));

    const xml = await readFile(path, 'utf8');
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);

    const doc = await readEafFile(path);
    expect(doc.tiers[0].annotations[0]).toMatchObject({ id: 'a1', value: 'one', start: 0, end: 100 });
  });

  it('leaves no temporary file behind when the write fails', async () => {
    const path = join(dir, 'taken.eaf');
    await mkdir(path);
    await expect(writeEafFile(path, fromValues([['one', 0, 100]]))).rejects.toThrow();
    expect(await readdir(dir)).toEqual(['taken.eaf']);
  });

  it('rejects a missing file', async () => {
    await expect(readEafFile(join(dir, 'missing.eaf'))).rejects.toThrow();
  });
});
