import { isEafError } from '../errors';
import { annotations, getAnnotation, tierIds } from '../services/elan/eaf-document';
import { sampleXml, spanDoc, thrown } from '../services/elan/__fixtures__/documents';
import { createDocumentStore } from './document-store';

function loadedStore() {
  const store = createDocumentStore();
  store.getState().load(sampleXml());
  return store;
}

function currentDoc(store: ReturnType<typeof createDocumentStore>) {
  const { doc } = store.getState();
  if (!doc) throw new Error('no document');
  return doc;
}

describe('document-store', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('rejects commands before a document is loaded', () => {
    const store = createDocumentStore();
    expect(isEafError(thrown(() => store.getState().toXml()), 'NoData')).toBe(true);
  });

  it('loads a document ready for queries', () => {
    const doc = currentDoc(loadedStore());
    expect(doc.derived).toBe(true);
    expect(getAnnotation(doc, 'a4')).toMatchObject({ tierId: 'translation', start: 0, end: 500 });
  });

  it('commits edits and keeps the document derived', () => {
    const store = loadedStore();
    store.getState().addSpan('utterance', 2100, 2500, 'later');
    store.getState().updateAnnotationValue('a1', 'hi');
    const doc = currentDoc(store);
    expect(annotations(doc, 'utterance').map((a) => a.value)).toEqual(['hi', 'good morning', 'bye bye', 'later']);
    expect(getAnnotation(doc, 'a9')).toMatchObject({ start: 2100, end: 2500, tierId: 'utterance' });
  });

  it('undoes and redoes commands', () => {
    const store = loadedStore();
    store.getState().removeTier('comment');
    expect(tierIds(currentDoc(store))).toEqual(['utterance', 'translation', 'words']);

    store.temporal.getState().undo();
    expect(tierIds(currentDoc(store))).toEqual(['utterance', 'translation', 'comment', 'words']);

    store.temporal.getState().redo();
    expect(tierIds(currentDoc(store))).toEqual(['utterance', 'translation', 'words']);
  });

  it('leaves state and history alone when a command fails', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = loadedStore();
    const before = currentDoc(store);
    const history = store.temporal.getState().pastStates.length;

    const err = thrown(() => store.getState().shift(-100));
    expect(isEafError(err, 'ValueTooSmall')).toBe(true);
    expect(store.getState().doc).toBe(before);
    expect(store.temporal.getState().pastStates).toHaveLength(history);
    expect(warn).toHaveBeenCalledWith('[eafkit]', 'shift rejected:', 'Shifting by -100 ms gives negative time value -100');
  });

  it('merges other documents into the current one', () => {
    const store = loadedStore();
    store.getState().mergeWith([spanDoc('extra', [['later', 3000, 3500]], 'm')]);
    const doc = currentDoc(store);
    expect(tierIds(doc)).toContain('extra');
    expect(annotations(doc, 'extra').map((a) => [a.value, a.start, a.end])).toEqual([['later', 3000, 3500]]);
  });

  it('extracts without changing the current document', () => {
    const store = loadedStore();
    const before = currentDoc(store);
    const history = store.temporal.getState().pastStates.length;
    const window = store.getState().extract(0, 600);
    expect(annotations(window, 'utterance').map((a) => a.value)).toEqual(['hello']);
    expect(store.getState().doc).toBe(before);
    expect(store.temporal.getState().pastStates).toHaveLength(history);
  });

  it('writes the current document as XML', () => {
    const store = loadedStore();
    store.getState().affixTierIds({ prefix: 's1-', tierId: 'words' });
    const xml = store.getState().toXml();
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(xml).toContain('TIER_ID="s1-words"');
  });
});
