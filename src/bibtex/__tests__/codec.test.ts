import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BibtexParseError } from '../../core/errors.js';
import { CitationJsCodec, entryKey } from '../codec.js';

const ARTICLE = `@article{smith2020,
  author = {Smith, John},
  title = {Graph Search Methods},
  journal = {J. Algorithms},
  year = {2020}
}
`;

describe('CitationJsCodec', () => {
  const codec = new CitationJsCodec();
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'bibsearch-codec-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses BibTeX text into CSL entries keyed by citation key', () => {
    const entries = codec.parseText(ARTICLE);
    const entry = entries.get('smith2020');

    expect([...entries.keys()]).toEqual(['smith2020']);
    expect(entry?.title).toBe('Graph Search Methods');
    expect(entry?.author?.[0]?.family).toBe('Smith');
    expect(entry?.issued?.['date-parts']?.[0]?.[0]).toBe(2020);
  });

  it('returns no entries for blank text', () => {
    expect(codec.parseText('  \n').size).toBe(0);
    expect(codec.format(new Map())).toBe('');
  });

  it('preserves key and title through write and reload', async () => {
    const target = path.join(dir, 'out.bib');
    await codec.writeFile(target, codec.parseText(ARTICLE));

    const reloaded = await codec.parseFile(target);
    expect([...reloaded.keys()]).toEqual(['smith2020']);
    expect(reloaded.get('smith2020')?.title).toBe('Graph Search Methods');
  });

  it.each(['SmithL20:377A', 'knuth-1984', 'DBLP:conf/x/Y21'])(
    'keeps the key %s through write and reload',
    async (key) => {
      const original = codec.parseText(ARTICLE).get('smith2020');
      if (!original) throw new Error('expected the fixture entry');
      const target = path.join(dir, 'keys.bib');

      await codec.writeFile(target, new Map([[key, original]]));

      const reloaded = await codec.parseFile(target);
      expect([...reloaded.keys()]).toEqual([key]);
      expect(reloaded.get(key)?.title).toBe('Graph Search Methods');
    },
  );

  it('keeps distinct keys apart when their entries look alike', async () => {
    const original = codec.parseText(ARTICLE).get('smith2020');
    if (!original) throw new Error('expected the fixture entry');
    const target = path.join(dir, 'twins.bib');

    await codec.writeFile(target, new Map([['smith-2020', original], ['SmithL20:AB12', original]]));

    expect([...(await codec.parseFile(target)).keys()]).toEqual(['smith-2020', 'SmithL20:AB12']);
  });

  it('writes entries under the map key', async () => {
    const source = codec.parseText(ARTICLE);
    const original = source.get('smith2020');
    expect(original).toBeDefined();
    if (!original) return;

    const target = path.join(dir, 'renamed.bib');
    await codec.writeFile(target, new Map([['renamed2020', original]]));

    const text = await readFile(target, 'utf8');
    expect(text).toContain('renamed2020');
    expect([...(await codec.parseFile(target)).keys()]).toEqual(['renamed2020']);
  });

  it('raises BibtexParseError for a file that cannot be read', async () => {
    await expect(codec.parseFile(path.join(dir, 'missing.bib'))).rejects.toBeInstanceOf(BibtexParseError);
  });

  it('reads files from disk', async () => {
    const file = path.join(dir, 'refs.bib');
    await writeFile(file, ARTICLE, 'utf8');
    const entries = await codec.parseFile(file);
    expect(entries.has('smith2020')).toBe(true);
  });
});

describe('entryKey', () => {
  it('prefers the citation key over the id', () => {
    expect(entryKey({ id: 'x1', 'citation-key': 'smith2020' })).toBe('smith2020');
    expect(entryKey({ id: 'x1' })).toBe('x1');
  });
});
