import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  BROKEN_FILE,
  JsonCodec,
  bibJson,
  cleanupWorkspace,
  createTempWorkspace,
  createTestFile,
  cslEntry,
} from '../../__tests__/helpers/index.js';
import type { BibRecord } from '../../records/bib_record.js';
import { createLocalSource, expandPattern } from '../local_source.js';

async function collect(stream: AsyncIterable<BibRecord>): Promise<BibRecord[]> {
  const records: BibRecord[] = [];
  for await (const record of stream) records.push(record);
  return records;
}

describe('createLocalSource', () => {
  let workspace: string;
  let codec: JsonCodec;

  beforeEach(async () => {
    workspace = await createTempWorkspace('bibsearch-local-');
    codec = new JsonCodec();
  });

  afterEach(async () => {
    await cleanupWorkspace(workspace);
  });

  it('loads every matched file and searches the parsed records', async () => {
    await createTestFile(workspace, 'b/second.bib', bibJson([cslEntry('lee2021', 'Sparse Graph Coloring', 'Lee')]));
    await createTestFile(workspace, 'a/first.bib', bibJson([
      cslEntry('smith2020', 'Graph Search Methods'),
      cslEntry('smith2019', 'Streaming Joins'),
    ]));
    const source = createLocalSource({ pattern: path.join(workspace, '**/*.bib'), codec });

    await expect(source.load()).resolves.toBe('ready');
    expect(source.files).toEqual([path.join(workspace, 'a/first.bib'), path.join(workspace, 'b/second.bib')]);
    expect(source.records().map((record) => record.key)).toEqual(['smith2020', 'smith2019', 'lee2021']);

    const hits = await collect(source.search('graph', 1));
    expect(hits.map((record) => record.key)).toEqual(['smith2020', 'lee2021']);
    expect(hits[0]?.location).toBe(path.join(workspace, 'a/first.bib'));
    expect(hits[0]?.origin).toBe(path.join(workspace, '**/*.bib'));
  });

  it('matches on author names', async () => {
    await createTestFile(workspace, 'refs.bib', bibJson([cslEntry('lee2021', 'Sparse Graph Coloring', 'Lee')]));
    const source = createLocalSource({ pattern: path.join(workspace, '*.bib'), codec });
    await source.load();

    const hits = await collect(source.search('LEE', 1));
    expect(hits.map((record) => record.key)).toEqual(['lee2021']);
  });

  it('yields nothing for a trivial query', async () => {
    await createTestFile(workspace, 'refs.bib', bibJson([cslEntry('smith2020', 'Graph Search Methods')]));
    const source = createLocalSource({ pattern: path.join(workspace, '*.bib'), codec });
    await source.load();

    await expect(collect(source.search('gr', 1))).resolves.toEqual([]);
    await expect(collect(source.search('   ', 2))).resolves.toEqual([]);
  });

  it('reports no_file when the glob matches nothing', async () => {
    const source = createLocalSource({ pattern: path.join(workspace, 'missing/*.bib'), codec });

    await expect(source.load()).resolves.toBe('no_file');
    expect(source.files).toEqual([]);
    expect(source.records()).toEqual([]);
  });

  it('skips a file that fails to parse and stays ready', async () => {
    await createTestFile(workspace, 'bad.bib', BROKEN_FILE);
    await createTestFile(workspace, 'good.bib', bibJson([cslEntry('smith2020', 'Graph Search Methods')]));
    const source = createLocalSource({ pattern: path.join(workspace, '*.bib'), codec });

    await expect(source.load()).resolves.toBe('ready');
    expect(source.files).toHaveLength(2);
    expect(source.records().map((record) => record.key)).toEqual(['smith2020']);
  });

  it('is ready with zero records when every matched file is broken', async () => {
    await createTestFile(workspace, 'bad.bib', BROKEN_FILE);
    const source = createLocalSource({ pattern: path.join(workspace, '*.bib'), codec });

    await expect(source.load()).resolves.toBe('ready');
    expect(source.records()).toEqual([]);
  });

  it('loads only once', async () => {
    await createTestFile(workspace, 'refs.bib', bibJson([cslEntry('smith2020', 'Graph Search Methods')]));
    const parseFile = vi.spyOn(codec, 'parseFile');
    const source = createLocalSource({ pattern: path.join(workspace, '*.bib'), codec });

    await Promise.all([source.load(), source.load()]);
    await source.load();

    expect(parseFile).toHaveBeenCalledTimes(1);
    expect(source.records()).toHaveLength(1);
  });

  it('returns every match when yielding after each record', async () => {
    await createTestFile(workspace, 'refs.bib', bibJson([
      cslEntry('a1', 'Graph One'),
      cslEntry('a2', 'Graph Two'),
      cslEntry('a3', 'Graph Three'),
    ]));
    const source = createLocalSource({ pattern: path.join(workspace, '*.bib'), codec, yieldEvery: 1 });
    await source.load();

    const hits = await collect(source.search('graph', 1));
    expect(hits.map((record) => record.key)).toEqual(['a1', 'a2', 'a3']);
  });
});

describe('expandPattern', () => {
  it('expands a leading tilde', () => {
    expect(expandPattern('~/refs/*.bib', {}, '/home/tester')).toBe('/home/tester/refs/*.bib');
  });

  it('expands bare and braced variables', () => {
    expect(expandPattern('$BIB/${SUB}/x.bib', { BIB: '/data', SUB: 'lib' }, '/home/tester')).toBe('/data/lib/x.bib');
  });

  it('leaves unknown variables as written', () => {
    expect(expandPattern('$NOPE/a.bib', {}, '/home/tester')).toBe('$NOPE/a.bib');
  });

  it('does not expand a tilde inside the pattern', () => {
    expect(expandPattern('refs/~draft.bib', {}, '/home/tester')).toBe('refs/~draft.bib');
  });
});
