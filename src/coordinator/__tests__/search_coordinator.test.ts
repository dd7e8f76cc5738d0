import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  JsonCodec,
  ScriptedSource,
  bibJson,
  cleanupWorkspace,
  createTempWorkspace,
  createTestFile,
  cslEntry,
  jsonResponse,
  textResponse,
} from '../../__tests__/helpers/index.js';
import { CitationJsCodec } from '../../bibtex/codec.js';
import { createLocalSource } from '../../sources/local_source.js';
import { createRemoteSource, type FetchLike } from '../../sources/remote_source.js';
import { SearchCoordinator } from '../search_coordinator.js';

const REMOTE_HITS = {
  result: {
    hits: {
      hit: [{ info: { key: 'journals/jalg/SmithL20', title: 'Graph Search Methods.', authors: { author: 'Ada Smith' } } }],
    },
  },
};

describe('SearchCoordinator', () => {
  let workspace: string;
  let coordinator: SearchCoordinator | undefined;

  beforeEach(async () => {
    workspace = await createTempWorkspace('bibsearch-coordinator-');
  });

  afterEach(async () => {
    await coordinator?.stop();
    coordinator = undefined;
    await cleanupWorkspace(workspace);
  });

  function start(next: SearchCoordinator): SearchCoordinator {
    coordinator = next;
    next.start();
    return next;
  }

  it('settles a source whose glob matches nothing at no_file and never searches it', async () => {
    const codec = new JsonCodec();
    const source = createLocalSource({ pattern: path.join(workspace, 'missing/*.bib'), codec });
    const running = start(new SearchCoordinator({ sources: [{ source }], codec }));

    await running.whenLoaded();
    running.search('graph');
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(running.statusOf(0)).toBe('no_file');
    expect(running.sources[0]?.status.transitions()).toEqual(['initialized', 'loading', 'no_file']);
    expect(running.visibleResults()).toEqual([]);
  });

  it('shows no record from a superseded search', async () => {
    const titles = ['food science', 'foobar theory'];
    const first = new ScriptedSource('a', titles);
    const second = new ScriptedSource('b', titles);
    first.hold('foo');
    second.hold('foo');
    const running = start(new SearchCoordinator({ sources: [{ source: first }, { source: second }], codec: new JsonCodec() }));
    await running.whenLoaded();

    expect(running.search('foo')).toBe(1);
    await vi.waitFor(() => {
      expect(first.searches).toHaveLength(1);
      expect(second.searches).toHaveLength(1);
    });
    expect(running.search('foobar')).toBe(2);
    first.release('foo');
    second.release('foo');

    await vi.waitFor(() => {
      expect(first.searches.map((search) => search.generation)).toEqual([1, 2]);
      expect(second.searches.map((search) => search.generation)).toEqual([1, 2]);
      expect(running.statusOf(0)).toBe('ready');
      expect(running.statusOf(1)).toBe('ready');
      expect(running.visibleResults()).toHaveLength(2);
    });
    expect(running.visibleResults().map((record) => record.key).sort()).toEqual(['a-1-g2', 'b-1-g2']);
    expect(running.sink.generation).toBe(2);
  });

  it('marks a toggled record and clears the mark on the second toggle', async () => {
    const source = new ScriptedSource('a', ['Graph Search Methods']);
    const running = start(new SearchCoordinator({ sources: [{ source }], codec: new JsonCodec() }));
    running.search('graph');
    await vi.waitFor(() => expect(running.visibleResults()).toHaveLength(1));
    const [record] = running.visibleResults();
    if (!record) throw new Error('expected a result');

    expect(running.toggle(record)).toBe(true);
    expect(record.mark).toBe('selected');
    expect(running.selection.has(record)).toBe(true);

    expect(running.toggle(record)).toBe(false);
    expect(record.mark).toBe('none');
    expect(running.selection.has(record)).toBe(false);
  });

  it('leaves a remote source ready after a malformed response', async () => {
    const fetch = vi.fn<FetchLike>(async () => jsonResponse({ unexpected: true }));
    const source = createRemoteSource({ endpoint: 'https://dblp.test', codec: new JsonCodec(), fetch });
    const running = start(new SearchCoordinator({ sources: [{ source }], codec: new JsonCodec() }));
    await running.whenLoaded();

    running.search('graph');

    await vi.waitFor(() => {
      expect(running.sources[0]?.status.transitions()).toEqual(['initialized', 'loading', 'ready', 'searching', 'ready']);
    });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(running.visibleResults()).toEqual([]);
  });

  it('pre-marks records that are already selected', async () => {
    const codec = new JsonCodec();
    const file = await createTestFile(workspace, 'refs.bib', bibJson([cslEntry('smith2020', 'Graph Search Methods')]));
    const source = createLocalSource({ pattern: file, codec });
    const running = start(new SearchCoordinator({ sources: [{ source }], codec }));
    running.search('graph');
    await vi.waitFor(() => expect(running.visibleResults()).toHaveLength(1));
    const [first] = running.visibleResults();
    if (!first) throw new Error('expected a result');
    running.toggle(first);
    first.mark = 'none';

    running.search('graph search');
    await vi.waitFor(() => {
      expect(running.sink.generation).toBe(2);
      expect(running.visibleResults()).toHaveLength(1);
    });
    expect(running.visibleResults()[0]?.mark).toBe('selected');
    expect(running.selection.size).toBe(1);
  });

  it('hides disabled sources without stopping their searches', async () => {
    const first = new ScriptedSource('a', ['Graph One']);
    const second = new ScriptedSource('b', ['Graph Two']);
    const running = start(new SearchCoordinator({
      sources: [{ source: first }, { source: second, enabled: false }],
      codec: new JsonCodec(),
    }));

    running.search('graph');
    await vi.waitFor(() => expect(running.sink.size).toBe(2));

    expect(running.visibleResults().map((record) => record.origin)).toEqual(['a']);
    expect(second.searches).toHaveLength(1);

    expect(running.toggleEnabled(1)).toBe(true);
    expect(running.visibleResults()).toHaveLength(2);
    running.setAllEnabled(false);
    expect(running.visibleResults()).toEqual([]);
    expect(running.setEnabled(5, true)).toBe(false);
  });

  it('treats a load failure as no_file', async () => {
    const source = new ScriptedSource('broken', [], new Error('disk gone'));
    const running = start(new SearchCoordinator({ sources: [{ source }], codec: new JsonCodec() }));

    await running.whenLoaded();

    expect(running.statusOf(0)).toBe('no_file');
  });

  it('labels sources in order and rejects a second read-write source', () => {
    const codec = new JsonCodec();
    const plain = new SearchCoordinator({
      sources: [{ source: new ScriptedSource('a', []) }, { source: new ScriptedSource('b', []), access: 'rw' }],
      codec,
    });
    expect(plain.sources.map((slot) => [slot.label, slot.access])).toEqual([['1', 'ro'], ['2', 'rw']]);

    expect(() => new SearchCoordinator({
      sources: [
        { source: new ScriptedSource('a', []), access: 'rw' },
        { source: new ScriptedSource('b', []), access: 'rw' },
      ],
      codec,
    })).toThrow('At most one read-write source is allowed, got 2');
  });

  describe('commit', () => {
    it('writes the read-write file merged with the selection and the selected keys', async () => {
      const codec = new JsonCodec();
      const target = await createTestFile(workspace, 'reference.bib', bibJson([cslEntry('keep2019', 'Kept Paper')]));
      const keysOutput = path.join(workspace, 'keys.txt');
      const readOnly = new ScriptedSource('a', ['Graph Search Methods']);
      const readWrite = createLocalSource({ pattern: target, codec });
      const running = start(new SearchCoordinator({
        sources: [{ source: readOnly }, { source: readWrite, access: 'rw' }],
        codec,
        keysOutput,
      }));
      running.search('graph');
      await vi.waitFor(() => expect(running.visibleResults().map((record) => record.key)).toEqual(['a-0-g1']));
      const [picked] = running.visibleResults();
      if (!picked) throw new Error('expected a result');
      running.toggle(picked);

      const report = await running.commit();

      expect(report).toEqual({ written: [target, keysOutput], failures: [] });
      const written = await codec.parseFile(target);
      expect([...written.keys()]).toEqual(['keep2019', 'a-0-g1']);
      await expect(readFile(keysOutput, 'utf8')).resolves.toBe('a-0-g1');
    });

    it('resolves remote selections before writing', async () => {
      const codec = new JsonCodec();
      const target = await createTestFile(workspace, 'reference.bib', bibJson([]));
      const remoteEntry = cslEntry('DBLP:journals/jalg/SmithL20', 'Graph Search Methods');
      const fetch = vi.fn<FetchLike>(async (url) => (url.includes('/rec/')
        ? textResponse(JSON.stringify({ 'DBLP:journals/jalg/SmithL20': remoteEntry }))
        : jsonResponse(REMOTE_HITS)));
      const remote = createRemoteSource({ endpoint: 'https://dblp.test', codec, fetch });
      const running = start(new SearchCoordinator({
        sources: [{ source: remote }, { source: createLocalSource({ pattern: target, codec }), access: 'rw' }],
        codec,
      }));
      running.search('graph');
      await vi.waitFor(() => expect(running.visibleResults()).toHaveLength(1));
      const [picked] = running.visibleResults();
      if (!picked) throw new Error('expected a result');
      running.toggle(picked);

      const report = await running.commit();

      expect(report.failures).toEqual([]);
      expect(picked.resolution).toBe('ready');
      const written = await codec.parseFile(target);
      expect(written.get('SmithL20:377A')?.title).toBe('Graph Search Methods');
    });

    it('writes BibTeX under the same keys it lists in the keys file', async () => {
      const codec = new CitationJsCodec();
      const target = await createTestFile(
        workspace,
        'reference.bib',
        '@article{knuth-1984, author = {Knuth, Donald}, title = {Literate Programming}, journal = {The Computer Journal}, year = {1984}}\n',
      );
      const keysOutput = path.join(workspace, 'keys.txt');
      const fetch = vi.fn<FetchLike>(async (url) => (url.includes('/rec/')
        ? textResponse('@article{DBLP:journals/jalg/SmithL20, author = {Smith, Ada}, title = {Graph Search Methods}, journal = {J. Algorithms}, year = {2020}}\n')
        : jsonResponse(REMOTE_HITS)));
      const remote = createRemoteSource({ endpoint: 'https://dblp.test', codec, fetch });
      const running = start(new SearchCoordinator({
        sources: [{ source: remote }, { source: createLocalSource({ pattern: target, codec }), access: 'rw' }],
        codec,
        keysOutput,
      }));
      running.search('graph');
      await vi.waitFor(() => expect(running.visibleResults()).toHaveLength(1));
      const [picked] = running.visibleResults();
      if (!picked) throw new Error('expected a result');
      running.toggle(picked);

      const report = await running.commit();

      expect(report).toEqual({ written: [target, keysOutput], failures: [] });
      const written = await codec.parseFile(target);
      expect([...written.keys()]).toEqual(['knuth-1984', 'SmithL20:377A']);
      expect(written.get('SmithL20:377A')?.title).toBe('Graph Search Methods');
      await expect(readFile(keysOutput, 'utf8')).resolves.toBe('SmithL20:377A');
    });

    it('reports a failed write-back and still writes the keys', async () => {
      const codec = new JsonCodec();
      const target = await createTestFile(workspace, 'reference.bib', bibJson([]));
      const keysOutput = path.join(workspace, 'keys.txt');
      const fetch = vi.fn<FetchLike>(async (url) => (url.includes('/rec/') ? textResponse('gone', 404) : jsonResponse(REMOTE_HITS)));
      const remote = createRemoteSource({ endpoint: 'https://dblp.test', codec, fetch });
      const readWrite = createLocalSource({ pattern: target, codec });
      const running = start(new SearchCoordinator({
        sources: [{ source: remote }, { source: readWrite, access: 'rw' }],
        codec,
        keysOutput,
      }));
      running.search('graph');
      await vi.waitFor(() => expect(running.visibleResults()).toHaveLength(1));
      const [picked] = running.visibleResults();
      if (!picked) throw new Error('expected a result');
      running.toggle(picked);

      const report = await running.commit();

      expect(report.written).toEqual([keysOutput]);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0]?.target).toBe(readWrite.origin);
      expect(picked.resolution).toBe('failed');
      await expect(readFile(target, 'utf8')).resolves.toBe('{}');
      await expect(readFile(keysOutput, 'utf8')).resolves.toBe('SmithL20:377A');
    });

    it('refuses to write a read-write glob that matches several files', async () => {
      const codec = new JsonCodec();
      await createTestFile(workspace, 'one.bib', bibJson([]));
      await createTestFile(workspace, 'two.bib', bibJson([]));
      const readWrite = createLocalSource({ pattern: path.join(workspace, '*.bib'), codec });
      const running = start(new SearchCoordinator({ sources: [{ source: readWrite, access: 'rw' }], codec }));

      const report = await running.commit();

      expect(report.written).toEqual([]);
      expect(report.failures).toEqual([
        { target: readWrite.origin, error: `Cannot write ${readWrite.origin}: glob matches 2 files` },
      ]);
      expect(codec.written).toEqual([]);
    });
  });
});
