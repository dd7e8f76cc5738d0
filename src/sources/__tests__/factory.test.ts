import { describe, expect, it } from 'vitest';
import { JsonCodec } from '../../__tests__/helpers/index.js';
import { parseConfig } from '../../config/loader.js';
import { createRegistrations, createSource } from '../factory.js';

describe('createSource', () => {
  it('builds a local source with its glob expanded', () => {
    const source = createSource({ glob: '$BIBSEARCH_UNSET_VAR/refs.bib', access: 'ro', enabled: true }, { codec: new JsonCodec() });

    expect(source.kind).toBe('local');
    expect(source.origin).toBe('$BIBSEARCH_UNSET_VAR/refs.bib');
  });

  it('builds a remote source for an endpoint', () => {
    const source = createSource({ remote: 'https://dblp.test/', enabled: true }, { codec: new JsonCodec() });

    expect(source.kind).toBe('remote');
    expect(source.origin).toBe('https://dblp.test');
  });
});

describe('createRegistrations', () => {
  it('puts the read-write source last and keeps the rest in config order', () => {
    const config = parseConfig(
      {
        sources: [
          { glob: 'reference.bib', access: 'rw' },
          { remote: 'dblp.test' },
          { glob: 'papers/*.bib', enabled: false },
        ],
      },
      'test.json',
    );

    const registrations = createRegistrations(config, { codec: new JsonCodec() });

    expect(registrations.map((registration) => [registration.source.origin, registration.access, registration.enabled])).toEqual([
      ['https://dblp.test', 'ro', true],
      ['papers/*.bib', 'ro', false],
      ['reference.bib', 'rw', true],
    ]);
  });
});
