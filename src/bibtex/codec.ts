/**
 * @fileoverview BibTeX codec backed by citation-js
 *
 * Parses `.bib` text into CSL-JSON entries keyed by citation key and formats
 * entries back to BibTeX. Entries that do not have the minimal CSL shape are
 * logged and dropped at parse time; a file that cannot be read or parsed as a
 * whole raises `BibtexParseError` so the caller can skip it.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { Cite, plugins } from '@citation-js/core';
import '@citation-js/plugin-bibtex';
import { z } from 'zod';
import { BibtexParseError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { BibliographyCodec, CslEntry, EntryMap } from './types.js';

// Keys such as `SmithL20:377A` or `knuth-1984` must be written as given, not
// replaced by a generated label.
plugins.config.get('@bibtex').format.checkLabel = false;

// ============================================================================
// SCHEMAS
// ============================================================================

const CslNameSchema = z
  .object({
    family: z.string().optional(),
    given: z.string().optional(),
    literal: z.string().optional(),
  })
  .passthrough();

const CslDateSchema = z
  .object({
    'date-parts': z.array(z.array(z.union([z.number(), z.string()]))).optional(),
    raw: z.string().optional(),
    literal: z.string().optional(),
  })
  .passthrough();

const CslEntrySchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    type: z.string().optional(),
    'citation-key': z.string().optional(),
    title: z.string().optional(),
    author: z.array(CslNameSchema).optional(),
    editor: z.array(CslNameSchema).optional(),
    issued: CslDateSchema.optional(),
    'container-title': z.string().optional(),
    publisher: z.string().optional(),
    URL: z.string().optional(),
    DOI: z.string().optional(),
  })
  .passthrough();

// ============================================================================
// CODEC
// ============================================================================

export function entryKey(entry: CslEntry): string {
  return entry['citation-key'] ?? entry.id;
}

export class CitationJsCodec implements BibliographyCodec {
  async parseFile(filePath: string): Promise<EntryMap> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (error: unknown) {
      throw new BibtexParseError(filePath, getErrorMessage(error));
    }
    return this.parseText(text, filePath);
  }

  parseText(text: string, origin = '<text>'): EntryMap {
    const entries: EntryMap = new Map();
    if (text.trim().length === 0) return entries;

    let items: unknown[];
    try {
      items = new Cite(text, { forceType: '@bibtex/text', generateGraph: false }).data;
    } catch (error: unknown) {
      throw new BibtexParseError(origin, getErrorMessage(error));
    }

    for (const item of items) {
      const parsed = CslEntrySchema.safeParse(item);
      if (!parsed.success) {
        logWarning('Dropping malformed bibliography entry', {
          origin,
          issues: parsed.error.issues.map((issue) => issue.path.join('.')),
        });
        continue;
      }
      entries.set(entryKey(parsed.data), parsed.data);
    }
    return entries;
  }

  format(entries: EntryMap): string {
    if (entries.size === 0) return '';
    const items = Array.from(entries, ([key, entry]) => ({ ...entry, id: key, 'citation-key': key }));
    return new Cite(items).format('bibtex');
  }

  async writeFile(filePath: string, entries: EntryMap): Promise<void> {
    await writeFile(filePath, this.format(entries), 'utf8');
  }
}
