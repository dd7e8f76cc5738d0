/**
 * @fileoverview Zod schema for `.bibsearch.json`
 *
 * The file lists the bibliography sources in display order. A source is
 * either a glob of local BibTeX files or the endpoint of a remote search API:
 *
 * ```json
 * {
 *   "sources": [
 *     { "glob": "~/papers/**\/*.bib" },
 *     { "remote": "dblp.org" },
 *     { "glob": "./refs.bib", "access": "rw" }
 *   ]
 * }
 * ```
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// SOURCE SCHEMAS
// ============================================================================

export const SourceAccessSchema = z.enum(['ro', 'rw']);

export const LocalSourceConfigSchema = z.object({
  glob: z.string().min(1).describe('Glob of BibTeX files; ~ and $VARS are expanded'),
  access: SourceAccessSchema.default('ro'),
  enabled: z.boolean().default(true),
}).strict();

/** A bare host such as `dblp.org` is taken to mean `https://dblp.org`. */
export const RemoteSourceConfigSchema = z.object({
  remote: z.string().min(1)
    .transform((value) => (/^[a-z][a-z0-9+.-]*:\/\//i.test(value) ? value : `https://${value}`))
    .pipe(z.string().url()),
  enabled: z.boolean().default(true),
  maxHits: z.number().int().positive().max(1000).optional(),
  timeoutMs: z.number().int().positive().optional(),
}).strict();

export const SourceConfigSchema = z.union([LocalSourceConfigSchema, RemoteSourceConfigSchema]);

// ============================================================================
// FILE SCHEMA
// ============================================================================

export const BibsearchConfigSchema = z.object({
  sources: z.array(SourceConfigSchema).min(1, 'at least one source is required'),
  keysOutput: z.string().min(1).optional(),
  search: z.object({
    yieldEvery: z.number().int().positive().optional(),
  }).strict().optional(),
}).strict().superRefine((config, ctx) => {
  const writable = config.sources.filter((source) => 'glob' in source && source.access === 'rw');
  if (writable.length > 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['sources'],
      message: `at most one source may be read-write, found ${writable.length}`,
    });
  }
});

export type LocalSourceConfig = z.infer<typeof LocalSourceConfigSchema>;
export type RemoteSourceConfig = z.infer<typeof RemoteSourceConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type BibsearchConfig = z.infer<typeof BibsearchConfigSchema>;

/** Input shape, before defaults are applied. */
export type BibsearchConfigInput = z.input<typeof BibsearchConfigSchema>;

export function isLocalSourceConfig(source: SourceConfig): source is LocalSourceConfig {
  return 'glob' in source;
}
