/**
 * CSL-JSON shapes the BibTeX codec produces and consumes. Only the fields the
 * record model reads are named; everything else passes through untouched.
 */

export interface CslName {
  family?: string;
  given?: string;
  literal?: string;
}

export interface CslDate {
  'date-parts'?: Array<Array<number | string>>;
  raw?: string;
  literal?: string;
}

export interface CslEntry {
  id: string;
  type?: string;
  'citation-key'?: string;
  title?: string;
  author?: CslName[];
  editor?: CslName[];
  issued?: CslDate;
  'container-title'?: string;
  publisher?: string;
  URL?: string;
  DOI?: string;
  [field: string]: unknown;
}

/** Entries keyed by citation key, in file order. */
export type EntryMap = Map<string, CslEntry>;

/**
 * Parse/format service for bibliography files. Parsing a whole file either
 * succeeds or throws `BibtexParseError`; formatting never drops an entry.
 */
export interface BibliographyCodec {
  parseFile(filePath: string): Promise<EntryMap>;
  parseText(text: string, origin?: string): EntryMap;
  format(entries: EntryMap): string;
  writeFile(filePath: string, entries: EntryMap): Promise<void>;
}
