/**
 * @fileoverview Full-screen text layout
 *
 * `renderScreen` turns a snapshot of the UI state into exactly `rows` lines,
 * each at most `columns` characters wide. It has no terminal dependency; the
 * terminal app writes the lines out.
 */

import type { SourceStatus } from '../coordinator/status_cell.js';
import { statusLabel } from '../coordinator/status_cell.js';
import { displayVenue, displayYear, type BibRecord, type EntryResolution } from '../records/bib_record.js';
import type { SourceAccess } from '../sources/types.js';
import type { Focus } from './keymap.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SourceView {
  label: string;
  origin: string;
  enabled: boolean;
  status: SourceStatus;
  access: SourceAccess;
}

export interface ScreenModel {
  query: string;
  focus: Focus;
  /** Index of the highlighted result */
  cursor: number;
  results: readonly BibRecord[];
  sources: readonly SourceView[];
  selection: readonly BibRecord[];
  message: string;
  /** Path of the config file in use */
  configSource?: string;
}

export interface ScreenSize {
  columns: number;
  rows: number;
}

export const LINES_PER_RESULT = 3;

const BANNER = [
  'bibsearch',
  'Federated bibliography search',
  'Type a word of three or more letters to search.',
];

const RESOLUTION_TAGS: Partial<Record<EntryResolution, string>> = {
  fetching: '(fetching bibtex)',
  ready: '(bibtex ready)',
  failed: '(bibtex failed)',
};

// ============================================================================
// SECTIONS
// ============================================================================

export function truncate(line: string, width: number): string {
  if (width <= 0) return '';
  if (line.length <= width) return line;
  if (width === 1) return line.slice(0, 1);
  return `${line.slice(0, width - 1)}~`;
}

function rule(width: number): string {
  return '-'.repeat(Math.max(0, width));
}

/** Three lines per record: mark and title, byline, location and key. */
export function formatResult(record: BibRecord, highlighted: boolean): string[] {
  const pointer = highlighted ? '>' : ' ';
  const mark = record.mark === 'selected' ? '[X]' : '[ ]';
  const tag = record.lazy ? RESOLUTION_TAGS[record.resolution] : undefined;
  return [
    `${pointer} ${mark} ${record.title}`,
    `      ${record.abbreviatedAuthors}. ${displayVenue(record)}, ${displayYear(record)}.`,
    `      ${record.location}::${record.key}${tag ? ` ${tag}` : ''}`,
  ];
}

export function formatSource(source: SourceView): string {
  const enabled = source.enabled ? '[X]' : '[ ]';
  return ` ${source.label} ${enabled} ${source.origin}  ${statusLabel(source.status)}  ${source.access}`;
}

export function formatSelection(selection: readonly BibRecord[]): string {
  if (selection.length === 0) return 'Selected: hit <SPACE> on a highlighted result to select it.';
  return `Selected: ${selection.map((record) => `${record.key}(${record.origin})`).join(', ')}`;
}

export function formatDetails(record: BibRecord | undefined): string[] {
  if (!record) {
    return ['Details: move into the results to see the highlighted entry.', '', '', ''];
  }
  return [
    `Details: ${record.key}  from ${record.location}`,
    `  Authors: ${record.authors.join(', ')}`,
    `  Title: ${record.title}  Venue: ${displayVenue(record)}  Year: ${displayYear(record)}`,
    `  URL: ${record.url ?? 'none'}`,
  ];
}

function resultWindow(model: ScreenModel, height: number): string[] {
  if (height <= 0) return [];
  if (model.results.length === 0) {
    const top = Math.max(0, Math.floor((height - BANNER.length) / 2));
    const lines = Array.from({ length: height }, () => '');
    BANNER.forEach((line, index) => {
      if (top + index < height) lines[top + index] = `    ${line}`;
    });
    return lines;
  }

  const fits = Math.max(1, Math.floor(height / LINES_PER_RESULT));
  const cursor = clampCursor(model.cursor, model.results.length);
  const first = Math.max(0, cursor - fits + 1);
  const lines: string[] = [];
  for (const [offset, record] of model.results.slice(first, first + fits).entries()) {
    const highlighted = model.focus === 'results' && first + offset === cursor;
    lines.push(...formatResult(record, highlighted));
  }
  while (lines.length < height) lines.push('');
  return lines.slice(0, height);
}

export function clampCursor(cursor: number, count: number): number {
  if (count === 0) return 0;
  return Math.min(Math.max(cursor, 0), count - 1);
}

// ============================================================================
// SCREEN
// ============================================================================

export function renderScreen(model: ScreenModel, size: ScreenSize): string[] {
  const { columns, rows } = size;
  const caret = model.focus === 'search' ? '_' : '';
  const header = [`Search: ${model.query}${caret}`, rule(columns)];

  const highlighted = model.focus === 'results'
    ? model.results[clampCursor(model.cursor, model.results.length)]
    : undefined;
  const footer = [
    rule(columns),
    'Sources',
    ...model.sources.map(formatSource),
    ...(model.configSource ? [`config: ${model.configSource}`] : []),
    formatSelection(model.selection),
    ...formatDetails(highlighted),
    rule(columns),
    model.message,
  ];

  const body = resultWindow(model, rows - header.length - footer.length);
  return [...header, ...body, ...footer].slice(0, Math.max(0, rows)).map((line) => truncate(line, columns));
}
