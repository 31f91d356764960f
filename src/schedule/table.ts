import * as cheerio from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';
import type { ColumnMapping, ExtractedTable, RawRow, RowDates } from '../types.js';
import { normalizeWhitespace } from '../utils/text.js';
import { looksLikeDate } from './dates.js';
import { LABEL_SEPARATOR } from './labels.js';

const LINE_BREAK_TAGS = new Set(['p', 'div', 'li', 'ul', 'ol', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6']);

export function buildColumnMapping(headers: string[], rowHeaderColumns = 0): ColumnMapping {
  const mapping: ColumnMapping = {};

  headers.forEach((header, headerIndex) => {
    const index = headerIndex - rowHeaderColumns;
    if (index < 0) {
      return;
    }
    if (header.includes('Next collection')) {
      mapping.nextIndex = index;
    } else if (header.includes('Last collection')) {
      mapping.lastIndex = index;
    } else if (header.includes('Collection')) {
      mapping.typeIndex = index;
    }
  });

  return mapping;
}

function collectSegments(node: AnyNode, segments: string[]): void {
  if (isText(node)) {
    segments[segments.length - 1] += node.data;
    return;
  }
  if (!isTag(node)) {
    return;
  }
  if (node.name === 'br') {
    segments.push('');
    return;
  }

  const breaks = LINE_BREAK_TAGS.has(node.name);
  if (breaks) {
    segments.push('');
  }
  for (const child of node.children) {
    collectSegments(child, segments);
  }
  if (breaks) {
    segments.push('');
  }
}

/** Text of a row header with each line break rendered as the label separator. */
export function renderRowHeaderText(nodes: AnyNode[]): string {
  const segments = [''];
  for (const node of nodes) {
    collectSegments(node, segments);
  }
  return segments
    .map((segment) => normalizeWhitespace(segment))
    .filter((segment) => segment.length > 0)
    .join(LABEL_SEPARATOR);
}

export function extractCollectionTable(html: string): ExtractedTable {
  // htmlparser2 keeps the markup as written; parse5 would wrap bare rows in a tbody.
  const $ = cheerio.load(html, { xml: { xmlMode: false } });
  const table = $('table').first();
  if (table.length === 0) {
    return { mapping: {}, rows: [] };
  }

  const headers = table
    .find('thead th')
    .toArray()
    .map((cell) => normalizeWhitespace($(cell).text()));

  const tbody = table.find('tbody').first();
  const bodyRows = tbody.find('tr').toArray();

  // Header columns sitting above the row-header <th> have no data cell.
  const firstDataRow = bodyRows.find((row) => $(row).children('td').length > 0);
  const rowHeaderColumns = firstDataRow
    ? Math.max(0, $(firstDataRow).children('th, td').toArray().findIndex((cell) => cell.name === 'td'))
    : 0;
  const mapping = buildColumnMapping(headers, rowHeaderColumns);

  const rows: RawRow[] = bodyRows.map((row) => {
    const rowHeader = $(row).find('th').first();
    const cellValues = $(row)
      .find('td')
      .toArray()
      .map((cell) => normalizeWhitespace($(cell).text()));

    if (rowHeader.length === 0) {
      return { cellValues };
    }
    return {
      rowHeaderText: renderRowHeaderText(rowHeader.contents().toArray()),
      cellValues,
    };
  });

  return { mapping, rows };
}

function labelCandidate(value: string | undefined): string | undefined {
  if (!value || looksLikeDate(value)) {
    return undefined;
  }
  return value;
}

/**
 * Row header first, then the mapped type column, then the first data cell.
 * Date-looking cells never count as a label.
 */
export function resolveRowLabel(row: RawRow, mapping: ColumnMapping): string | undefined {
  if (row.rowHeaderText && row.rowHeaderText.trim().length > 0) {
    return row.rowHeaderText;
  }

  if (mapping.typeIndex !== undefined) {
    const mapped = labelCandidate(row.cellValues[mapping.typeIndex]);
    if (mapped) {
      return mapped;
    }
  }

  return labelCandidate(row.cellValues[0]);
}

function mappedDate(row: RawRow, index: number | undefined): string | undefined {
  if (index === undefined) {
    return undefined;
  }
  const value = row.cellValues[index];
  return value && looksLikeDate(value) ? value : undefined;
}

export function resolveRowDates(row: RawRow, mapping: ColumnMapping): RowDates {
  const dateValues = row.cellValues.filter((value) => looksLikeDate(value));

  const nextCollection = mappedDate(row, mapping.nextIndex) ?? dateValues[0];
  const lastCollection = mappedDate(row, mapping.lastIndex) ?? (dateValues.length >= 2 ? dateValues[1] : undefined);

  const dates: RowDates = {};
  if (nextCollection) {
    dates.next_collection = nextCollection;
  }
  if (lastCollection) {
    dates.last_collection = lastCollection;
  }
  return dates;
}
