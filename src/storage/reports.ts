import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CollectionRecord, CollectionsOutput } from '../types.js';

export const COLLECTIONS_CSV_HEADER = [
  'collection_type',
  'waste_group',
  'storage_key',
  'next_collection',
  'last_collection',
  'days_until_next',
  'minutes_until_next',
  'time_until_next_text',
  'days_since_last',
  'minutes_since_last',
] as const;

function escapeCsvCell(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function asCell(value: string | number | string[] | undefined): string {
  if (value === undefined) {
    return '';
  }
  if (Array.isArray(value)) {
    return value.join('; ');
  }
  return String(value);
}

export function renderCollectionsCsv(records: CollectionRecord[]): string {
  const rows = records.map((record) => COLLECTIONS_CSV_HEADER.map((column) => asCell(record[column])));
  const lines = [[...COLLECTIONS_CSV_HEADER], ...rows].map((row) => row.map((cell) => escapeCsvCell(cell)).join(','));
  return `${lines.join('\n')}\n`;
}

export function renderCollectionsJson(output: CollectionsOutput): string {
  return `${JSON.stringify(output, null, 2)}\n`;
}

export async function writeCollectionsCsv(filePath: string, records: CollectionRecord[]): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, renderCollectionsCsv(records), 'utf8');
}

export async function writeCollectionsJson(filePath: string, output: CollectionsOutput): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, renderCollectionsJson(output), 'utf8');
}
