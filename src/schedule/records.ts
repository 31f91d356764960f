import type { DateTime } from 'luxon';
import type { CollectionRecord, RowDates } from '../types.js';
import { splitCollectionLabels } from './labels.js';
import { extractCollectionTable, resolveRowDates, resolveRowLabel } from './table.js';
import { computeTimeDeltas } from './timeDelta.js';
import { classifyCollectionType } from './wasteGroups.js';

function buildRecord(label: string, dates: RowDates, now: DateTime, zoneName: string): CollectionRecord {
  const record: CollectionRecord = { collection_type: label };

  const { wasteGroup, storageKey } = classifyCollectionType(label);
  if (wasteGroup) {
    record.waste_group = wasteGroup;
  }
  if (storageKey) {
    record.storage_key = storageKey;
  }
  if (dates.next_collection) {
    record.next_collection = dates.next_collection;
  }
  if (dates.last_collection) {
    record.last_collection = dates.last_collection;
  }

  return {
    ...record,
    ...computeTimeDeltas(dates.next_collection, dates.last_collection, now, zoneName),
  };
}

/**
 * Turns the results table into one record per bin type, in table order.
 * Labels split from a composite row header share that row's dates.
 */
export function assembleCollectionRecords(html: string, now: DateTime, zoneName: string): CollectionRecord[] {
  const { mapping, rows } = extractCollectionTable(html);
  const records: CollectionRecord[] = [];

  for (const row of rows) {
    const labels = splitCollectionLabels(resolveRowLabel(row, mapping));
    if (labels.length === 0) {
      continue;
    }

    const dates = resolveRowDates(row, mapping);
    for (const label of labels) {
      records.push(buildRecord(label, dates, now, zoneName));
    }
  }

  return records;
}
