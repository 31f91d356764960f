export type StorageColumnKey =
  | 'black_rubbish_140l'
  | 'blue_cardboard_bag'
  | 'black_food_waste'
  | 'green_garden_bin'
  | 'green_recycling_box';

export const STORAGE_COLUMN_KEYS: readonly StorageColumnKey[] = [
  'black_rubbish_140l',
  'blue_cardboard_bag',
  'black_food_waste',
  'green_garden_bin',
  'green_recycling_box',
];

export type WasteGroup = string | string[];

export interface WasteClassification {
  wasteGroup?: WasteGroup;
  storageKey?: StorageColumnKey;
}

export interface ColumnMapping {
  nextIndex?: number;
  lastIndex?: number;
  typeIndex?: number;
}

export interface RawRow {
  rowHeaderText?: string;
  cellValues: string[];
}

export interface ExtractedTable {
  mapping: ColumnMapping;
  rows: RawRow[];
}

export interface RowDates {
  next_collection?: string;
  last_collection?: string;
}

export interface TimeDeltas {
  days_until_next?: number;
  minutes_until_next?: number;
  time_until_next_text?: string;
  days_since_last?: number;
  minutes_since_last?: number;
}

export interface CollectionRecord extends RowDates, TimeDeltas {
  collection_type: string;
  waste_group?: WasteGroup;
  storage_key?: StorageColumnKey;
}

export interface CollectionsOutput {
  address: string;
  postcode: string;
  timezone: string;
  checked_at: string;
  count: number;
  collections: CollectionRecord[];
}
