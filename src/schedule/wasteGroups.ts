import type { StorageColumnKey, WasteClassification, WasteGroup } from '../types.js';

interface WasteRule {
  test: (value: string) => boolean;
  wasteGroup: WasteGroup;
  storageKey: StorageColumnKey;
}

// Evaluated top to bottom, first match wins.
const WASTE_RULES: WasteRule[] = [
  {
    test: (value) => value.includes('black') && value.includes('rubbish'),
    wasteGroup: 'General Rubbish (black bin)',
    storageKey: 'black_rubbish_140l',
  },
  {
    test: (value) => value.includes('blue') && (value.includes('cardboard') || value.includes('bag')),
    wasteGroup: 'Cardboard (blue bag/box)',
    storageKey: 'blue_cardboard_bag',
  },
  {
    test: (value) => value.includes('food') || value.includes('caddy'),
    wasteGroup: 'Food Waste (caddy)',
    storageKey: 'black_food_waste',
  },
  {
    test: (value) => value.includes('green') && value.includes('recycling'),
    wasteGroup: ['Plastics & Metals (green box)', 'Glass & Paper (green box)'],
    storageKey: 'green_recycling_box',
  },
  {
    test: (value) => value.includes('garden') && value.includes('waste'),
    wasteGroup: 'Garden Waste (garden bin subscription)',
    storageKey: 'green_garden_bin',
  },
];

export function classifyCollectionType(label: string | undefined): WasteClassification {
  if (!label) {
    return {};
  }

  const value = label.toLowerCase();
  const rule = WASTE_RULES.find((candidate) => candidate.test(value));
  if (!rule) {
    return {};
  }

  return {
    wasteGroup: Array.isArray(rule.wasteGroup) ? [...rule.wasteGroup] : rule.wasteGroup,
    storageKey: rule.storageKey,
  };
}

export function getWasteGroup(label: string | undefined): WasteGroup | undefined {
  return classifyCollectionType(label).wasteGroup;
}

export function getStorageColumnKey(label: string | undefined): StorageColumnKey | undefined {
  return classifyCollectionType(label).storageKey;
}
