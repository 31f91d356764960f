import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { classifyCollectionType, getStorageColumnKey, getWasteGroup } from '../src/schedule/wasteGroups.js';

describe('classifyCollectionType', () => {
  it('classifies each known bin type', () => {
    assert.deepEqual(classifyCollectionType('Black Rubbish Bin'), {
      wasteGroup: 'General Rubbish (black bin)',
      storageKey: 'black_rubbish_140l',
    });
    assert.deepEqual(classifyCollectionType('Blue Cardboard Bag'), {
      wasteGroup: 'Cardboard (blue bag/box)',
      storageKey: 'blue_cardboard_bag',
    });
    assert.deepEqual(classifyCollectionType('Food Recycling Collection Bin'), {
      wasteGroup: 'Food Waste (caddy)',
      storageKey: 'black_food_waste',
    });
    assert.deepEqual(classifyCollectionType('Green Recycling Box'), {
      wasteGroup: ['Plastics & Metals (green box)', 'Glass & Paper (green box)'],
      storageKey: 'green_recycling_box',
    });
    assert.deepEqual(classifyCollectionType('Garden Waste Bin'), {
      wasteGroup: 'Garden Waste (garden bin subscription)',
      storageKey: 'green_garden_bin',
    });
  });

  it('matches case-insensitively', () => {
    assert.equal(getStorageColumnKey('BLACK RUBBISH'), 'black_rubbish_140l');
    assert.equal(getStorageColumnKey('kitchen caddy'), 'black_food_waste');
  });

  it('needs every word of a rule', () => {
    assert.deepEqual(classifyCollectionType('Black Bin'), {});
    assert.deepEqual(classifyCollectionType('Green Box'), {});
    assert.equal(getStorageColumnKey('Blue bag'), 'blue_cardboard_bag');
  });

  it('applies the first matching rule', () => {
    // Both the black rubbish and the food rules match.
    assert.equal(getStorageColumnKey('Black rubbish and food'), 'black_rubbish_140l');
    // Both the green recycling and the garden waste rules match.
    assert.equal(getStorageColumnKey('Green recycling for garden waste'), 'green_recycling_box');
  });

  it('leaves unknown and blank labels unclassified', () => {
    assert.deepEqual(classifyCollectionType('Special One-Off Collection'), {});
    assert.deepEqual(classifyCollectionType(''), {});
    assert.equal(getWasteGroup(undefined), undefined);
  });

  it('returns a fresh list for multi-group bins', () => {
    const first = getWasteGroup('Green Recycling Box');
    assert.ok(Array.isArray(first));
    first.push('mutated');
    assert.deepEqual(getWasteGroup('Green Recycling Box'), [
      'Plastics & Metals (green box)',
      'Glass & Paper (green box)',
    ]);
  });
});
