/**
 * Unit tests for the TLP redaction engine.
 *
 * Tests: isVisible across the full level cross-product, title selection,
 * metadata redaction, ceiling resolution
 */

import { describe, it, expect } from 'vitest';

import {
  highestTlpLevel,
  isTlpLevel,
  isVisible,
  redactMetadata,
  resolveCeiling,
  selectTitle,
  tlpLabel,
  tlpRank,
  visibleItems,
  visibleValue,
} from '@/tlp/redaction.js';
import { TLP_LEVELS, type TlpLevel } from '@/types/config.js';
import { emptyMetadata } from '../../helpers/fixtures.js';

// ---------------------------------------------------------------------------
// Expected visibility table: row = field level, column = ceiling
// ---------------------------------------------------------------------------

const EXPECTED: Record<TlpLevel, Record<TlpLevel, boolean>> = {
  clear: { clear: true, white: true, green: true, amber: true, red: true },
  white: { clear: true, white: true, green: true, amber: true, red: true },
  green: { clear: false, white: false, green: true, amber: true, red: true },
  amber: { clear: false, white: false, green: false, amber: true, red: true },
  red: { clear: false, white: false, green: false, amber: false, red: true },
};

describe('tlpRank', () => {
  it('orders clear = white < green < amber < red', () => {
    expect(TLP_LEVELS.map(tlpRank)).toEqual([0, 0, 1, 2, 3]);
  });
});

describe('isVisible', () => {
  for (const field of TLP_LEVELS) {
    for (const ceiling of TLP_LEVELS) {
      it(`${field} field at ${ceiling} ceiling is ${EXPECTED[field][ceiling] ? 'shown' : 'hidden'}`, () => {
        expect(isVisible(field, ceiling)).toBe(EXPECTED[field][ceiling]);
      });
    }
  }

  it('treats an absent level as clear', () => {
    for (const ceiling of TLP_LEVELS) {
      expect(isVisible(null, ceiling)).toBe(true);
      expect(isVisible(undefined, ceiling)).toBe(true);
    }
  });

  it('never hides at a higher ceiling what a lower ceiling shows', () => {
    for (const field of TLP_LEVELS) {
      for (const lower of TLP_LEVELS) {
        for (const higher of TLP_LEVELS) {
          if (tlpRank(higher) < tlpRank(lower)) continue;
          if (isVisible(field, lower)) {
            expect(isVisible(field, higher)).toBe(true);
          }
        }
      }
    }
  });
});

describe('visibleValue / visibleItems', () => {
  it('hides a red note at green and shows it at red', () => {
    const notes = [
      { value: 'public note', tlp: 'clear' as const },
      { value: 'case details', tlp: 'red' as const },
    ];
    expect(visibleItems(notes, 'green')).toEqual(['public note']);
    expect(visibleItems(notes, 'red')).toEqual(['public note', 'case details']);
  });

  it('returns null for a hidden or absent value', () => {
    expect(visibleValue({ value: 'x', tlp: 'amber' }, 'green')).toBeNull();
    expect(visibleValue(null, 'red')).toBeNull();
    expect(visibleValue({ value: 'x', tlp: 'amber' }, 'amber')).toBe('x');
  });
});

describe('selectTitle', () => {
  const titles = [
    { value: 'Generic', tlp: 'clear' as const },
    { value: 'Detailed', tlp: 'amber' as const },
    { value: 'Also amber', tlp: 'amber' as const },
    { value: 'Attributed', tlp: 'red' as const },
  ];

  it('picks the most detailed visible title', () => {
    expect(selectTitle(titles, 'clear')).toBe('Generic');
    expect(selectTitle(titles, 'green')).toBe('Generic');
    expect(selectTitle(titles, 'red')).toBe('Attributed');
  });

  it('takes the first declared title on ties', () => {
    expect(selectTitle(titles, 'amber')).toBe('Detailed');
  });

  it('returns null when nothing is visible', () => {
    expect(selectTitle([{ value: 'Secret', tlp: 'red' }], 'amber')).toBeNull();
    expect(selectTitle([], 'red')).toBeNull();
  });
});

describe('redactMetadata', () => {
  const metadata = emptyMetadata({
    description: { value: 'Lookalike hunt', tlp: 'clear' },
    priority: { value: 'high', tlp: 'amber' },
    frequency: { value: 'daily', tlp: 'green' },
    notes: [
      { value: 'n-clear', tlp: 'clear' },
      { value: 'n-red', tlp: 'red' },
    ],
    references: [{ value: 'https://intel.example.org/r', tlp: 'green' }],
    tags: [
      { value: 'brand', tlp: 'clear' },
      { value: 'kit-x', tlp: 'amber' },
    ],
  });

  it('filters every field independently at green', () => {
    expect(redactMetadata(metadata, 'green')).toEqual({
      title: null,
      description: 'Lookalike hunt',
      notes: ['n-clear'],
      references: ['https://intel.example.org/r'],
      frequency: 'daily',
      priority: null,
      tags: ['brand'],
    });
  });

  it('shows everything at red', () => {
    const visible = redactMetadata(metadata, 'red');
    expect(visible.notes).toEqual(['n-clear', 'n-red']);
    expect(visible.priority).toBe('high');
    expect(visible.tags).toEqual(['brand', 'kit-x']);
  });
});

describe('highestTlpLevel', () => {
  it('returns clear for empty metadata', () => {
    expect(highestTlpLevel(emptyMetadata())).toBe('clear');
  });

  it('finds the most sensitive level across fields and extras', () => {
    const metadata = emptyMetadata({ tags: [{ value: 't', tlp: 'green' }] });
    expect(highestTlpLevel(metadata)).toBe('green');
    expect(highestTlpLevel(metadata, ['amber'])).toBe('amber');
  });
});

describe('resolveCeiling', () => {
  it('prefers requested, then the entry default, then the global default', () => {
    expect(resolveCeiling('red', 'green', 'clear')).toBe('red');
    expect(resolveCeiling(null, 'green', 'clear')).toBe('green');
    expect(resolveCeiling(undefined, null, 'amber')).toBe('amber');
  });
});

describe('isTlpLevel / tlpLabel', () => {
  it('recognizes levels', () => {
    expect(isTlpLevel('amber')).toBe(true);
    expect(isTlpLevel('purple')).toBe(false);
  });

  it('formats labels', () => {
    expect(tlpLabel('amber')).toBe('TLP:AMBER');
  });
});
