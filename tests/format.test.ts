// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { formatTimestamp, renderGrid, truncateCell } from '../src/commands/output/format.js';

describe('truncateCell', () => {
  it('keeps text of 50 characters or fewer whole', () => {
    const exact = 'a'.repeat(50);
    expect(truncateCell(exact)).toBe(exact);
    expect(truncateCell('short')).toBe('short');
  });

  it('cuts longer text to 50 characters plus an ellipsis', () => {
    expect(truncateCell('b'.repeat(51))).toBe(`${'b'.repeat(50)}...`);
  });

  it('counts emoji as single characters', () => {
    const thirty = '😀'.repeat(30);
    expect(truncateCell(thirty)).toBe(thirty);
    expect(truncateCell('😀'.repeat(60))).toBe(`${'😀'.repeat(50)}...`);
    expect(truncateCell('𝒜'.repeat(51))).toBe(`${'𝒜'.repeat(50)}...`);
  });

  it('takes a custom limit', () => {
    expect(truncateCell('abcdef', 3)).toBe('abc...');
  });
});

describe('formatTimestamp', () => {
  it('renders a Z timestamp as date and time', () => {
    expect(formatTimestamp('2024-01-15T10:30:00Z')).toBe('2024-01-15 10:30:00');
  });

  it('drops fractional seconds', () => {
    expect(formatTimestamp('2024-01-15T10:30:05.123456')).toBe('2024-01-15 10:30:05');
  });

  it('keeps the wall-clock time of an offset timestamp', () => {
    expect(formatTimestamp('2024-01-15T10:30:00+02:00')).toBe('2024-01-15 10:30:00');
  });

  it('fills midnight for a date without time', () => {
    expect(formatTimestamp('2024-01-15')).toBe('2024-01-15 00:00:00');
  });

  it('returns unparseable strings unchanged', () => {
    expect(formatTimestamp('yesterday-ish')).toBe('yesterday-ish');
    expect(formatTimestamp('2024-13-01T00:00:00')).toBe('2024-13-01T00:00:00');
    expect(formatTimestamp('2023-02-29T08:00:00')).toBe('2023-02-29T08:00:00');
  });

  it('stringifies non-string values', () => {
    expect(formatTimestamp(1705314600)).toBe('1705314600');
    expect(formatTimestamp(undefined)).toBe('');
  });
});

describe('renderGrid', () => {
  it('draws a grid with a header separator', () => {
    expect(
      renderGrid(
        ['#', 'Name'],
        [
          ['1', 'Alice'],
          ['2', 'Bo'],
        ]
      )
    ).toEqual([
      '+---+-------+',
      '| # | Name  |',
      '+===+=======+',
      '| 1 | Alice |',
      '+---+-------+',
      '| 2 | Bo    |',
      '+---+-------+',
    ]);
  });
});
