// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Formatting helpers for tabular and timestamp display.
 */

import { COMMAND_DEFAULTS } from '../../constants.js';

/**
 * Cut text for a table cell. Text at or under the limit is returned whole.
 * Counts code points, so an emoji is one character.
 */
export function truncateCell(text: string, max: number = COMMAND_DEFAULTS.CELL_TRUNCATE_LENGTH): string {
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join('') + '...' : text;
}

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Render an ISO-8601 timestamp as `YYYY-MM-DD HH:MM:SS`, keeping the wall-clock
 * time written in the string (the offset is not applied).
 *
 * Strings that do not parse are returned unchanged; other values go through
 * String(), and absent values render empty.
 */
export function formatTimestamp(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') return String(value);

  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return value;

  const [, y, mo, d, h = '00', mi = '00', s = '00'] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return value;
  }
  // Reject days past the end of the month (2024-02-30 and friends)
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (day < 1 || probe.getUTCMonth() !== month - 1) {
    return value;
  }

  return `${y}-${mo}-${d} ${pad2(hour)}:${pad2(minute)}:${pad2(second)}`;
}

/**
 * Render rows as a grid table:
 *
 *   +----+-------+
 *   | #  | Name  |
 *   +====+=======+
 *   | 1  | Alice |
 *   +----+-------+
 */
export function renderGrid(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, col) =>
    Math.max(header.length, ...rows.map((row) => (row[col] ?? '').length))
  );

  const border = (fill: string): string => '+' + widths.map((w) => fill.repeat(w + 2)).join('+') + '+';
  const line = (cells: string[]): string =>
    '|' + widths.map((w, col) => ` ${(cells[col] ?? '').padEnd(w)} `).join('|') + '|';

  const out = [border('-'), line(headers), border('=')];
  for (const row of rows) {
    out.push(line(row), border('-'));
  }
  return out;
}
