/**
 * Pure cell arithmetic for the terminal widgets: bars, charts, tables and
 * titled borders all reduce to strings of a known width.
 */
import type { Align, Line, Span } from '../../lib/drawables';
import { lineText } from '../../lib/drawables';

export const BLOCKS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'] as const;
const LEVELS_PER_CELL = BLOCKS.length;

function cellLength(text: string) {
  return [...text].length;
}

function truncate(text: string, width: number) {
  const chars = [...text];
  return chars.length > width ? chars.slice(0, Math.max(0, width)).join('') : text;
}

export interface GaugeCell {
  text: string;
  filled: boolean;
  label: boolean;
}

/**
 * One gauge row split into runs: filled bar, empty bar, and the label laid
 * over either.
 */
export function gaugeCells(width: number, percent: number, label: string, align: Align): Array<GaugeCell> {
  if (width <= 0) return [];

  const clamped = Math.min(100, Math.max(0, percent));
  const filledCount = Math.round((width * clamped) / 100);
  const shown = truncate(label, width);
  const labelLength = cellLength(shown);

  let labelStart = 0;
  if (align === 'right') labelStart = width - labelLength;
  if (align === 'center') labelStart = Math.floor((width - labelLength) / 2);
  const labelChars = [...shown];

  const cells: Array<GaugeCell> = [];
  for (let index = 0; index < width; index++) {
    const labelIndex = index - labelStart;
    const inLabel = labelIndex >= 0 && labelIndex < labelLength;
    const filled = index < filledCount;
    const char = inLabel ? labelChars[labelIndex] ?? ' ' : ' ';

    const previous = cells[cells.length - 1];
    if (previous !== undefined && previous.filled === filled && previous.label === inLabel) {
      previous.text += char;
    } else {
      cells.push({ text: char, filled, label: inLabel });
    }
  }
  return cells;
}

/**
 * Fit a series into `width` columns, each column the largest value of its bucket
 */
export function chartColumns(values: ReadonlyArray<number>, width: number): Array<number> {
  if (width <= 0 || values.length === 0) return [];
  const bucket = Math.max(1, Math.ceil(values.length / width));
  const columns: Array<number> = [];
  for (let start = 0; start < values.length; start += bucket) {
    columns.push(Math.max(...values.slice(start, start + bucket)));
  }
  return columns;
}

/**
 * Block-character plot, top row first. The tallest column reaches the top.
 */
export function plotColumns(columns: ReadonlyArray<number>, height: number): Array<string> {
  if (height <= 0) return [];
  const max = Math.max(0, ...columns);
  const levels = columns.map(value =>
    max > 0 ? Math.round((Math.max(0, value) / max) * height * LEVELS_PER_CELL) : 0
  );

  const rows: Array<string> = [];
  for (let row = 0; row < height; row++) {
    const floor = (height - 1 - row) * LEVELS_PER_CELL;
    rows.push(levels.map((level) => {
      const fill = Math.min(LEVELS_PER_CELL, level - floor);
      return fill > 0 ? BLOCKS[fill - 1] ?? ' ' : ' ';
    }).join(''));
  }
  return rows;
}

/**
 * First and last label at either end of a `width`-wide axis
 */
export function axisLabels(labels: ReadonlyArray<string>, width: number) {
  const first = labels[0];
  const last = labels[labels.length - 1];
  if (first === undefined || last === undefined || width <= 0) return '';
  if (labels.length === 1) return truncate(first, width);

  const gap = width - cellLength(first) - cellLength(last);
  if (gap < 1) return truncate(first, width);
  return `${first}${' '.repeat(gap)}${last}`;
}

export function tableColumnWidths(rows: ReadonlyArray<ReadonlyArray<Line>>): Array<number> {
  const widths: Array<number> = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cellLength(lineText(cell)));
    });
  }
  return widths;
}

export interface TopBorder {
  left: string;
  title: string;
  fill: string;
}

/**
 * "┌Title─────┐" for a box `width` cells wide; the caller draws the right corner
 */
export function topBorder(width: number, title: string): TopBorder {
  const inner = Math.max(0, width - 2);
  const shown = truncate(title, inner);
  return {
    left: '┌',
    title: shown,
    fill: '─'.repeat(inner - cellLength(shown)),
  };
}

/**
 * Keep the first `width` cells of a styled line
 */
export function truncateLine(value: Line, width: number): Line {
  const kept: Array<Span> = [];
  let remaining = Math.max(0, width);
  for (const part of value) {
    if (remaining === 0) break;
    const text = truncate(part.text, remaining);
    remaining -= cellLength(text);
    kept.push({ ...part, text });
  }
  return kept;
}
