/**
 * Drawable primitives handed from probes to the render pass.
 *
 * Everything here is plain immutable data: probes describe what to draw and the
 * terminal toolkit decides how.
 */

export const COLORS = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'] as const;
export type Color = typeof COLORS[number];

export interface Style {
  color?: Color;
  bold?: boolean;
}

export interface Span extends Style {
  text: string;
}

export type Line = ReadonlyArray<Span>;

export type Align = 'left' | 'center' | 'right';

interface DrawableBase {
  /** Rows the drawable occupies, borders included */
  height: number;
  title?: Line;
  border: boolean;
  borderColor?: Style;
}

export interface TextBlock extends DrawableBase {
  kind: 'text';
  lines: ReadonlyArray<Line>;
  wrap?: number;
}

export interface Gauge extends DrawableBase {
  kind: 'gauge';
  percent: number;
  label: string;
  labelAlign: Align;
  labelStyle: Style;
  barStyle: Style;
}

export interface ListBlock extends DrawableBase {
  kind: 'list';
  items: ReadonlyArray<Line>;
  paddingLeft: number;
}

export interface LineChart extends DrawableBase {
  kind: 'chart';
  values: ReadonlyArray<number>;
  labels: ReadonlyArray<string>;
  lineStyle: Style;
  axesStyle: Style;
}

export interface Table extends DrawableBase {
  kind: 'table';
  rows: ReadonlyArray<ReadonlyArray<Line>>;
}

export interface Stack extends DrawableBase {
  kind: 'stack';
  children: ReadonlyArray<Drawable>;
}

export type Drawable = TextBlock | Gauge | ListBlock | LineChart | Table | Stack;

export function lineText(value: Line) {
  return value.map(part => part.text).join('');
}
