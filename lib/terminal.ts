import type { Drawable } from './drawables';
import type { KeyPress } from './keys';
import type { Size } from './probe';

export interface FrameColumn {
  span: number;
  x: number;
  width: number;
  cells: ReadonlyArray<Drawable>;
}

export interface FrameRow {
  columns: ReadonlyArray<FrameColumn>;
  /** Tallest column in the row */
  height: number;
}

/**
 * One complete, consistent screen
 */
export interface Frame {
  size: Size;
  chrome: Drawable;
  rows: ReadonlyArray<FrameRow>;
}

/**
 * Boundary to the terminal toolkit. The dashboard core only composes frames
 * and asks for them to be drawn.
 */
export interface Terminal {
  /** Acquire the terminal. Throws when it cannot. */
  open(): void;
  size(): Size;
  draw(frame: Frame): void;
  onResize(listener: (size: Size) => void): void;
  onKey(listener: (key: KeyPress) => void): void;
  close(): void;
}
