/**
 * Grid layout: static probe placement plus geometry recomputed on resize
 */
import { StartupError } from './errors';
import type { Size } from './probe';
import type { ProbeRegistry } from './registry';

export const GRID_COLUMNS = 12;

export interface ColumnSpec {
  span: number;
  probes: Array<string>;
}

export interface RowSpec {
  columns: Array<ColumnSpec>;
}

export interface LayoutSpec {
  /** Probe drawn as the frame around the grid */
  chrome: string;
  rows: Array<RowSpec>;
}

export interface ColumnGeometry {
  row: number;
  column: number;
  span: number;
  x: number;
  width: number;
  probes: ReadonlyArray<string>;
}

export interface Geometry {
  terminal: Size;
  body: { x: number; y: number; width: number; height: number };
  rows: ReadonlyArray<ReadonlyArray<ColumnGeometry>>;
}

/**
 * Split the 12 grid units across `count` columns as evenly as possible,
 * remainder to the leftmost columns.
 */
export function evenSpans(count: number) {
  if (count <= 0) return [];
  const columns = Math.min(count, GRID_COLUMNS);
  const base = Math.floor(GRID_COLUMNS / columns);
  const remainder = GRID_COLUMNS % columns;
  return Array.from({ length: columns }, (_, index) => base + (index < remainder ? 1 : 0));
}

function validate(spec: LayoutSpec, registry: ProbeRegistry) {
  const placed = new Set<string>();

  const place = (name: string) => {
    if (!registry.has(name)) {
      throw new StartupError(`Layout places unknown probe '${name}'`);
    }
    if (placed.has(name)) {
      throw new StartupError(`Layout places probe '${name}' more than once`);
    }
    placed.add(name);
  };

  place(spec.chrome);

  spec.rows.forEach((row, rowIndex) => {
    const total = row.columns.reduce((sum, column) => sum + column.span, 0);
    if (total !== GRID_COLUMNS) {
      throw new StartupError(`Layout row ${String(rowIndex)} spans ${String(total)} columns, expected ${String(GRID_COLUMNS)}`);
    }
    for (const column of row.columns) {
      if (!Number.isInteger(column.span) || column.span <= 0) {
        throw new StartupError(`Layout row ${String(rowIndex)} has invalid span ${String(column.span)}`);
      }
      column.probes.forEach(place);
    }
  });

  const unplaced = registry.names().filter(name => !placed.has(name));
  if (unplaced.length > 0) {
    throw new StartupError(`Probes missing from layout: ${unplaced.join(', ')}`);
  }
}

export class LayoutManager {
  constructor(readonly spec: LayoutSpec, registry: ProbeRegistry) {
    validate(spec, registry);
  }

  /**
   * Geometry for the current terminal. The chrome border takes one cell on
   * every side; columns tile the body width exactly.
   */
  compute(terminal: Size): Geometry {
    const body = {
      x: 1,
      y: 1,
      width: Math.max(0, terminal.width - 2),
      height: Math.max(0, terminal.height - 2),
    };

    const rows = this.spec.rows.map((row, rowIndex) => {
      let unitsBefore = 0;
      return row.columns.map((column, columnIndex): ColumnGeometry => {
        const start = Math.floor((body.width * unitsBefore) / GRID_COLUMNS);
        unitsBefore += column.span;
        const end = Math.floor((body.width * unitsBefore) / GRID_COLUMNS);
        return {
          row: rowIndex,
          column: columnIndex,
          span: column.span,
          x: body.x + start,
          width: end - start,
          probes: [...column.probes],
        };
      });
    });

    return { terminal: { ...terminal }, body, rows };
  }

  /**
   * Size handed to a probe's resize step: its column width and the terminal
   * height. The chrome probe gets the whole terminal.
   */
  sizeFor(name: string, geometry: Geometry): Size {
    if (name === this.spec.chrome) {
      return { ...geometry.terminal };
    }
    const column = geometry.rows.flat().find(candidate => candidate.probes.includes(name));
    return {
      width: column?.width ?? geometry.body.width,
      height: geometry.terminal.height,
    };
  }
}
