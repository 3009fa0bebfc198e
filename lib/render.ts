import type { Drawable } from './drawables';
import type { Geometry, LayoutManager } from './layout';
import type { ProbeRegistry } from './registry';
import type { Frame, FrameRow, Terminal } from './terminal';

function placeholder(name: string): Drawable {
  return {
    kind: 'text',
    height: 3,
    border: true,
    title: [{ text: name }],
    lines: [[{ text: 'missing probe', color: 'magenta', bold: true }]],
  };
}

/**
 * Builds one frame from every probe's current drawable and hands it to the terminal.
 *
 * A frame identical to the last one drawn is skipped unless forced (after a resize).
 */
export class RenderPass {
  private lastFrameKey: string | null = null;
  private drawn = 0;

  constructor(
    private readonly registry: ProbeRegistry,
    private readonly layout: LayoutManager,
    private readonly terminal: Terminal
  ) {}

  get framesDrawn() {
    return this.drawn;
  }

  compose(geometry: Geometry): Frame {
    const drawableFor = (name: string) => this.registry.get(name)?.renderTarget() ?? placeholder(name);

    const rows = geometry.rows.map((row): FrameRow => {
      const columns = row.map(column => ({
        span: column.span,
        x: column.x,
        width: column.width,
        cells: column.probes.map(drawableFor),
      }));
      const height = Math.max(0, ...columns.map(column =>
        column.cells.reduce((sum, cell) => sum + cell.height, 0)
      ));
      return { columns, height };
    });

    return {
      size: { ...geometry.terminal },
      chrome: drawableFor(this.layout.spec.chrome),
      rows,
    };
  }

  render(geometry: Geometry, options: { force?: boolean } = {}) {
    const frame = this.compose(geometry);
    const key = JSON.stringify(frame);

    if (options.force !== true && key === this.lastFrameKey) {
      return false;
    }

    this.terminal.draw(frame);
    this.lastFrameKey = key;
    this.drawn++;
    return true;
  }
}
