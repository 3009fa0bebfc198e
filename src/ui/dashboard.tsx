import { Box } from 'ink';

import type { Frame } from '../../lib/terminal';
import { DrawableView, Panel } from './widgets';

/**
 * The chrome probe's box drawn around every row of the grid
 */
export function DashboardView({ frame, height }: { frame: Frame; height: number }) {
  const chrome = { ...frame.chrome, height };

  return (
    <Panel drawable={chrome} width={frame.size.width}>
      {frame.rows.map((row, rowIndex) => (
        <Box key={rowIndex} flexDirection="row" height={row.height} flexShrink={0}>
          {row.columns.map((column, columnIndex) => (
            <Box key={columnIndex} flexDirection="column" width={column.width} flexShrink={0}>
              {column.cells.map((cell, cellIndex) => (
                <DrawableView key={cellIndex} drawable={cell} width={column.width} />
              ))}
            </Box>
          ))}
        </Box>
      ))}
    </Panel>
  );
}
