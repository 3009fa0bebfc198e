import { Box, Text } from 'ink';
import type { ReactNode } from 'react';

import type {
  Drawable,
  Gauge,
  LineChart,
  Line,
  ListBlock,
  Stack,
  Table,
  TextBlock,
} from '../../lib/drawables';
import { lineText } from '../../lib/drawables';
import {
  axisLabels,
  chartColumns,
  gaugeCells,
  plotColumns,
  tableColumnWidths,
  topBorder,
  truncateLine,
} from './cells';

const TABLE_GAP = 2;

export function Spans({ line }: { line: Line }) {
  return (
    <Text>
      {line.map((part, index) => (
        <Text key={index} color={part.color} bold={part.bold}>{part.text}</Text>
      ))}
    </Text>
  );
}

interface PanelProps {
  drawable: Drawable;
  width: number;
  children: ReactNode;
}

/**
 * Box with an optional single-line border and a title set into the top edge
 */
export function Panel({ drawable, width, children }: PanelProps) {
  const height = Math.max(0, drawable.height);

  if (!drawable.border) {
    return (
      <Box flexDirection="column" width={width} height={height} overflow="hidden">
        {children}
      </Box>
    );
  }

  const borderColor = drawable.borderColor?.color;
  const title = truncateLine(drawable.title ?? [], width - 2);
  const top = topBorder(width, lineText(title));

  return (
    <Box flexDirection="column" width={width} height={height}>
      <Text>
        <Text color={borderColor}>{top.left}</Text>
        <Spans line={title} />
        <Text color={borderColor}>{`${top.fill}┐`}</Text>
      </Text>
      <Box
        flexDirection="column"
        borderStyle="single"
        borderTop={false}
        borderColor={borderColor}
        width={width}
        height={Math.max(0, height - 1)}
        overflow="hidden"
      >
        {children}
      </Box>
    </Box>
  );
}

function innerWidth(drawable: Drawable, width: number) {
  return Math.max(0, drawable.border ? width - 2 : width);
}

function innerHeight(drawable: Drawable) {
  return Math.max(0, drawable.border ? drawable.height - 2 : drawable.height);
}

function TextView({ block }: { block: TextBlock }) {
  return (
    <>
      {block.lines.map((value, index) => (
        <Text key={index} wrap={block.wrap !== undefined ? 'wrap' : 'truncate'}>
          {value.map((part, partIndex) => (
            <Text key={partIndex} color={part.color} bold={part.bold}>{part.text}</Text>
          ))}
        </Text>
      ))}
    </>
  );
}

function GaugeView({ gauge, width }: { gauge: Gauge; width: number }) {
  const cells = gaugeCells(width, gauge.percent, gauge.label, gauge.labelAlign);
  const barColor = gauge.barStyle.color ?? 'white';

  return (
    <Text>
      {cells.map((cell, index) => (
        <Text
          key={index}
          backgroundColor={cell.filled ? barColor : undefined}
          color={cell.label ? gauge.labelStyle.color : undefined}
          bold={cell.label ? gauge.labelStyle.bold : undefined}
        >
          {cell.text}
        </Text>
      ))}
    </Text>
  );
}

function ListView({ list }: { list: ListBlock }) {
  return (
    <Box flexDirection="column" paddingLeft={list.paddingLeft}>
      {list.items.map((item, index) => <Spans key={index} line={item} />)}
    </Box>
  );
}

function ChartView({ chart, width, height }: { chart: LineChart; width: number; height: number }) {
  // Bottom row carries the time labels
  const plotHeight = Math.max(0, height - 1);
  const rows = plotColumns(chartColumns(chart.values, width), plotHeight);

  return (
    <Box flexDirection="column">
      {rows.map((row, index) => (
        <Text key={index} color={chart.lineStyle.color} bold={chart.lineStyle.bold}>{row}</Text>
      ))}
      <Text color={chart.axesStyle.color} bold={chart.axesStyle.bold}>{axisLabels(chart.labels, width)}</Text>
    </Box>
  );
}

function TableView({ table }: { table: Table }) {
  const widths = tableColumnWidths(table.rows);

  return (
    <Box flexDirection="column">
      {table.rows.map((row, rowIndex) => (
        <Box key={rowIndex} flexDirection="row">
          {row.map((cell, cellIndex) => (
            <Box key={cellIndex} width={(widths[cellIndex] ?? 0) + TABLE_GAP} flexShrink={0}>
              <Spans line={cell} />
            </Box>
          ))}
        </Box>
      ))}
    </Box>
  );
}

function StackView({ stack, width }: { stack: Stack; width: number }) {
  return (
    <>
      {stack.children.map((child, index) => (
        <DrawableView key={index} drawable={child} width={width} />
      ))}
    </>
  );
}

export function DrawableView({ drawable, width }: { drawable: Drawable; width: number }) {
  const inner = innerWidth(drawable, width);

  let body: ReactNode;
  switch (drawable.kind) {
    case 'text':
      body = <TextView block={drawable} />;
      break;
    case 'gauge':
      body = <GaugeView gauge={drawable} width={inner} />;
      break;
    case 'list':
      body = <ListView list={drawable} />;
      break;
    case 'chart':
      body = <ChartView chart={drawable} width={inner} height={innerHeight(drawable)} />;
      break;
    case 'table':
      body = <TableView table={drawable} />;
      break;
    case 'stack':
      body = <StackView stack={drawable} width={inner} />;
      break;
  }

  return <Panel drawable={drawable} width={width}>{body}</Panel>;
}
