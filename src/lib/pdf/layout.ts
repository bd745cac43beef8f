import type {
  LayoutCell,
  PageLine,
  PageTableRow,
  PositionedTextItem,
  RawCell,
} from '../../types/crimeReport';

const WORD_GAP = 4;

export function medianOf(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

export function computeYTolerance(items: PositionedTextItem[]): number {
  const heights = items.map((i) => i.height).filter((h) => h > 0);
  return Math.max(2, medianOf(heights) * 0.6);
}

export function computeXGapTolerance(items: PositionedTextItem[]): number {
  const charWidths: number[] = [];
  for (const item of items) {
    if (item.str.length > 0 && item.width > 0) {
      charWidths.push(item.width / item.str.length);
    }
  }
  return Math.max(10, medianOf(charWidths) * 2.2);
}

function joinWithGaps(items: PositionedTextItem[]): string {
  let text = '';
  items.forEach((item, i) => {
    if (i > 0) {
      const prev = items[i - 1];
      if (item.x - (prev.x + prev.width) > WORD_GAP) text += ' ';
    }
    text += item.str;
  });
  return text.replace(/\s+/g, ' ').trim();
}

/** Groups items into visual lines, top of page first. */
export function clusterByY(
  items: PositionedTextItem[],
  page: number,
  yTol?: number
): PageLine[] {
  const visible = items.filter((i) => i.str.trim() !== '');
  if (visible.length === 0) return [];

  const tol = yTol ?? computeYTolerance(visible);
  const sorted = [...visible].sort((a, b) => b.y - a.y || a.x - b.x);

  const lines: PageLine[] = [];
  let current: PositionedTextItem[] = [];
  let currentY = sorted[0].y;

  const flush = () => {
    if (current.length === 0) return;
    const ordered = [...current].sort((a, b) => a.x - b.x);
    lines.push({ y: currentY, items: ordered, text: joinWithGaps(ordered), page });
  };

  for (const item of sorted) {
    if (current.length > 0 && Math.abs(item.y - currentY) > tol) {
      flush();
      current = [];
      currentY = item.y;
    }
    current.push(item);
  }
  flush();

  return lines;
}

export function clusterByX(
  lineItems: PositionedTextItem[],
  xGapTol?: number
): LayoutCell[] {
  if (lineItems.length === 0) return [];

  const tol = xGapTol ?? computeXGapTolerance(lineItems);
  const cells: LayoutCell[] = [];
  let current: PositionedTextItem[] = [lineItems[0]];

  const flush = () => {
    const last = current[current.length - 1];
    cells.push({
      text: current.map((i) => i.str).join(' ').replace(/\s+/g, ' ').trim(),
      x0: current[0].x,
      x1: last.x + last.width,
    });
  };

  for (let i = 1; i < lineItems.length; i++) {
    const item = lineItems[i];
    const prev = current[current.length - 1];
    if (item.x - (prev.x + prev.width) > tol) {
      flush();
      current = [item];
    } else {
      current.push(item);
    }
  }
  flush();

  return cells;
}

export function linesToTableRows(lines: PageLine[], xGapTol?: number): PageTableRow[] {
  return lines.map((line) => ({
    cells: clusterByX(line.items, xGapTol),
    rowText: line.text,
    y: line.y,
    page: line.page,
  }));
}

export function linesToPageText(lines: PageLine[]): string {
  return lines.map((l) => l.text).join('\n');
}

function overlap(a: LayoutCell, b: LayoutCell): number {
  return Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0);
}

function center(cell: LayoutCell): number {
  return (cell.x0 + cell.x1) / 2;
}

/** Index of the column a cell belongs to: widest overlap, else nearest center. */
export function nearestColumn(cell: LayoutCell, columns: LayoutCell[]): number {
  let best = -1;
  let bestOverlap = 0;
  columns.forEach((col, i) => {
    const o = overlap(cell, col);
    if (o > bestOverlap) {
      bestOverlap = o;
      best = i;
    }
  });
  if (best >= 0) return best;

  let bestDistance = Infinity;
  columns.forEach((col, i) => {
    const d = Math.abs(center(cell) - center(col));
    if (d < bestDistance) {
      bestDistance = d;
      best = i;
    }
  });
  return best;
}

export function assignCellsToColumns(cells: LayoutCell[], columns: LayoutCell[]): RawCell[] {
  const row: RawCell[] = columns.map(() => null);
  for (const cell of cells) {
    const index = nearestColumn(cell, columns);
    if (index < 0) continue;
    const existing = row[index];
    row[index] = existing === null ? cell.text : `${existing} ${cell.text}`;
  }
  return row;
}
