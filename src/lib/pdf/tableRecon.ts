import type {
  LayoutCell,
  PageTableRow,
  PositionedTextItem,
  RawCell,
  RawTable,
  ReconstructedTable,
} from '../../types/crimeReport';
import {
  assignCellsToColumns,
  clusterByY,
  computeXGapTolerance,
  computeYTolerance,
  linesToTableRows,
  medianOf,
  nearestColumn,
} from './layout';

const HEADER_TOKENS = [
  /^(mon|tue|wed|thu|fri|sat|sun)[a-z]*\b/i,
  /\b\d{1,2}\/\d{1,2}\b/,
  /\b7[-\s]?days?\b/i,
  /\bprev\.?\s*7\b/i,
  /\bytd\b/i,
  /^\+\/-$/,
  /%\s*change/i,
  /\boffen[cs]es?\b/i,
  /\btotal\b/i,
];

const MAX_HEADER_CONTINUATION = 2;

const NUMERIC_CELL = /^[-+]?[\d.,]+%?$|^-+$/;

function isHeaderCell(text: string): boolean {
  return HEADER_TOKENS.some((pat) => pat.test(text));
}

export function isHeaderRow(row: PageTableRow): boolean {
  return row.cells.filter((c) => isHeaderCell(c.text)).length >= 2;
}

function hasNumericCell(row: PageTableRow): boolean {
  return row.cells.some((c) => NUMERIC_CELL.test(c.text));
}

/** A wrapped header label: text only, and at least one piece under a non-first column. */
function isHeaderContinuation(columns: LayoutCell[], row: PageTableRow): boolean {
  if (hasNumericCell(row)) return false;
  return row.cells.some((c) => nearestColumn(c, columns) > 0);
}

function rowGap(upper: PageTableRow, lower: PageTableRow): number {
  return Math.abs(upper.y - lower.y);
}

function computeGapThreshold(rows: PageTableRow[], yTol: number): number {
  const gaps: number[] = [];
  for (let i = 1; i < rows.length; i++) {
    const gap = rowGap(rows[i - 1], rows[i]);
    if (gap > 0) gaps.push(gap);
  }
  const baseRowSpacing = gaps.length > 0 ? medianOf(gaps) : yTol * 2;
  return Math.max(baseRowSpacing * 2.5, yTol * 4);
}

function mergeHeaderContinuation(columns: LayoutCell[], row: PageTableRow): LayoutCell[] {
  const merged = columns.map((c) => ({ ...c }));
  for (const cell of row.cells) {
    const index = nearestColumn(cell, merged);
    if (index < 0) continue;
    const target = merged[index];
    merged[index] = {
      text: target.text ? `${target.text}\n${cell.text}` : cell.text,
      x0: Math.min(target.x0, cell.x0),
      x1: Math.max(target.x1, cell.x1),
    };
  }
  return merged;
}

function leadingColumn(columns: LayoutCell[], dataRows: PageTableRow[]): LayoutCell | null {
  const first = columns[0];
  if (!first) return null;
  const outliers = dataRows
    .map((r) => r.cells[0])
    .filter((c): c is LayoutCell => c !== undefined && c.x1 < first.x0);
  if (outliers.length === 0) return null;
  return {
    text: '',
    x0: Math.min(...outliers.map((c) => c.x0)),
    x1: Math.max(...outliers.map((c) => c.x1)),
  };
}

function toRawTable(
  title: PageTableRow | null,
  columns: LayoutCell[],
  dataRows: PageTableRow[]
): RawTable {
  const titleRow: RawCell[] = columns.map(() => null);
  if (title) titleRow[0] = title.rowText;
  const headerRow: RawCell[] = columns.map((c) => (c.text ? c.text : null));
  return [
    titleRow,
    headerRow,
    ...dataRows.map((r) => assignCellsToColumns(r.cells, columns)),
  ];
}

/**
 * Finds offense tables on a page. Each table comes out as rows of raw cells:
 * a title row, a header row (multi-line labels joined by "\n"), then data rows.
 */
export function reconstructTables(
  items: PositionedTextItem[],
  page: number
): ReconstructedTable[] {
  if (items.length === 0) return [];

  const yTol = computeYTolerance(items);
  const xGapTol = computeXGapTolerance(items);
  const rows = linesToTableRows(clusterByY(items, page, yTol), xGapTol);
  if (rows.length === 0) return [];

  const gapThreshold = computeGapThreshold(rows, yTol);
  const tables: ReconstructedTable[] = [];
  let consumedUntil = 0;
  let i = 0;

  while (i < rows.length) {
    const headerRow = rows[i];
    if (!isHeaderRow(headerRow)) {
      i++;
      continue;
    }

    const above = i > consumedUntil ? rows[i - 1] : undefined;
    const titleRow =
      above && above.cells.length === 1 && rowGap(above, headerRow) <= gapThreshold
        ? above
        : null;

    let columns = headerRow.cells;
    let j = i + 1;
    let continuation = 0;
    while (
      j < rows.length &&
      continuation < MAX_HEADER_CONTINUATION &&
      rowGap(rows[j - 1], rows[j]) <= gapThreshold &&
      isHeaderContinuation(columns, rows[j])
    ) {
      columns = mergeHeaderContinuation(columns, rows[j]);
      continuation++;
      j++;
    }

    const dataRows: PageTableRow[] = [];
    while (j < rows.length) {
      const row = rows[j];
      if (isHeaderRow(row)) break;
      if (rowGap(rows[j - 1], row) > gapThreshold) break;
      const next = rows[j + 1];
      if (row.cells.length === 1 && next && isHeaderRow(next)) break;
      dataRows.push(row);
      j++;
    }

    const lead = leadingColumn(columns, dataRows);
    if (lead) columns = [lead, ...columns];

    tables.push({
      page,
      titleRow,
      headerRow: { ...headerRow, cells: columns },
      dataRows,
      rows: toRawTable(titleRow, columns, dataRows),
    });

    consumedUntil = j;
    i = j;
  }

  return tables;
}
