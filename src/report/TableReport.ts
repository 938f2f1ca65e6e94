import pico from "picocolors";
import type { Alignment, SpanningCellConfig, TableUserConfig } from "table";
import { table } from "table";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { bold } = isTest ? { bold: (str: string) => str } : pico;

/** Related table columns under an optional shared title */
export interface ColumnGroup<T> {
  groupTitle?: string;
  columns: Column<T>[];
}

/** Column with optional formatter */
export interface Column<T> {
  key: keyof T & string;
  title: string;
  formatter?: (value: unknown) => string | null;
  alignment?: Alignment;
}

/** Build formatted table with column groups */
export function buildTable<T extends Record<string, unknown>>(
  columnGroups: ColumnGroup<T>[],
  records: T[],
): string {
  const dataRows = toRows(records, columnGroups);
  const { headerRows, config } = setup(columnGroups, dataRows);
  return table([...headerRows, ...dataRows], config);
}

/** Convert records to string arrays for table */
export function toRows<T extends Record<string, unknown>>(
  records: T[],
  groups: ColumnGroup<T>[],
): string[][] {
  const allColumns = groups.flatMap(group => group.columns);
  return records.map(record =>
    allColumns.map(col => {
      const value = record[col.key];
      const cell = col.formatter ? col.formatter(value) : value;
      return cell == null ? " " : String(cell);
    }),
  );
}

/** Create headers and table configuration */
function setup<T>(
  groups: ColumnGroup<T>[],
  dataRows: string[][],
): { headerRows: string[][]; config: TableUserConfig } {
  const titles = groups.flatMap(g => g.columns.map(c => bold(c.title || " ")));
  const hasGroupTitles = groups.some(g => g.groupTitle);
  const headerRows = hasGroupTitles
    ? [groupTitleRow(groups), titles]
    : [titles];

  const config: TableUserConfig = {
    columns: columnConfigs(groups, titles, dataRows),
    spanningCells: hasGroupTitles ? createSectionSpans(groups) : undefined,
    ...createLines(groups, headerRows.length),
  };
  return { headerRows, config };
}

/** @return header row with each group title in its first column */
function groupTitleRow<T>(groups: ColumnGroup<T>[]): string[] {
  return groups.flatMap(g => {
    const blanks = Array<string>(g.columns.length - 1).fill(" ");
    return [g.groupTitle ? bold(g.groupTitle) : " ", ...blanks];
  });
}

/** @return spanning cell configs for group title headers */
function createSectionSpans<T>(groups: ColumnGroup<T>[]): SpanningCellConfig[] {
  let col = 0;
  const alignment: Alignment = "center";
  return groups.map(g => {
    const colSpan = g.columns.length;
    const span = { row: 0, col, colSpan, alignment };
    col += colSpan;
    return span;
  });
}

/** @return draw functions: outer frame, header rule, lines between groups */
function createLines<T>(groups: ColumnGroup<T>[], headerRows: number) {
  const sectionBorders: number[] = [];
  let border = 0;
  for (const g of groups) {
    border += g.columns.length;
    sectionBorders.push(border);
  }

  return {
    drawVerticalLine: (index: number, size: number) =>
      index === 0 || index === size || sectionBorders.includes(index),
    drawHorizontalLine: (index: number, size: number) =>
      index === 0 || index === size || index === headerRows,
  };
}

/** @return per-column widths fitting titles, data and group titles */
function columnConfigs<T>(
  groups: ColumnGroup<T>[],
  titles: string[],
  dataRows: string[][],
): TableUserConfig["columns"] {
  const widths = titles.map((title, i) =>
    dataRows.reduce(
      (max, row) => Math.max(max, cellWidth(row[i])),
      cellWidth(title),
    ),
  );

  // widen the last column of a group whose title is wider than its columns
  let colIndex = 0;
  for (const group of groups) {
    const numCols = group.columns.length;
    const separatorWidth = (numCols - 1) * 3; // " | " between columns
    const current = widths
      .slice(colIndex, colIndex + numCols)
      .reduce((a, b) => a + b, 0);
    const needed = cellWidth(group.groupTitle) - current - separatorWidth;
    if (needed > 0) widths[colIndex + numCols - 1] += needed;
    colIndex += numCols;
  }

  return widths.map((width, i) => {
    const alignment = groups.flatMap(g => g.columns)[i].alignment;
    return { width, wrapWord: false, ...(alignment && { alignment }) };
  });
}

// ESC [ ... m sequences
const ansiEscapeRegex = new RegExp(
  String.fromCharCode(27) + "\\[[0-9;]*m",
  "g",
);

/** Get visible length of a cell value (strips ANSI escape codes) */
function cellWidth(value: unknown): number {
  if (value == null) return 0;
  return String(value).replace(ansiEscapeRegex, "").length;
}
