import { truncate } from "./Formatters.ts";
import { buildTable, type ColumnGroup } from "./TableReport.ts";

export type UnknownRecord = Record<string, unknown>;

/** A result record labelled for its report row */
export interface NamedResult<R> {
  name: string;
  result: R;
}

/** Maps a result record to table columns */
export interface ResultsMapper<R, T extends UnknownRecord = UnknownRecord> {
  extract(result: R): T;
  columns(): ColumnGroup<T>[];
}

/** @return table with one row per named result */
export function reportResults<R>(
  named: NamedResult<R>[],
  sections: readonly ResultsMapper<R>[],
): string {
  const rows = valuesForResults(named, sections);
  const nameColumn: ColumnGroup<UnknownRecord> = {
    columns: [{ key: "name", title: "name" }],
  };
  const groups = [nameColumn, ...sections.flatMap(s => s.columns())];
  return buildTable(groups, rows);
}

/** @return row values merged from every section */
export function valuesForResults<R>(
  named: NamedResult<R>[],
  sections: readonly ResultsMapper<R>[],
): UnknownRecord[] {
  return named.map(({ name, result }) => {
    const entries = sections.flatMap(s => Object.entries(s.extract(result)));
    return { name: truncate(name), ...Object.fromEntries(entries) };
  });
}
