import { z } from 'zod'

/** A named table as the store hands it over: string cells keyed by column name. */
export interface Table {
  readonly columns: ReadonlyArray<string>
  readonly rows: ReadonlyArray<Readonly<Record<string, string>>>
}

/** Header row followed by data rows, the layout of a spreadsheet export. */
export const TableValuesSchema = z.array(z.array(z.string()))
export type TableValues = z.infer<typeof TableValuesSchema>

export const tableFromValues = (values: ReadonlyArray<ReadonlyArray<string>>): Table => {
  const [header = [], ...body] = values
  const columns = header.map((column) => column.trim())
  const rows = body.map((cells) => Object.fromEntries(columns.map((column, i) => [column, cells[i] ?? ''])))
  return { columns, rows }
}

export const tableToValues = (table: Table): TableValues => [
  [...table.columns],
  ...table.rows.map((row) => table.columns.map((column) => row[column] ?? '')),
]
