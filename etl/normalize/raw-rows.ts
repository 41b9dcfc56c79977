import { Data, Effect } from 'effect'

import type { RawColumns } from '@etl/shared/config.ts'
import type { Table } from '@etl/shared/table.ts'

export class InputTableError extends Data.TaggedError('InputTableError')<{
  message: string
  table: string
  missingColumns: Array<string>
}> {}

/** One cell of a raw export, before any interpretation. */
export interface RawRow {
  readonly sourceTable: string
  /** Position across every raw table of the run; the insertion order for tie-breaks. */
  readonly sequence: number
  readonly subjectId: string
  readonly assessmentDate: string
  readonly assessmentTime: string
  readonly questionId: string
  readonly rawValue: string
}

export interface NamedTable {
  readonly name: string
  readonly table: Table
}

const requiredColumns = (columns: RawColumns): Array<string> => [
  columns.subjectId,
  columns.assessmentDate,
  ...(columns.assessmentTime === undefined ? [] : [columns.assessmentTime]),
  columns.questionId,
  columns.value,
]

export const extractRawRows = (tables: ReadonlyArray<NamedTable>, columns: RawColumns) =>
  Effect.gen(function* () {
    const rows: Array<RawRow> = []

    for (const { name, table } of tables) {
      const present = new Set(table.columns)
      const missingColumns = requiredColumns(columns).filter((column) => !present.has(column))
      if (missingColumns.length > 0) {
        return yield* Effect.fail(
          new InputTableError({
            message: `Table "${name}" is missing column(s): ${missingColumns.join(', ')}`,
            table: name,
            missingColumns,
          }),
        )
      }

      for (const row of table.rows) {
        rows.push({
          sourceTable: name,
          sequence: rows.length,
          subjectId: row[columns.subjectId] ?? '',
          assessmentDate: row[columns.assessmentDate] ?? '',
          assessmentTime: columns.assessmentTime === undefined ? '' : (row[columns.assessmentTime] ?? ''),
          questionId: row[columns.questionId] ?? '',
          rawValue: row[columns.value] ?? '',
        })
      }

      yield* Effect.log(`Read ${table.rows.length} rows from ${name}`)
    }

    return rows
  })
