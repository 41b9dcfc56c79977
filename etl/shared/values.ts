import { Option } from 'effect'

export type CanonicalValue = number | string | boolean

/** A cell of an output frame. `none` is the sentinel: the value is unknown. */
export type CellValue = Option.Option<CanonicalValue>

/** Numeric reading of a cell. Booleans count as 0/1; text and sentinels have none. */
export const toNumeric = (cell: CellValue): Option.Option<number> =>
  Option.flatMap(cell, (value) => {
    if (typeof value === 'number') return Option.some(value)
    if (typeof value === 'boolean') return Option.some(value ? 1 : 0)
    return Option.none()
  })

export const renderValue = (value: CanonicalValue): string => {
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  return String(value)
}

export const renderCell = (cell: CellValue, sentinel: string): string =>
  Option.match(cell, { onNone: () => sentinel, onSome: renderValue })

export const renderOptionalNumber = (value: Option.Option<number>): string =>
  Option.match(value, { onNone: () => '', onSome: (n) => String(n) })
