import { Option } from 'effect'

import { compareDateTimes } from '@etl/shared/temporal.ts'
import { compareText } from '@etl/shared/text.ts'

import type { ImputedRecord } from '@etl/impute/impute-records.ts'

export type LongFrameRow = ImputedRecord

const compareSequence = (a: Option.Option<number>, b: Option.Option<number>) => {
  if (Option.isSome(a) && Option.isSome(b)) return a.value - b.value
  if (Option.isSome(a)) return -1
  if (Option.isSome(b)) return 1
  return 0
}

/** subject, date, question; duplicates keep raw export order. */
export const compareLongRows = (a: LongFrameRow, b: LongFrameRow): number =>
  compareText(a.subjectId, b.subjectId) ||
  compareDateTimes(a.assessmentDate, b.assessmentDate) ||
  compareText(a.questionId, b.questionId) ||
  compareSequence(a.sequence, b.sequence)

export const buildLongFrame = (imputed: ReadonlyArray<ImputedRecord>): Array<LongFrameRow> =>
  [...imputed].sort(compareLongRows)
