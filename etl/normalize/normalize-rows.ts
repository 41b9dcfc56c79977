import { Either, Option } from 'effect'

import { lookupQuestion, type AssessmentDictionaryEntry, type Dictionary } from '@etl/dictionary/dictionary.types.ts'
import { parseAssessmentDate } from '@etl/shared/temporal.ts'
import { normalizeText } from '@etl/shared/text.ts'
import { coerceValue, type RejectionReason } from './coerce-value.ts'

import type { Temporal } from '@js-temporal/polyfill'
import type { CanonicalValue } from '@etl/shared/values.ts'
import type { RawRow } from './raw-rows.ts'

export interface NormalizedRecord {
  readonly sequence: number
  readonly subjectId: string
  readonly assessmentDate: Temporal.PlainDateTime
  readonly questionId: string
  readonly canonicalValue: CanonicalValue
  readonly category: string
  readonly programGrouping: string
}

export interface RejectedRow {
  readonly row: RawRow
  readonly reason: RejectionReason
  readonly detail: string
}

/** A (subject, category) pair assessed on a date. */
export interface AssessmentMark {
  readonly subjectId: string
  readonly assessmentDate: Temporal.PlainDateTime
  readonly category: string
  readonly programGrouping: string
}

interface LocatedRow extends AssessmentMark {
  readonly question: AssessmentDictionaryEntry
}

const reject = <A>(row: RawRow, reason: RejectionReason, detail: string): Either.Either<A, RejectedRow> =>
  Either.left({ row, reason, detail })

/** Subject, question, then date. The first failure wins. */
const locateRow = (row: RawRow, dictionary: Dictionary): Either.Either<LocatedRow, RejectedRow> => {
  const subjectId = normalizeText(row.subjectId)
  if (subjectId === '') return reject<LocatedRow>(row, 'MissingSubject', 'Blank subject id')

  const questionId = normalizeText(row.questionId)
  const entry = lookupQuestion(dictionary, questionId)
  if (Option.isNone(entry)) {
    return reject<LocatedRow>(row, 'UnknownQuestion', `Question "${questionId}" is not in the assessment dictionary`)
  }
  const question = entry.value

  const assessmentDate = parseAssessmentDate(row.assessmentDate, row.assessmentTime)
  if (Either.isLeft(assessmentDate)) return reject<LocatedRow>(row, 'InvalidDate', assessmentDate.left)

  return Either.right({
    subjectId,
    assessmentDate: assessmentDate.right,
    category: question.category,
    programGrouping: question.programGrouping,
    question,
  })
}

/** A value equal to `sentinel` would read as unknown once rendered, so it is rejected. */
const coerceLocated = (
  row: RawRow,
  located: LocatedRow,
  sentinel: string | undefined,
): Either.Either<NormalizedRecord, RejectedRow> =>
  Either.match(coerceValue(row.rawValue, located.question), {
    onLeft: (failure) => reject<NormalizedRecord>(row, failure.reason, failure.detail),
    onRight: (canonicalValue) =>
      canonicalValue === sentinel
        ? reject<NormalizedRecord>(
            row,
            'TypeCoercionFailed',
            `"${sentinel}" is reserved for unknown values (${located.question.questionId})`,
          )
        : Either.right({
        sequence: row.sequence,
        subjectId: located.subjectId,
        assessmentDate: located.assessmentDate,
        questionId: located.question.questionId,
        canonicalValue,
        category: located.category,
        programGrouping: located.programGrouping,
      }),
  })

/** Checks run in order: subject, question, date, value. The first failure wins. */
export const normalizeRow = (
  row: RawRow,
  dictionary: Dictionary,
  sentinel?: string,
): Either.Either<NormalizedRecord, RejectedRow> =>
  Either.flatMap(locateRow(row, dictionary), (located) => coerceLocated(row, located, sentinel))

export interface NormalizeResult {
  readonly records: ReadonlyArray<NormalizedRecord>
  readonly rejected: ReadonlyArray<RejectedRow>
  /** One mark per row rejected for a blank value: the question was asked but not answered. */
  readonly assessments: ReadonlyArray<AssessmentMark>
}

export const normalizeRows = (
  rows: ReadonlyArray<RawRow>,
  dictionary: Dictionary,
  sentinel?: string,
): NormalizeResult => {
  const records: Array<NormalizedRecord> = []
  const rejected: Array<RejectedRow> = []
  const assessments: Array<AssessmentMark> = []
  for (const row of rows) {
    const located = locateRow(row, dictionary)
    if (Either.isLeft(located)) {
      rejected.push(located.left)
      continue
    }

    const outcome = coerceLocated(row, located.right, sentinel)
    if (Either.isRight(outcome)) {
      records.push(outcome.right)
      continue
    }

    rejected.push(outcome.left)
    if (outcome.left.reason === 'MissingValue') {
      const { subjectId, assessmentDate, category, programGrouping } = located.right
      assessments.push({ subjectId, assessmentDate, category, programGrouping })
    }
  }
  return { records, rejected, assessments }
}

export const countRejections = (rejected: ReadonlyArray<RejectedRow>): Record<RejectionReason, number> => {
  const counts: Record<RejectionReason, number> = {
    MissingSubject: 0,
    UnknownQuestion: 0,
    InvalidDate: 0,
    MissingValue: 0,
    TypeCoercionFailed: 0,
    OutOfRange: 0,
  }
  for (const { reason } of rejected) counts[reason] += 1
  return counts
}
