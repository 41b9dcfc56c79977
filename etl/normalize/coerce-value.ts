import { Data, Either, HashMap, Option } from 'effect'

import { normalizeText } from '@etl/shared/text.ts'
import { renderValue, type CanonicalValue } from '@etl/shared/values.ts'

import type { AssessmentDictionaryEntry } from '@etl/dictionary/dictionary.types.ts'

export type RejectionReason =
  | 'MissingSubject'
  | 'UnknownQuestion'
  | 'InvalidDate'
  | 'MissingValue'
  | 'TypeCoercionFailed'
  | 'OutOfRange'

export const REJECTION_REASONS: ReadonlyArray<RejectionReason> = [
  'MissingSubject',
  'UnknownQuestion',
  'InvalidDate',
  'MissingValue',
  'TypeCoercionFailed',
  'OutOfRange',
]

export class CoercionFailure extends Data.TaggedClass('CoercionFailure')<{
  reason: RejectionReason
  detail: string
}> {}

const TRUE_WORDS = new Set(['yes', 'true', 'y', '1'])
const FALSE_WORDS = new Set(['no', 'false', 'n', '0'])

const parseTyped = (text: string, entry: AssessmentDictionaryEntry): Either.Either<CanonicalValue, CoercionFailure> => {
  switch (entry.valueType) {
    case 'numeric': {
      const n = Number(text.replace(/,/g, ''))
      return Number.isFinite(n)
        ? Either.right(n)
        : Either.left(
            new CoercionFailure({
              reason: 'TypeCoercionFailed',
              detail: `"${text}" is not a number (${entry.questionId})`,
            }),
          )
    }
    case 'boolean': {
      const word = text.toLowerCase()
      if (TRUE_WORDS.has(word)) return Either.right(true)
      if (FALSE_WORDS.has(word)) return Either.right(false)
      return Either.left(
        new CoercionFailure({
          reason: 'TypeCoercionFailed',
          detail: `"${text}" is not a yes/no answer (${entry.questionId})`,
        }),
      )
    }
    case 'categorical':
      return Either.right(text)
  }
}

const checkRange = (value: CanonicalValue, entry: AssessmentDictionaryEntry): Either.Either<CanonicalValue, CoercionFailure> =>
  Option.match(entry.validRange, {
    onNone: () => Either.right(value),
    onSome: (range) => {
      if (range._tag === 'OneOf') {
        const allowed =
          typeof value === 'number'
            ? range.values.some((v) => Number(v) === value)
            : range.values.includes(renderValue(value))
        return allowed
          ? Either.right(value)
          : Either.left(
              new CoercionFailure({
                reason: 'OutOfRange',
                detail: `${renderValue(value)} is not one of ${range.values.join('|')} (${entry.questionId})`,
              }),
            )
      }

      if (typeof value !== 'number') return Either.right(value)
      const belowMin = Option.exists(range.min, (min) => value < min)
      const aboveMax = Option.exists(range.max, (max) => value > max)
      if (!belowMin && !aboveMax) return Either.right(value)

      const min = Option.match(range.min, { onNone: () => '', onSome: String })
      const max = Option.match(range.max, { onNone: () => '', onSome: String })
      return Either.left(
        new CoercionFailure({
          reason: 'OutOfRange',
          detail: `${value} is outside [${min}, ${max}] (${entry.questionId})`,
        }),
      )
    },
  })

/**
 * Turn a raw export cell into the canonical value of its question: normalise
 * the text, apply the question's value labels, parse by value type, then
 * check the valid range.
 */
export const coerceValue = (raw: string, entry: AssessmentDictionaryEntry): Either.Either<CanonicalValue, CoercionFailure> => {
  const text = normalizeText(raw)
  if (text === '') {
    return Either.left(new CoercionFailure({ reason: 'MissingValue', detail: `Blank value (${entry.questionId})` }))
  }

  const labelled = Option.getOrElse(HashMap.get(entry.valueLabels, text), () => text)

  return Either.flatMap(parseTyped(labelled, entry), (value) => checkRange(value, entry))
}
