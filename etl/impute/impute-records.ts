import { Effect, Either, HashMap, Option } from 'effect'

import { lookupQuestion, questionsInCategory, type Dictionary } from '@etl/dictionary/dictionary.types.ts'
import { coerceValue } from '@etl/normalize/coerce-value.ts'
import { PipelineConfigError } from '@etl/shared/config.ts'
import { compareDateTimes, renderDateTime } from '@etl/shared/temporal.ts'
import { renderValue, type CanonicalValue, type CellValue } from '@etl/shared/values.ts'

import type { Temporal } from '@js-temporal/polyfill'
import type { AssessmentMark, NormalizedRecord } from '@etl/normalize/normalize-rows.ts'

export type ImputationMethod = 'none' | 'carry_forward' | 'category_default' | 'sentinel'

export interface ImputedRecord {
  readonly subjectId: string
  readonly assessmentDate: Temporal.PlainDateTime
  readonly questionId: string
  readonly category: string
  readonly programGrouping: string
  /** `none` only for the sentinel method. */
  readonly value: CellValue
  readonly isImputed: boolean
  readonly imputationMethod: ImputationMethod
  /** Raw export position of an observed record; imputed records have none. */
  readonly sequence: Option.Option<number>
}

// ---------------------------------------------------------------------------
// Category defaults
// ---------------------------------------------------------------------------

export type CategoryDefaultOverrides = Readonly<Record<string, string | number | boolean>>

/**
 * Resolve the default value of every question whose category has one. The
 * configured overrides win over the dictionary's category_default column, and
 * each default goes through the same coercion as an exported value.
 */
export const resolveCategoryDefaults = (dictionary: Dictionary, overrides: CategoryDefaultOverrides) =>
  Effect.gen(function* () {
    for (const category of Object.keys(overrides)) {
      if (!dictionary.categories.includes(category)) {
        yield* Effect.logWarning(`Default configured for unknown category "${category}" is ignored`)
      }
    }

    let defaults = HashMap.empty<string, CanonicalValue>()

    for (const category of dictionary.categories) {
      const override = overrides[category]
      const raw = override === undefined ? HashMap.get(dictionary.categoryDefaults, category) : Option.some(renderValue(override))
      if (Option.isNone(raw)) continue

      for (const questionId of questionsInCategory(dictionary, category)) {
        const entry = lookupQuestion(dictionary, questionId)
        if (Option.isNone(entry)) continue

        const coerced = coerceValue(raw.value, entry.value)
        if (Either.isLeft(coerced)) {
          return yield* Effect.fail(
            new PipelineConfigError({
              message: `Default "${raw.value}" of category "${category}" does not fit question "${questionId}": ${coerced.left.detail}`,
              source: override === undefined ? 'assessment dictionary' : 'categoryDefaults',
            }),
          )
        }
        defaults = HashMap.set(defaults, questionId, coerced.right)
      }
    }

    return defaults
  })

// ---------------------------------------------------------------------------
// Imputation
// ---------------------------------------------------------------------------

const byDateThenSequence = (a: NormalizedRecord, b: NormalizedRecord) =>
  compareDateTimes(a.assessmentDate, b.assessmentDate) || a.sequence - b.sequence

interface Group {
  readonly subjectId: string
  readonly category: string
  readonly programGrouping: string
  readonly records: Array<NormalizedRecord>
  readonly assessedOn: Array<Temporal.PlainDateTime>
}

/**
 * Records of one (subject, category) group in date order, ties kept in raw
 * export order, with an index from rendered date to the observations on it.
 * `dates` also holds the dates on which the group was assessed without an
 * observation surviving.
 */
interface GroupArena {
  readonly records: ReadonlyArray<NormalizedRecord>
  readonly dates: ReadonlyArray<Temporal.PlainDateTime>
  readonly byDate: ReadonlyMap<string, ReadonlyArray<NormalizedRecord>>
}

const buildArena = (group: Group): GroupArena => {
  const sorted = [...group.records].sort(byDateThenSequence)
  const dates = new Map<string, Temporal.PlainDateTime>()
  const byDate = new Map<string, Array<NormalizedRecord>>()
  for (const date of group.assessedOn) dates.set(renderDateTime(date), date)
  for (const record of sorted) {
    const key = renderDateTime(record.assessmentDate)
    dates.set(key, record.assessmentDate)
    const onDate = byDate.get(key)
    if (onDate) onDate.push(record)
    else byDate.set(key, [record])
  }
  return { records: sorted, dates: [...dates.values()].sort(compareDateTimes), byDate }
}

const observed = (record: NormalizedRecord): ImputedRecord => ({
  subjectId: record.subjectId,
  assessmentDate: record.assessmentDate,
  questionId: record.questionId,
  category: record.category,
  programGrouping: record.programGrouping,
  value: Option.some(record.canonicalValue),
  isImputed: false,
  imputationMethod: 'none',
  sequence: Option.some(record.sequence),
})

/**
 * Fill every question of a category on every date the subject was assessed in
 * that category: a date with an observation, or one of `assessments` (rows
 * left blank). Missing values are carried forward from the
 * latest earlier observation, else take the category default, else the
 * sentinel.
 */
export const imputeRecords = (
  records: ReadonlyArray<NormalizedRecord>,
  dictionary: Dictionary,
  defaults: HashMap.HashMap<string, CanonicalValue>,
  assessments: ReadonlyArray<AssessmentMark> = [],
): Array<ImputedRecord> => {
  const groups = new Map<string, Group>()
  const groupOf = ({ subjectId, category, programGrouping }: AssessmentMark) => {
    const key = `${subjectId}\u0000${category}`
    const existing = groups.get(key)
    if (existing) return existing
    const group: Group = { subjectId, category, programGrouping, records: [], assessedOn: [] }
    groups.set(key, group)
    return group
  }
  for (const record of records) groupOf(record).records.push(record)
  for (const mark of assessments) groupOf(mark).assessedOn.push(mark.assessmentDate)

  const out: Array<ImputedRecord> = []

  for (const group of groups.values()) {
    const arena = buildArena(group)
    const questionIds = questionsInCategory(dictionary, group.category)
    const lastObserved = new Map<string, CanonicalValue>()

    for (const date of arena.dates) {
      const onDate = arena.byDate.get(renderDateTime(date)) ?? []

      for (const questionId of questionIds) {
        const matches = onDate.filter((record) => record.questionId === questionId)
        if (matches.length > 0) {
          out.push(...matches.map(observed))
          continue
        }

        const entry = lookupQuestion(dictionary, questionId)
        const programGrouping = Option.match(entry, {
          onNone: () => group.programGrouping,
          onSome: (e) => e.programGrouping,
        })
        const base = {
          subjectId: group.subjectId,
          assessmentDate: date,
          questionId,
          category: group.category,
          programGrouping,
          isImputed: true,
          sequence: Option.none<number>(),
        }

        const prior = lastObserved.get(questionId)
        if (prior !== undefined) {
          out.push({ ...base, value: Option.some(prior), imputationMethod: 'carry_forward' })
          continue
        }

        out.push(
          Option.match(HashMap.get(defaults, questionId), {
            onNone: (): ImputedRecord => ({ ...base, value: Option.none(), imputationMethod: 'sentinel' }),
            onSome: (value): ImputedRecord => ({ ...base, value: Option.some(value), imputationMethod: 'category_default' }),
          }),
        )
      }

      // observations of this date become priors only for later dates
      for (const record of onDate) lastObserved.set(record.questionId, record.canonicalValue)
    }
  }

  return out
}
