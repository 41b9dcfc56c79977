import { Data, Effect, HashMap, Option } from 'effect'
import { z } from 'zod'

import {
  describeIssues,
  formatIssues,
  optionalListCell,
  optionalNumberCell,
  optionalTextCell,
  requiredCell,
  valueTypeCell,
  type ValidationIssue,
} from '@etl/shared/schemas.ts'
import { normalizeText } from '@etl/shared/text.ts'
import { describeRange, type AssessmentDictionaryEntry, type Dictionary, type ValidRange } from './dictionary.types.ts'

import type { Table } from '@etl/shared/table.ts'

export class DictionaryError extends Data.TaggedError('DictionaryError')<{
  message: string
  /** 1-based data row of the dictionary table */
  row?: number
  questionId?: string
  validationIssues?: Array<ValidationIssue>
}> {}

export const DICTIONARY_COLUMNS = [
  'question_id',
  'canonical_name',
  'category',
  'program_grouping',
  'value_type',
  'valid_min',
  'valid_max',
  'valid_values',
  'category_default',
  'raw_value',
  'cleaned_value',
] as const
export type DictionaryColumn = (typeof DICTIONARY_COLUMNS)[number]

const DictionaryRowSchema = z.object({
  question_id: requiredCell,
  canonical_name: requiredCell,
  category: requiredCell,
  program_grouping: requiredCell,
  value_type: valueTypeCell,
  valid_min: optionalNumberCell,
  valid_max: optionalNumberCell,
  valid_values: optionalListCell,
  category_default: optionalTextCell,
  raw_value: optionalTextCell,
  cleaned_value: optionalTextCell,
})
type DictionaryRow = z.infer<typeof DictionaryRowSchema>

/** Columns the table lacks read as blank cells. */
const withAllColumns = (row: Readonly<Record<string, string>>) =>
  Object.fromEntries(DICTIONARY_COLUMNS.map((column) => [column, row[column] ?? '']))

const toValidRange = (row: DictionaryRow, rowNumber: number) =>
  Effect.gen(function* () {
    const fail = (message: string) =>
      Effect.fail(new DictionaryError({ message: `Row ${rowNumber}: ${message}`, row: rowNumber, questionId: row.question_id }))

    const hasBounds = row.valid_min !== undefined || row.valid_max !== undefined

    if (hasBounds && row.valid_values !== undefined) {
      return yield* fail('valid_min/valid_max and valid_values cannot both be set')
    }

    if (hasBounds) {
      if (row.value_type !== 'numeric') {
        return yield* fail(`bounds only apply to numeric questions, not ${row.value_type}`)
      }
      if (row.valid_min !== undefined && row.valid_max !== undefined && row.valid_min > row.valid_max) {
        return yield* fail(`valid_min ${row.valid_min} is greater than valid_max ${row.valid_max}`)
      }
      const range: ValidRange = {
        _tag: 'Bounds',
        min: Option.fromNullable(row.valid_min),
        max: Option.fromNullable(row.valid_max),
      }
      return Option.some(range)
    }

    if (row.valid_values !== undefined) {
      if (row.value_type === 'boolean') {
        return yield* fail('valid_values does not apply to boolean questions')
      }
      if (row.value_type === 'numeric') {
        const invalid = row.valid_values.filter((v) => !Number.isFinite(Number(v)))
        if (invalid.length > 0) {
          return yield* fail(`valid_values of a numeric question must be numbers: ${invalid.join(', ')}`)
        }
      }
      const range: ValidRange = { _tag: 'OneOf', values: row.valid_values }
      return Option.some(range)
    }

    return Option.none<ValidRange>()
  })

const metadataKey = (entry: AssessmentDictionaryEntry) =>
  JSON.stringify([
    entry.canonicalName,
    entry.category,
    entry.programGrouping,
    entry.valueType,
    describeRange(entry.validRange),
  ])

interface Draft {
  entry: AssessmentDictionaryEntry
  labels: Map<string, string>
}

const pushUnique = (index: Map<string, Array<string>>, key: string, value: string) => {
  const list = index.get(key) ?? []
  if (!list.includes(value)) list.push(value)
  index.set(key, list)
}

/**
 * Build the dictionary from its table. The table may repeat a question on
 * several rows, one per raw value label; those rows must agree on metadata.
 */
export const loadDictionary = (table: Table) =>
  Effect.gen(function* () {
    const drafts = new Map<string, Draft>()
    const categoryDefaults = new Map<string, string>()

    for (const [index, raw] of table.rows.entries()) {
      const rowNumber = index + 1
      const parsed = DictionaryRowSchema.safeParse(withAllColumns(raw))
      if (!parsed.success) {
        const validationIssues = formatIssues(parsed.error)
        return yield* Effect.fail(
          new DictionaryError({
            message: `Row ${rowNumber}: ${describeIssues(validationIssues)}`,
            row: rowNumber,
            validationIssues,
          }),
        )
      }
      const row = parsed.data

      const entry: AssessmentDictionaryEntry = {
        questionId: row.question_id,
        canonicalName: row.canonical_name,
        category: row.category,
        programGrouping: row.program_grouping,
        valueType: row.value_type,
        validRange: yield* toValidRange(row, rowNumber),
        valueLabels: HashMap.empty(),
      }

      const draft = drafts.get(entry.questionId) ?? { entry, labels: new Map<string, string>() }
      if (metadataKey(draft.entry) !== metadataKey(entry)) {
        return yield* Effect.fail(
          new DictionaryError({
            message: `Row ${rowNumber}: question "${entry.questionId}" conflicts with its earlier definition`,
            row: rowNumber,
            questionId: entry.questionId,
          }),
        )
      }
      drafts.set(entry.questionId, draft)

      if (row.raw_value !== undefined && row.cleaned_value !== undefined) {
        const rawLabel = normalizeText(row.raw_value)
        const cleaned = normalizeText(row.cleaned_value)
        const existing = draft.labels.get(rawLabel)
        if (existing !== undefined && existing !== cleaned) {
          return yield* Effect.fail(
            new DictionaryError({
              message: `Row ${rowNumber}: "${rawLabel}" already maps to "${existing}" for question "${entry.questionId}"`,
              row: rowNumber,
              questionId: entry.questionId,
            }),
          )
        }
        draft.labels.set(rawLabel, cleaned)
      }

      if (row.category_default !== undefined) {
        const existing = categoryDefaults.get(row.category)
        if (existing !== undefined && existing !== row.category_default) {
          return yield* Effect.fail(
            new DictionaryError({
              message: `Row ${rowNumber}: category "${row.category}" has conflicting defaults "${existing}" and "${row.category_default}"`,
              row: rowNumber,
              questionId: entry.questionId,
            }),
          )
        }
        categoryDefaults.set(row.category, row.category_default)
      }
    }

    const questionsByCategory = new Map<string, Array<string>>()
    const categoriesByProgramGrouping = new Map<string, Array<string>>()
    const entries: Array<[string, AssessmentDictionaryEntry]> = []

    for (const [questionId, { entry, labels }] of drafts) {
      entries.push([questionId, { ...entry, valueLabels: HashMap.fromIterable(labels) }])
      pushUnique(questionsByCategory, entry.category, questionId)
      pushUnique(categoriesByProgramGrouping, entry.programGrouping, entry.category)
    }

    const dictionary: Dictionary = {
      entries: HashMap.fromIterable(entries),
      questionIds: Array.from(drafts.keys()),
      categories: Array.from(questionsByCategory.keys()),
      programGroupings: Array.from(categoriesByProgramGrouping.keys()),
      questionsByCategory: HashMap.fromIterable(questionsByCategory),
      categoriesByProgramGrouping: HashMap.fromIterable(categoriesByProgramGrouping),
      categoryDefaults: HashMap.fromIterable(categoryDefaults),
    }

    yield* Effect.log(
      `Loaded dictionary: ${dictionary.questionIds.length} questions, ${dictionary.categories.length} categories, ${dictionary.programGroupings.length} program groupings`,
    )

    return dictionary
  })
