import { HashMap, Option } from 'effect'

import type { ValueType } from '@etl/shared/schemas.ts'

export type ValidRange =
  | { readonly _tag: 'Bounds'; readonly min: Option.Option<number>; readonly max: Option.Option<number> }
  | { readonly _tag: 'OneOf'; readonly values: ReadonlyArray<string> }

export interface AssessmentDictionaryEntry {
  readonly questionId: string
  readonly canonicalName: string
  readonly category: string
  readonly programGrouping: string
  readonly valueType: ValueType
  readonly validRange: Option.Option<ValidRange>
  /** Raw export label -> cleaned value, applied before coercion. */
  readonly valueLabels: HashMap.HashMap<string, string>
}

/**
 * Immutable lookup built once per run and passed to every component that
 * needs question metadata. All orderings are first appearance in the table.
 */
export interface Dictionary {
  readonly entries: HashMap.HashMap<string, AssessmentDictionaryEntry>
  readonly questionIds: ReadonlyArray<string>
  readonly categories: ReadonlyArray<string>
  readonly programGroupings: ReadonlyArray<string>
  readonly questionsByCategory: HashMap.HashMap<string, ReadonlyArray<string>>
  readonly categoriesByProgramGrouping: HashMap.HashMap<string, ReadonlyArray<string>>
  /** Raw default cell per category, from the category_default column. */
  readonly categoryDefaults: HashMap.HashMap<string, string>
}

export const lookupQuestion = (dictionary: Dictionary, questionId: string) =>
  HashMap.get(dictionary.entries, questionId)

export const questionsInCategory = (dictionary: Dictionary, category: string): ReadonlyArray<string> =>
  Option.getOrElse(HashMap.get(dictionary.questionsByCategory, category), () => [])

export const categoriesInProgramGrouping = (dictionary: Dictionary, programGrouping: string): ReadonlyArray<string> =>
  Option.getOrElse(HashMap.get(dictionary.categoriesByProgramGrouping, programGrouping), () => [])

export const describeRange = (range: Option.Option<ValidRange>): string =>
  Option.match(range, {
    onNone: () => 'any',
    onSome: (r) => {
      if (r._tag === 'OneOf') return `one of ${r.values.join('|')}`
      const min = Option.match(r.min, { onNone: () => '', onSome: String })
      const max = Option.match(r.max, { onNone: () => '', onSome: String })
      return `[${min}, ${max}]`
    },
  })
