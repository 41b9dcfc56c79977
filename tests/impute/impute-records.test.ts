import { Effect, HashMap, Option } from 'effect'
import { describe, expect, it } from 'vitest'

import { imputeRecords, resolveCategoryDefaults, type ImputedRecord } from '@etl/impute/impute-records.ts'
import type { CanonicalValue } from '@etl/shared/values.ts'
import { normalizeRows } from '@etl/normalize/normalize-rows.ts'
import { loadTestDictionary, quiet, rawRowsOf, recordsOf, twoQuestionRows } from '../fixtures/tables.ts'

const view = (record: ImputedRecord) => [
  record.subjectId,
  record.assessmentDate.toPlainDate().toString(),
  record.questionId,
  Option.getOrNull(record.value),
  record.imputationMethod,
]

const noDefaults = HashMap.empty<string, CanonicalValue>()
const defaultsOf = (entries: ReadonlyArray<readonly [string, CanonicalValue]>) => HashMap.fromIterable(entries)

describe('imputeRecords', () => {
  it('carries the latest earlier value forward', () => {
    const dictionary = loadTestDictionary(twoQuestionRows())
    const records = recordsOf(
      dictionary,
      ['s', '2024-01-01', 'q1', '5'],
      ['s', '2024-01-01', 'q2', '1'],
      ['s', '2024-03-01', 'q2', '2'],
    )

    const imputed = imputeRecords(records, dictionary, noDefaults)

    expect(imputed.map(view)).toEqual([
      ['s', '2024-01-01', 'q1', 5, 'none'],
      ['s', '2024-01-01', 'q2', 1, 'none'],
      ['s', '2024-03-01', 'q1', 5, 'carry_forward'],
      ['s', '2024-03-01', 'q2', 2, 'none'],
    ])
    expect(imputed[2]?.isImputed).toBe(true)
    expect(imputed[2]?.category).toBe('c')
    expect(imputed[2]?.programGrouping).toBe('g')
    expect(imputed.map((record) => Option.getOrNull(record.sequence))).toEqual([0, 1, null, 2])
    expect(imputed[0]?.isImputed).toBe(false)
  })

  it('falls back to the category default, then the sentinel', () => {
    const dictionary = loadTestDictionary(twoQuestionRows())
    const records = recordsOf(dictionary, ['s', '2024-01-01', 'q2', '1'])

    expect(imputeRecords(records, dictionary, defaultsOf([['q1', 0]])).map(view)).toEqual([
      ['s', '2024-01-01', 'q1', 0, 'category_default'],
      ['s', '2024-01-01', 'q2', 1, 'none'],
    ])
    expect(imputeRecords(records, dictionary, noDefaults).map(view)).toEqual([
      ['s', '2024-01-01', 'q1', null, 'sentinel'],
      ['s', '2024-01-01', 'q2', 1, 'none'],
    ])
  })

  it('never carries an imputed value forward', () => {
    const dictionary = loadTestDictionary(twoQuestionRows())
    const records = recordsOf(dictionary, ['s', '2024-01-01', 'q2', '1'], ['s', '2024-02-01', 'q2', '2'])

    expect(imputeRecords(records, dictionary, defaultsOf([['q1', 9]])).map(view)).toEqual([
      ['s', '2024-01-01', 'q1', 9, 'category_default'],
      ['s', '2024-01-01', 'q2', 1, 'none'],
      ['s', '2024-02-01', 'q1', 9, 'category_default'],
      ['s', '2024-02-01', 'q2', 2, 'none'],
    ])
  })

  it('breaks same-date ties by raw export order', () => {
    const dictionary = loadTestDictionary(twoQuestionRows())
    const records = recordsOf(
      dictionary,
      ['s', '2024-02-01', 'q2', '3'],
      ['s', '2024-01-01', 'q1', '4'],
      ['s', '2024-01-01', 'q1', '6'],
    )

    expect(imputeRecords(records, dictionary, noDefaults).map(view)).toEqual([
      ['s', '2024-01-01', 'q1', 4, 'none'],
      ['s', '2024-01-01', 'q1', 6, 'none'],
      ['s', '2024-01-01', 'q2', null, 'sentinel'],
      ['s', '2024-02-01', 'q1', 6, 'carry_forward'],
      ['s', '2024-02-01', 'q2', 3, 'none'],
    ])
  })

  it('carries a value forward onto an assessment where the question was left blank', () => {
    const dictionary = loadTestDictionary(twoQuestionRows().slice(0, 1))
    const { records, assessments } = normalizeRows(
      rawRowsOf(['s', '2024-01-01', 'q1', '5'], ['s', '2024-03-01', 'q1', '']),
      dictionary,
    )

    const imputed = imputeRecords(records, dictionary, noDefaults, assessments)

    expect(imputed.map(view)).toEqual([
      ['s', '2024-01-01', 'q1', 5, 'none'],
      ['s', '2024-03-01', 'q1', 5, 'carry_forward'],
    ])
    expect(imputed[1]?.isImputed).toBe(true)
  })

  it('fills a category whose only answers were blank', () => {
    const dictionary = loadTestDictionary(twoQuestionRows())
    const { records, assessments } = normalizeRows(
      rawRowsOf(['s', '2024-01-01', 'q1', ''], ['s', '2024-01-01', 'q2', '']),
      dictionary,
    )

    expect(records).toEqual([])
    expect(imputeRecords(records, dictionary, defaultsOf([['q1', 0]]), assessments).map(view)).toEqual([
      ['s', '2024-01-01', 'q1', 0, 'category_default'],
      ['s', '2024-01-01', 'q2', null, 'sentinel'],
    ])
  })

  it('fills only the dates a subject was assessed in the category', () => {
    const dictionary = loadTestDictionary()
    const records = recordsOf(
      dictionary,
      ['s-1', '2024-01-01', 'mood_score', '5'],
      ['s-1', '2024-02-01', 'employed', 'yes'],
      ['s-2', '2024-01-01', 'mood_score', '7'],
    )

    expect(imputeRecords(records, dictionary, noDefaults).map(view)).toEqual([
      ['s-1', '2024-01-01', 'mood_score', 5, 'none'],
      ['s-1', '2024-02-01', 'housing_status', null, 'sentinel'],
      ['s-1', '2024-02-01', 'employed', true, 'none'],
      ['s-2', '2024-01-01', 'mood_score', 7, 'none'],
    ])
  })
})

describe('resolveCategoryDefaults', () => {
  const resolve = (categoryDefault: string, overrides: Record<string, string | number | boolean>) =>
    Effect.runSync(
      quiet(Effect.either(resolveCategoryDefaults(loadTestDictionary(twoQuestionRows(categoryDefault)), overrides))),
    )

  it('coerces the dictionary default for every question of the category', () => {
    const defaults = Effect.runSync(
      quiet(resolveCategoryDefaults(loadTestDictionary(twoQuestionRows('0')), {})),
    )
    expect(Object.fromEntries(defaults)).toEqual({ q1: 0, q2: 0 })
  })

  it('lets configured defaults win', () => {
    const defaults = Effect.runSync(
      quiet(resolveCategoryDefaults(loadTestDictionary(twoQuestionRows('0')), { c: 3, elsewhere: 'x' })),
    )
    expect(Object.fromEntries(defaults)).toEqual({ q1: 3, q2: 3 })
  })

  it('fails on a default its questions cannot hold', () => {
    const result = resolve('', { c: 'abc' })
    expect(result._tag).toBe('Left')
    if (result._tag === 'Left') {
      expect(result.left.source).toBe('categoryDefaults')
      expect(result.left.message).toBe('Default "abc" of category "c" does not fit question "q1": "abc" is not a number (q1)')
    }

    const fromDictionary = resolve('many', {})
    expect(fromDictionary._tag).toBe('Left')
    if (fromDictionary._tag === 'Left') expect(fromDictionary.left.source).toBe('assessment dictionary')
  })
})
