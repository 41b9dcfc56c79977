import { Option } from 'effect'
import { describe, expect, it } from 'vitest'

import { buildLongFrame } from '@etl/frames/long-frame.ts'
import { renderDateTime } from '@etl/shared/temporal.ts'
import { longFrameOf, loadTestDictionary, recordsOf, twoQuestionRows } from '../fixtures/tables.ts'

import type { LongFrameRow } from '@etl/frames/long-frame.ts'

const key = (row: LongFrameRow) => `${row.subjectId} ${renderDateTime(row.assessmentDate)} ${row.questionId}`

describe('buildLongFrame', () => {
  it('sorts by subject, assessment date and question', () => {
    const longFrame = longFrameOf(
      loadTestDictionary(),
      ['s-2', '2024-01-01', 'mood_score', '3'],
      ['s-1', '2024-02-01', 'sleep_hours', '8'],
      ['s-1', '2024-01-01', 'sleep_hours', '7'],
      ['s-1', '2024-01-01', 'mood_score', '4'],
    )

    expect(longFrame.map(key)).toEqual([
      's-1 2024-01-01T00:00:00 mood_score',
      's-1 2024-01-01T00:00:00 sleep_hours',
      's-1 2024-02-01T00:00:00 sleep_hours',
      's-2 2024-01-01T00:00:00 mood_score',
    ])
  })

  it('keeps duplicate observations in raw export order', () => {
    const dictionary = loadTestDictionary(twoQuestionRows())
    const longFrame = longFrameOf(dictionary, ['s', '2024-01-01', 'q1', '6'], ['s', '2024-01-01', 'q1', '4'])
    const reversed = buildLongFrame([...longFrame].reverse())

    expect(reversed.map((row) => [row.questionId, Option.getOrNull(row.value)])).toEqual([
      ['q1', 6],
      ['q1', 4],
      ['q2', null],
    ])
  })

  it('has exactly one row per accepted record', () => {
    const dictionary = loadTestDictionary()
    const rows = [
      ['s-1', '2024-01-01', 'mood_score', '4'],
      ['s-1', '2024-01-01', 'employed', 'no'],
      ['s-1', '2024-01-01', 'retired_field', '1'],
      ['s-2', '3/4/2024', 'housing_status', 'Stable Housing'],
    ] as const
    const records = recordsOf(dictionary, ...rows)
    const longFrame = longFrameOf(dictionary, ...rows)

    const observedKeys = longFrame.filter((row) => !row.isImputed).map(key)
    expect(observedKeys).toHaveLength(records.length)
    for (const record of records) {
      const recordKey = `${record.subjectId} ${renderDateTime(record.assessmentDate)} ${record.questionId}`
      expect(observedKeys.filter((k) => k === recordKey)).toHaveLength(1)
    }
    expect(longFrame.some((row) => row.questionId === 'retired_field')).toBe(false)
  })
})
