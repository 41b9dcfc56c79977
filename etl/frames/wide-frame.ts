import { Option } from 'effect'

import { renderDateTime } from '@etl/shared/temporal.ts'
import { compareText } from '@etl/shared/text.ts'

import type { Temporal } from '@js-temporal/polyfill'
import type { Dictionary } from '@etl/dictionary/dictionary.types.ts'
import type { WideFrameTieBreak } from '@etl/shared/schemas.ts'
import type { CellValue } from '@etl/shared/values.ts'
import type { LongFrameRow } from './long-frame.ts'

export interface WideFrameRow {
  readonly subjectId: string
  readonly assessmentDate: Temporal.PlainDateTime
  /** Distinct categories observed for the pair, sorted. */
  readonly categories: ReadonlyArray<string>
  readonly programGroupings: ReadonlyArray<string>
  /** Question id -> value; questions without a row are absent. */
  readonly cells: ReadonlyMap<string, CellValue>
}

export interface CollisionCell {
  readonly subjectId: string
  readonly assessmentDate: Temporal.PlainDateTime
  readonly questionId: string
  /** Rows competing for the cell, the winner included. */
  readonly candidates: number
}

export interface WideFrame {
  readonly columns: ReadonlyArray<string>
  readonly rows: ReadonlyArray<WideFrameRow>
  /** Rows discarded by the tie-break, summed over every cell. */
  readonly collisions: number
  readonly collisionCells: ReadonlyArray<CollisionCell>
}

export interface WideFrameOptions {
  readonly tieBreak: WideFrameTieBreak
}

interface PendingRow {
  subjectId: string
  assessmentDate: Temporal.PlainDateTime
  categories: Set<string>
  programGroupings: Set<string>
  winners: Map<string, LongFrameRow>
  candidates: Map<string, number>
}

/** Whether a later row for the same cell takes it over under the tie-break. */
export const supersedes = (candidate: LongFrameRow, current: LongFrameRow, tieBreak: WideFrameTieBreak) =>
  tieBreak === 'lastWins' || candidate.isImputed === current.isImputed || !candidate.isImputed

/**
 * Pivot the long frame to one row per (subject, assessment date). Rows are
 * read in long-frame order, so "last" means last in that order.
 */
export const buildWideFrame = (
  longFrame: ReadonlyArray<LongFrameRow>,
  dictionary: Dictionary,
  options: WideFrameOptions,
): WideFrame => {
  const pending = new Map<string, PendingRow>()

  for (const row of longFrame) {
    const key = `${row.subjectId}\u0000${renderDateTime(row.assessmentDate)}`
    let target = pending.get(key)
    if (!target) {
      target = {
        subjectId: row.subjectId,
        assessmentDate: row.assessmentDate,
        categories: new Set(),
        programGroupings: new Set(),
        winners: new Map(),
        candidates: new Map(),
      }
      pending.set(key, target)
    }

    target.categories.add(row.category)
    target.programGroupings.add(row.programGrouping)
    target.candidates.set(row.questionId, (target.candidates.get(row.questionId) ?? 0) + 1)

    const current = target.winners.get(row.questionId)
    if (current === undefined || supersedes(row, current, options.tieBreak)) {
      target.winners.set(row.questionId, row)
    }
  }

  let collisions = 0
  const collisionCells: Array<CollisionCell> = []
  const rows: Array<WideFrameRow> = []

  for (const target of pending.values()) {
    for (const [questionId, candidates] of target.candidates) {
      if (candidates < 2) continue
      collisions += candidates - 1
      collisionCells.push({
        subjectId: target.subjectId,
        assessmentDate: target.assessmentDate,
        questionId,
        candidates,
      })
    }

    const cells = new Map<string, CellValue>()
    for (const questionId of dictionary.questionIds) {
      const winner = target.winners.get(questionId)
      if (winner) cells.set(questionId, winner.value)
    }

    rows.push({
      subjectId: target.subjectId,
      assessmentDate: target.assessmentDate,
      categories: [...target.categories].sort(compareText),
      programGroupings: [...target.programGroupings].sort(compareText),
      cells,
    })
  }

  return { columns: dictionary.questionIds, rows, collisions, collisionCells }
}

/** A question with no row for the pair reads as the sentinel. */
export const wideCell = (row: WideFrameRow, questionId: string): CellValue =>
  row.cells.get(questionId) ?? Option.none()
