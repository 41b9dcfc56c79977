import { FileSystem } from '@effect/platform'
import { Data, Effect } from 'effect'
import { z } from 'zod'

import {
  PROGRAM_YEAR_LABELS,
  TOTAL_ROLLUP,
  WIDE_FRAME_TIE_BREAKS,
  YOY_METRICS,
  describeIssues,
  formatIssues,
  type ValidationIssue,
} from './schemas.ts'
import { isCalendarMonthDay } from './temporal.ts'

export class PipelineConfigError extends Data.TaggedError('PipelineConfigError')<{
  message: string
  source: string
  validationIssues?: Array<ValidationIssue>
  cause?: unknown
}> {}

const tableName = z.string().trim().min(1)

const TablesSchema = z.object({
  rawExports: z.array(tableName).min(1).default(['raw_export']),
  dictionary: tableName.default('assessment_dictionary'),
  longFrame: tableName.default('long_frame'),
  wideFrame: tableName.default('wide_frame'),
  yoyFrame: tableName.default('yoy_frame'),
  progressFrame: tableName.default('progress_frame'),
  rejectedRows: tableName.default('rejected_rows'),
})

/** Column names of the raw export tables. */
const RawColumnsSchema = z.object({
  subjectId: tableName.default('subject_id'),
  assessmentDate: tableName.default('assessment_date'),
  /** Separate time-of-day column, combined with the date when set. */
  assessmentTime: tableName.optional(),
  questionId: tableName.default('question_id'),
  value: tableName.default('value'),
})

const ProgramYearStartSchema = z
  .object({
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
  })
  .refine(({ month, day }) => isCalendarMonthDay(month, day), {
    message: 'Not a day that every year has',
  })

export const PipelineConfigSchema = z
  .object({
    tables: TablesSchema.default({
      rawExports: ['raw_export'],
      dictionary: 'assessment_dictionary',
      longFrame: 'long_frame',
      wideFrame: 'wide_frame',
      yoyFrame: 'yoy_frame',
      progressFrame: 'progress_frame',
      rejectedRows: 'rejected_rows',
    }),
    rawColumns: RawColumnsSchema.default({
      subjectId: 'subject_id',
      assessmentDate: 'assessment_date',
      questionId: 'question_id',
      value: 'value',
    }),
    programYearStart: ProgramYearStartSchema.default({ month: 10, day: 1 }),
    programYearLabel: z.enum(PROGRAM_YEAR_LABELS).default('end'),
    /** Category -> default value, overriding the dictionary's category_default column. */
    categoryDefaults: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).default({}),
    metrics: z.array(z.enum(YOY_METRICS)).min(1).default(['count', 'mean', 'completion_rate', 'pct_unknown']),
    /** Composite categories: name -> member categories. */
    rollups: z.record(z.string(), z.array(z.string().trim().min(1)).min(1)).default({}),
    includeTotalRollup: z.boolean().default(true),
    wideFrameTieBreak: z.enum(WIDE_FRAME_TIE_BREAKS).default('preferObserved'),
    /** Rendering of values that are unknown. */
    sentinel: z.string().default('UNKNOWN'),
  })
  .superRefine((config, ctx) => {
    const { rawExports, dictionary, ...outputs } = config.tables
    const inputs = new Set([...rawExports, dictionary])
    const seen = new Set<string>()
    for (const [key, name] of Object.entries(outputs)) {
      if (inputs.has(name)) {
        ctx.addIssue({ code: 'custom', path: ['tables', key], message: `Output "${name}" would overwrite an input table` })
      }
      if (seen.has(name)) {
        ctx.addIssue({ code: 'custom', path: ['tables', key], message: `Output "${name}" is named twice` })
      }
      seen.add(name)
    }
    const { sentinel } = config
    if (sentinel === 'true' || sentinel === 'false' || (sentinel.trim() !== '' && Number.isFinite(Number(sentinel)))) {
      ctx.addIssue({ code: 'custom', path: ['sentinel'], message: `Sentinel "${sentinel}" reads as a value` })
    }
    if (TOTAL_ROLLUP in config.rollups) {
      ctx.addIssue({ code: 'custom', path: ['rollups', TOTAL_ROLLUP], message: `Rollup name "${TOTAL_ROLLUP}" is reserved` })
    }
  })

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>
export type RawColumns = PipelineConfig['rawColumns']

export const parsePipelineConfig = (
  input: unknown,
  source = 'inline',
): Effect.Effect<PipelineConfig, PipelineConfigError> => {
  const parsed = PipelineConfigSchema.safeParse(input)
  if (parsed.success) return Effect.succeed(parsed.data)

  const validationIssues = formatIssues(parsed.error)
  return Effect.fail(
    new PipelineConfigError({
      message: `Invalid pipeline config: ${describeIssues(validationIssues)}`,
      source,
      validationIssues,
    }),
  )
}

export const defaultPipelineConfig = (): PipelineConfig => PipelineConfigSchema.parse({})

export const loadPipelineConfig = (path: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem

    const text = yield* fs.readFileString(path).pipe(
      Effect.mapError(
        (error) =>
          new PipelineConfigError({
            message: `Failed to read pipeline config: ${error.message}`,
            source: path,
            cause: error,
          }),
      ),
    )

    const json = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (error) =>
        new PipelineConfigError({
          message: `Pipeline config is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
          source: path,
          cause: error,
        }),
    })

    const config = yield* parsePipelineConfig(json, path)
    yield* Effect.log(`Loaded pipeline config from ${path}`)
    return config
  })
