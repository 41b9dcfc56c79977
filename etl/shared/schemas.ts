import { z } from 'zod'

// ---------------------------------------------------------------------------
// Enumerations shared by the dictionary, the frames and the configuration
// ---------------------------------------------------------------------------

export const VALUE_TYPES = ['numeric', 'categorical', 'boolean'] as const
export type ValueType = (typeof VALUE_TYPES)[number]

export const YOY_METRICS = ['count', 'mean', 'sum', 'completion_rate', 'pct_unknown', 'pct_imputed'] as const
export type YoyMetric = (typeof YOY_METRICS)[number]

export const PROGRAM_YEAR_LABELS = ['end', 'start'] as const
export type ProgramYearLabel = (typeof PROGRAM_YEAR_LABELS)[number]

/** Rollup of every category of a program grouping. */
export const TOTAL_ROLLUP = '__TOTAL__'

export const WIDE_FRAME_TIE_BREAKS = ['preferObserved', 'lastWins'] as const
export type WideFrameTieBreak = (typeof WIDE_FRAME_TIE_BREAKS)[number]

// ---------------------------------------------------------------------------
// Cell schemas: every cell of an exported table arrives as a string
// ---------------------------------------------------------------------------

export const requiredCell = z.string().trim().min(1, 'Required')

export const optionalTextCell = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))

export const optionalNumberCell = z.string().transform((value, ctx) => {
  const normalized = value.replace(/,/g, '').trim()
  if (normalized === '') return undefined
  const n = Number(normalized)
  if (!Number.isFinite(n)) {
    ctx.addIssue({ code: 'custom', message: `Invalid number: "${value}"` })
    return z.NEVER
  }
  return n
})

/** `low|ok|high` -> ['low', 'ok', 'high'] */
export const optionalListCell = z.string().transform((value) => {
  const items = value
    .split('|')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
  return items.length > 0 ? items : undefined
})

export const valueTypeCell = z.string().trim().toLowerCase().pipe(z.enum(VALUE_TYPES))

// ---------------------------------------------------------------------------
// Validation issue reporting
// ---------------------------------------------------------------------------

export interface ValidationIssue {
  path: string
  message: string
}

export const formatIssues = (error: z.ZodError): Array<ValidationIssue> =>
  error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }))

export const describeIssues = (issues: ReadonlyArray<ValidationIssue>): string =>
  issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ')
