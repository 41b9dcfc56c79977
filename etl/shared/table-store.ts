import { FileSystem, Path } from '@effect/platform'
import type { PlatformError } from '@effect/platform/Error'
import { Config, Context, Data, Effect, HashMap, Layer, Option, Ref } from 'effect'

import { describeIssues, formatIssues } from './schemas.ts'
import { TableValuesSchema, tableFromValues, tableToValues, type Table } from './table.ts'

export class TableNotFoundError extends Data.TaggedError('TableNotFoundError')<{
  message: string
  table: string
}> {}

export class TableStoreError extends Data.TaggedError('TableStoreError')<{
  message: string
  table?: string
  cause?: unknown
}> {}

export interface TableStoreShape {
  readonly read: (name: string) => Effect.Effect<Table, TableNotFoundError | TableStoreError>
  /** Replaces every given table, or none of them. */
  readonly replaceAll: (tables: ReadonlyMap<string, Table>) => Effect.Effect<void, TableStoreError>
}

export class TableStore extends Context.Tag('TableStore')<TableStore, TableStoreShape>() {}

const notFound = (name: string) => new TableNotFoundError({ message: `Table "${name}" does not exist`, table: name })

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error))

// ---------------------------------------------------------------------------
// In-memory store
// ---------------------------------------------------------------------------

export const makeInMemoryTableStore = (initial: Readonly<Record<string, Table>> = {}) =>
  Effect.gen(function* () {
    const tablesRef = yield* Ref.make(HashMap.fromIterable(Object.entries(initial)))

    const store: TableStoreShape = {
      read: (name) =>
        Effect.flatMap(Ref.get(tablesRef), (tables) =>
          Option.match(HashMap.get(tables, name), {
            onNone: () => Effect.fail(notFound(name)),
            onSome: (table) => Effect.succeed(table),
          }),
        ),
      replaceAll: (tables) =>
        Ref.update(tablesRef, (current) =>
          Array.from(tables).reduce((acc, [name, table]) => HashMap.set(acc, name, table), current),
        ),
    }

    return { store, snapshot: Ref.get(tablesRef) }
  })

// ---------------------------------------------------------------------------
// JSON directory store: <dir>/<name>.json holding [header, ...rows]
// ---------------------------------------------------------------------------

const TABLE_NAME = /^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/

const checkTableName = (name: string) =>
  TABLE_NAME.test(name)
    ? Effect.succeed(name)
    : Effect.fail(new TableStoreError({ message: `Invalid table name "${name}"`, table: name }))

const isNotFound = (error: PlatformError) => error._tag === 'SystemError' && error.reason === 'NotFound'

interface StagedFile {
  name: string
  temp: string
  target: string
}

/** Targets moved aside or swapped in so far, undone in reverse on failure. */
interface SwapJournal {
  backups: Array<{ target: string; backup: string }>
  swapped: Array<string>
}

export const makeJsonDirectoryTableStore = (dir: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const tablePath = (name: string) => Effect.map(checkTableName(name), () => path.join(dir, `${name}.json`))

    const storeError = (message: string, table?: string) => (error: PlatformError) =>
      new TableStoreError({ message: `${message}: ${error.message}`, table, cause: error })

    const removeIfPresent = (file: string) =>
      fs.exists(file).pipe(
        Effect.flatMap((exists) => (exists ? fs.remove(file) : Effect.void)),
        Effect.catchAll((error) => Effect.logWarning(`Could not remove ${file}: ${error.message}`)),
      )

    const restore = (journal: SwapJournal, staged: ReadonlyArray<StagedFile>) =>
      Effect.gen(function* () {
        yield* Effect.forEach([...journal.swapped].reverse(), removeIfPresent, { discard: true })
        yield* Effect.forEach(
          [...journal.backups].reverse(),
          ({ target, backup }) =>
            fs
              .rename(backup, target)
              .pipe(Effect.catchAll((error) => Effect.logError(`Could not restore ${target} from ${backup}: ${error.message}`))),
          { discard: true },
        )
        yield* Effect.forEach(staged, ({ temp }) => removeIfPresent(temp), { discard: true })
      })

    const store: TableStoreShape = {
      read: (name) =>
        Effect.gen(function* () {
          const file = yield* tablePath(name)

          const text = yield* fs
            .readFileString(file)
            .pipe(
              Effect.mapError((error) =>
                isNotFound(error) ? notFound(name) : storeError(`Failed to read ${file}`, name)(error),
              ),
            )

          const json = yield* Effect.try({
            try: (): unknown => JSON.parse(text),
            catch: (error) =>
              new TableStoreError({ message: `${file} is not valid JSON: ${errorMessage(error)}`, table: name, cause: error }),
          })

          const parsed = TableValuesSchema.safeParse(json)
          if (!parsed.success) {
            return yield* Effect.fail(
              new TableStoreError({
                message: `${file} is not a list of string rows: ${describeIssues(formatIssues(parsed.error))}`,
                table: name,
              }),
            )
          }

          return tableFromValues(parsed.data)
        }),

      replaceAll: (tables) =>
        Effect.gen(function* () {
          yield* fs.makeDirectory(dir, { recursive: true }).pipe(Effect.mapError(storeError(`Failed to create ${dir}`)))

          const stamp = `${process.pid}-${Date.now()}`
          const staged: Array<StagedFile> = []
          const journal: SwapJournal = { backups: [], swapped: [] }

          // Phase 1: write every table next to its target
          yield* Effect.forEach(
            tables,
            ([name, table]) =>
              Effect.gen(function* () {
                const target = yield* tablePath(name)
                const temp = `${target}.${stamp}.tmp`
                staged.push({ name, temp, target })
                yield* fs
                  .writeFileString(temp, JSON.stringify(tableToValues(table), null, 2))
                  .pipe(Effect.mapError(storeError(`Failed to write ${temp}`, name)))
              }),
            { discard: true },
          ).pipe(Effect.tapError(() => restore(journal, staged)))

          // Phase 2: move the old tables aside and swap the new ones in
          yield* Effect.forEach(
            staged,
            ({ name, temp, target }) =>
              Effect.gen(function* () {
                const exists = yield* fs.exists(target).pipe(Effect.mapError(storeError(`Failed to check ${target}`, name)))
                if (exists) {
                  const backup = `${target}.${stamp}.bak`
                  yield* fs.rename(target, backup).pipe(Effect.mapError(storeError(`Failed to move ${target} aside`, name)))
                  journal.backups.push({ target, backup })
                }
                yield* fs.rename(temp, target).pipe(Effect.mapError(storeError(`Failed to replace ${target}`, name)))
                journal.swapped.push(target)
              }),
            { discard: true },
          ).pipe(Effect.tapError(() => restore(journal, staged)))

          // Phase 3: drop the old tables
          yield* Effect.forEach(journal.backups, ({ backup }) => removeIfPresent(backup), { discard: true })

          yield* Effect.log(`Replaced ${staged.length} table(s) in ${dir}`)
        }),
    }

    return store
  })

export const JsonDirectoryTableStoreLive = Layer.effect(
  TableStore,
  Effect.flatMap(Config.string('TABLES_DIR'), makeJsonDirectoryTableStore),
)
