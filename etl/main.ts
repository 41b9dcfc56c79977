import 'dotenv/config'

import { NodeContext, NodeRuntime } from '@effect/platform-node'
import { Config, ConfigProvider, Console, Effect, Layer, Option } from 'effect'

import { defaultPipelineConfig, loadPipelineConfig } from '@etl/shared/config.ts'
import { JsonDirectoryTableStoreLive } from '@etl/shared/table-store.ts'
import { formatPipelineReport, runPipeline } from './pipeline-flow.ts'

const program = Effect.gen(function* () {
  const configPath = yield* Config.option(Config.string('PIPELINE_CONFIG'))
  const config = Option.isSome(configPath) ? yield* loadPipelineConfig(configPath.value) : defaultPipelineConfig()

  const report = yield* runPipeline(config)
  yield* Console.log(`\n${formatPipelineReport(report)}`)
})

const MainLive = JsonDirectoryTableStoreLive.pipe(
  Layer.provideMerge(Layer.mergeAll(NodeContext.layer, Layer.setConfigProvider(ConfigProvider.fromEnv()))),
)

program.pipe(Effect.provide(MainLive), NodeRuntime.runMain)
