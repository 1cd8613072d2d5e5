import 'dotenv/config'
import 'reflect-metadata'
import { main } from './app.js'
import { rootLogger } from './common/infrastructure/logger/index.js'

main().catch((err: unknown) => {
  rootLogger().error({ err }, 'Bridge failed to start')
  process.exitCode = 1
})
