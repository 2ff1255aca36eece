/**
 * Process entry point: `tsx packages/relplan/src/server/main.ts`
 */

import { serve } from '@hono/node-server'
import { CodegenConnection, MyriaConnection } from '../executor'
import { GuardedParser, MyrialParser } from '../grammar'
import { Logger } from '../observability'
import { createApp } from './app'
import { loadConfig, readBuildInfo } from './config'

async function main(): Promise<void> {
  const config = loadConfig(process.env)
  const logger = new Logger(config.logLevel)
  const buildInfo = await readBuildInfo(config, logger)

  const app = createApp({
    clients: {
      myria: new MyriaConnection(config.myria),
      codegen: new CodegenConnection(config.codegen),
    },
    parser: new GuardedParser(new MyrialParser()),
    logger,
    buildInfo,
    debug: config.debug,
  })

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info('server.started', {
      port: info.port,
      myria: `${config.myria.hostname}:${config.myria.port}`,
      codegen: `${config.codegen.hostname}:${config.codegen.port}`,
      version: buildInfo.version,
      branch: buildInfo.branch,
    })
  })
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
