/**
 * HTTP surface
 *
 * Every endpoint accepts GET and POST, reading parameters from the query
 * string and, for POST, the form body. Errors are classified once, in
 * `onError`, and answered as plain text.
 */

import { Hono } from 'hono'
import type { Context } from 'hono'
import { cors } from 'hono/cors'
import { classifyError, formatErrorBody } from '../errors'
import type { BackendClients } from '../executor/provider'
import type { GuardedParser } from '../grammar'
import { silentLogger } from '../observability'
import type { Logger } from '../observability'
import { QueryDispatcher } from '../pipeline/dispatcher'
import type { RequestParams } from '../pipeline/request'
import { MISSING_BRANCH, MISSING_VERSION } from './config'
import type { BuildInfo } from './config'

export interface AppDependencies {
  clients: BackendClients
  parser?: GuardedParser
  logger?: Logger
  buildInfo?: BuildInfo
  /** Append stack traces to internal error responses */
  debug?: boolean
}

/**
 * Query string merged with the form body; body values win.
 */
async function readParams(c: Context): Promise<RequestParams> {
  const params: RequestParams = { ...c.req.query() }
  if (c.req.method !== 'POST') {
    return params
  }
  const body = await c.req.parseBody()
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value
    }
  }
  return params
}

export function createApp(deps: AppDependencies): Hono {
  const logger = deps.logger ?? silentLogger
  const buildInfo = deps.buildInfo ?? { version: MISSING_VERSION, branch: MISSING_BRANCH }
  const { myria, codegen } = deps.clients
  const dispatcher = new QueryDispatcher({ clients: deps.clients, parser: deps.parser, logger })

  const app = new Hono()

  app.use('*', cors())

  app.use('*', async (c, next) => {
    const started = Date.now()
    await next()
    logger.request(c.req.path, Date.now() - started, c.res.status, c.error)
  })

  app.onError((err, c) => {
    const classification = classifyError(err)
    let body = formatErrorBody(classification)
    if (deps.debug && classification.kind === 'internal' && err.stack) {
      body = `${body}\n\n${err.stack}`
    }
    return c.text(body, classification.status)
  })

  // ===========================================================================
  // PLANNING
  // ===========================================================================

  app.on(['GET', 'POST'], '/plan', async (c) => {
    return c.json(await dispatcher.plan(await readParams(c)))
  })

  app.on(['GET', 'POST'], '/optimize', async (c) => {
    return c.json(await dispatcher.optimize(await readParams(c)))
  })

  app.on(['GET', 'POST'], '/compile', async (c) => {
    return c.json(await dispatcher.compile(await readParams(c)))
  })

  app.on(['GET', 'POST'], '/dot', async (c) => {
    return c.text(await dispatcher.dot(await readParams(c)))
  })

  // ===========================================================================
  // EXECUTION
  // ===========================================================================

  app.post('/execute', async (c) => {
    const submission = await dispatcher.execute(await readParams(c))
    c.header('Content-Location', submission.url)
    return c.json({ ...submission.status, queryId: submission.queryId, url: submission.url }, 201)
  })

  app.get('/execute', async (c) => {
    return c.json(await dispatcher.status(await readParams(c)))
  })

  // ===========================================================================
  // SERVICE STATUS
  // ===========================================================================

  app.on(['GET', 'POST'], '/status', async (c) => {
    const address = `${myria.hostname}:${myria.port}`
    let connection: string
    try {
      const [workers, alive] = await Promise.all([myria.workers(), myria.workersAlive()])
      connection = `${address} [${alive.length}/${Object.keys(workers).length}]`
    } catch (error) {
      logger.warn('myria.unreachable', {
        address,
        err_message: error instanceof Error ? error.message : String(error),
      })
      connection = `error connecting to ${address}`
    }
    return c.json({
      connection,
      version: buildInfo.version,
      branch: buildInfo.branch,
      myria: `${myria.ssl ? 'https' : 'http'}://${address}`,
      codegen: `http://${codegen.hostname}:${codegen.port}`,
    })
  })

  return app
}
