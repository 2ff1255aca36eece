/**
 * Server configuration, read once from the environment at start-up.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigurationFault } from '../errors'
import { silentLogger } from '../observability'
import type { LogLevel, Logger } from '../observability'
import { BooleanParamSchema } from '../pipeline/request'

const PortSchema = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback)

export const ConfigSchema = z.object({
  PORT: PortSchema(8080),
  MYRIA_HOST: z.string().min(1).default('rest.myria.cs.washington.edu'),
  MYRIA_PORT: PortSchema(1776),
  MYRIA_SSL: BooleanParamSchema(true),
  CODEGEN_HOST: z.string().min(1).default('localhost'),
  CODEGEN_PORT: PortSchema(1337),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? 'info' : value.trim().toLowerCase()))
    .pipe(z.enum(['debug', 'info', 'warn', 'error'])),
  DEBUG: BooleanParamSchema(false),
  VERSION_FILE: z.string().default('VERSION'),
  BRANCH_FILE: z.string().default('BRANCH'),
})

export interface ServerConfig {
  port: number
  myria: { hostname: string; port: number; ssl: boolean }
  codegen: { hostname: string; port: number }
  logLevel: LogLevel
  debug: boolean
  versionFile: string
  branchFile: string
}

/**
 * Validate the environment. Anything unparseable is a ConfigurationFault.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const result = ConfigSchema.safeParse(env)
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
    throw new ConfigurationFault(`Invalid configuration: ${detail}`)
  }
  const parsed = result.data
  return {
    port: parsed.PORT,
    myria: { hostname: parsed.MYRIA_HOST, port: parsed.MYRIA_PORT, ssl: parsed.MYRIA_SSL },
    codegen: { hostname: parsed.CODEGEN_HOST, port: parsed.CODEGEN_PORT },
    logLevel: parsed.LOG_LEVEL,
    debug: parsed.DEBUG,
    versionFile: parsed.VERSION_FILE,
    branchFile: parsed.BRANCH_FILE,
  }
}

// =============================================================================
// BUILD INFO
// =============================================================================

export interface BuildInfo {
  version: string
  branch: string
}

export const MISSING_VERSION = 'commit version file not found'
export const MISSING_BRANCH = 'branch file not found'

async function readTrimmed(path: string, logger: Logger): Promise<string | null> {
  try {
    const content = await readFile(path, 'utf8')
    return content.trim()
  } catch (error) {
    logger.warn('build_info.unreadable', {
      path,
      error: error instanceof Error ? error.message : String(error),
    })
    return null
  }
}

/**
 * Commit and branch recorded at deploy time. A file that cannot be read
 * degrades to its placeholder.
 */
export async function readBuildInfo(
  config: Pick<ServerConfig, 'versionFile' | 'branchFile'>,
  logger: Logger = silentLogger,
): Promise<BuildInfo> {
  const [version, branch] = await Promise.all([
    readTrimmed(config.versionFile, logger),
    readTrimmed(config.branchFile, logger),
  ])
  return {
    version: version ?? MISSING_VERSION,
    branch: branch ?? MISSING_BRANCH,
  }
}
