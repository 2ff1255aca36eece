/**
 * Server Configuration Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ConfigurationFault, Logger, MISSING_BRANCH, MISSING_VERSION, loadConfig, readBuildInfo } from '../../src'

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      myria: { hostname: 'rest.myria.cs.washington.edu', port: 1776, ssl: true },
      codegen: { hostname: 'localhost', port: 1337 },
      logLevel: 'info',
      debug: false,
      versionFile: 'VERSION',
      branchFile: 'BRANCH',
    })
  })

  it('reads the environment', () => {
    const config = loadConfig({
      PORT: '9000',
      MYRIA_HOST: 'myria.test',
      MYRIA_PORT: '8753',
      MYRIA_SSL: 'false',
      CODEGEN_HOST: 'codegen.test',
      LOG_LEVEL: ' DEBUG ',
      DEBUG: 'yes',
    })
    expect(config).toMatchObject({
      port: 9000,
      myria: { hostname: 'myria.test', port: 8753, ssl: false },
      codegen: { hostname: 'codegen.test', port: 1337 },
      logLevel: 'debug',
      debug: true,
    })
  })

  it('rejects bad values as a configuration fault', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow(ConfigurationFault)
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid configuration: LOG_LEVEL: /)
    expect(() => loadConfig({ MYRIA_SSL: 'perhaps' })).toThrow(
      "Invalid configuration: MYRIA_SSL: invalid truth value 'perhaps'",
    )
  })
})

describe('readBuildInfo', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relplan-build-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads trimmed commit and branch', async () => {
    await writeFile(join(dir, 'VERSION'), 'abc123\n')
    await writeFile(join(dir, 'BRANCH'), '  main \n')
    expect(await readBuildInfo({ versionFile: join(dir, 'VERSION'), branchFile: join(dir, 'BRANCH') })).toEqual({
      version: 'abc123',
      branch: 'main',
    })
  })

  it('uses placeholders for missing files', async () => {
    expect(await readBuildInfo({ versionFile: join(dir, 'VERSION'), branchFile: join(dir, 'BRANCH') })).toEqual({
      version: MISSING_VERSION,
      branch: MISSING_BRANCH,
    })
  })

  it('uses placeholders and warns when a file cannot be read', async () => {
    const lines: string[] = []
    const logger = new Logger('warn', (line) => lines.push(line))
    await writeFile(join(dir, 'BRANCH'), 'main\n')

    expect(await readBuildInfo({ versionFile: dir, branchFile: join(dir, 'BRANCH') }, logger)).toEqual({
      version: MISSING_VERSION,
      branch: 'main',
    })
    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ level: 'warn', event: 'build_info.unreadable', path: dir })
  })
})
