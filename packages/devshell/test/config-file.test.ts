import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import process from 'node:process'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { loadFleaConfig } from '../src/config'
import { ConfigError } from '../src/errors'

function writeConfig(dir: string, body: string): void {
  fs.writeFileSync(path.join(dir, 'flea.config.mjs'), `export default ${body}\n`)
}

describe('loadFleaConfig with a config file', () => {
  let originalEnv: NodeJS.ProcessEnv
  let tempDir: string

  beforeEach(() => {
    originalEnv = { ...process.env }
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('FLEA_') || key === 'CI' || key === 'GITHUB_ACTIONS')
        delete process.env[key]
    }
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flea-config-'))
  })

  afterEach(() => {
    Object.keys(process.env).forEach((key) => {
      delete process.env[key]
    })
    Object.assign(process.env, originalEnv)
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('falls back to the defaults when no file exists', async () => {
    const config = await loadFleaConfig(tempDir)
    expect(config.shell).toBe('default')
    expect(config.format).toBe('text')
    expect(config.allowUnfree).toBe(true)
    expect(config.logging.level).toBe('warn')
  })

  it('merges file values over the defaults', async () => {
    writeConfig(tempDir, `{ shell: 'ci', format: 'json', platform: 'aarch64-linux' }`)
    const config = await loadFleaConfig(tempDir)
    expect(config.shell).toBe('ci')
    expect(config.format).toBe('json')
    expect(config.platform).toBe('aarch64-linux')
    expect(config.allowUnfree).toBe(true)
    expect(config.logging.level).toBe('warn')
  })

  it('rejects an invalid file', async () => {
    writeConfig(tempDir, `{ format: 'yaml' }`)
    await expect(loadFleaConfig(tempDir)).rejects.toBeInstanceOf(ConfigError)
  })

  it('reads FLEA_ variables only through the guarded defaults', async () => {
    process.env.FLEA_FORMAT = 'yaml'
    process.env.FLEA_LOGGING_LEVEL = 'bogus'
    process.env.FLEA_SHELL = 'nightly'
    const config = await loadFleaConfig(tempDir)
    expect(config.format).toBe('text')
    expect(config.logging.level).toBe('warn')
    expect(config.shell).toBe('nightly')
  })

  it('lets the file win over environment defaults', async () => {
    process.env.FLEA_SHELL = 'nightly'
    process.env.FLEA_FORMAT = 'shell'
    writeConfig(tempDir, `{ shell: 'ci' }`)
    const config = await loadFleaConfig(tempDir)
    expect(config.shell).toBe('ci')
    expect(config.format).toBe('shell')
  })

  it('keeps verbose on in CI', async () => {
    process.env.CI = 'true'
    process.env.FLEA_VERBOSE = 'false'
    const config = await loadFleaConfig(tempDir)
    expect(config.verbose).toBe(true)
    expect(config.logging.level).toBe('debug')
  })
})
