import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { TempWorkspace } from '@keyseal/test-helpers'
import { keygenCommand } from '../../../src/commands/keygen.js'
import { captureOutput, createCliWorkspace } from '../../helpers/cli.js'
import type { CapturedOutput } from '../../helpers/cli.js'

describe('keygenCommand', () => {
  let ws: TempWorkspace
  let output: CapturedOutput

  beforeEach(async () => {
    ws = await createCliWorkspace()
    output = captureOutput()
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    vi.unstubAllEnvs()
    await ws.dispose()
  })

  it('writes the configured key file when --out is not given', async () => {
    const code = await keygenCommand([])

    expect(code).toBe(0)
    expect((await ws.readBytes('default.key')).byteLength).toBe(32)
    expect(output.stdout).toBe(`Key written to ${ws.path('default.key')}\n`)
  })

  it('writes to --out when given', async () => {
    const code = await keygenCommand(['--out', ws.path('work.key')])

    expect(code).toBe(0)
    expect(await ws.exists('work.key')).toBe(true)
    expect(await ws.exists('default.key')).toBe(false)
  })

  it('records generation in the log file', async () => {
    await keygenCommand([])
    const log = await ws.read('run.log')
    expect(log).toContain('DEBUG: Generating the key...')
    expect(log).toContain(`DEBUG: Key written to ${ws.path('default.key')}`)
  })

  it('returns 1 and reports the error when the target is not writable', async () => {
    const target = ws.path('no-such-dir', 'k.key')

    const code = await keygenCommand(['--out', target])

    expect(code).toBe(1)
    expect(output.stderr).toContain(`ERROR: Failed to write key file ${target}`)
    expect(output.stderr).toContain(`IOError: Failed to write key file ${target}`)
    expect(output.stdout).toBe('')
  })

  it('returns 2 when the config file is invalid', async () => {
    await ws.write('config/config.json', '{ not json')

    const code = await keygenCommand([])

    expect(code).toBe(2)
    expect(output.stderr).toContain('ConfigError: Failed to parse config file')
  })
})
