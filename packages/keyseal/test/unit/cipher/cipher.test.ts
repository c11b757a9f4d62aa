import { describe, it, expect } from 'vitest'
import { encryptMessage, decryptMessage } from '../../../src/cipher/cipher.js'
import { CipherError } from '../../../src/errors.js'
import { createKey } from '../../../src/keys/manager.js'
import type { KeyMaterial } from '../../../src/types.js'
import { makeLogger } from '../../helpers/fs.js'

function makeKey(): KeyMaterial {
  return { bytes: createKey(), path: '/keys/test.key' }
}

async function encryptOrThrow(key: KeyMaterial, plaintext: string): Promise<string> {
  const result = await encryptMessage(key, plaintext)
  if (!result.ok) {
    throw result.error
  }
  return result.value
}

/** Replace the first character of segment `index` with a different Base64URL character. */
function alterSegment(token: string, index: number): string {
  const parts = token.split('.')
  const segment = parts[index] ?? ''
  const replacement = segment.startsWith('A') ? 'B' : 'A'
  parts[index] = replacement + segment.slice(1)
  return parts.join('.')
}

describe('encryptMessage / decryptMessage', () => {
  it('roundtrip: decrypt(K, encrypt(K, P)) returns P', async () => {
    const key = makeKey()
    const plaintext = 'Meet me at the usual place.'

    const ciphertext = await encryptOrThrow(key, plaintext)
    const decrypted = await decryptMessage(key, ciphertext)

    expect(decrypted).toEqual({ ok: true, value: plaintext })
  })

  it('roundtrip preserves multi-line and non-ASCII text', async () => {
    const key = makeKey()
    const plaintext = 'línea uno\nzweite Zeile ✓\r\n三行目\n'

    const decrypted = await decryptMessage(key, await encryptOrThrow(key, plaintext))

    expect(decrypted).toEqual({ ok: true, value: plaintext })
  })

  it('produces a compact JWE with 5 parts and a dir/A256GCM header', async () => {
    const ciphertext = await encryptOrThrow(makeKey(), 'hello')
    const parts = ciphertext.split('.')
    expect(parts).toHaveLength(5)
    // dir carries no encrypted key
    expect(parts[1]).toBe('')

    const header: unknown = JSON.parse(Buffer.from(parts[0] ?? '', 'base64url').toString('utf8'))
    expect(header).toEqual({ alg: 'dir', enc: 'A256GCM' })
  })

  it('produces a different ciphertext for the same plaintext each time', async () => {
    const key = makeKey()
    const a = await encryptOrThrow(key, 'same text')
    const b = await encryptOrThrow(key, 'same text')
    expect(a).not.toBe(b)
  })

  it('ignores surrounding whitespace on the ciphertext', async () => {
    const key = makeKey()
    const ciphertext = await encryptOrThrow(key, 'trailing newline')

    const decrypted = await decryptMessage(key, `  ${ciphertext}\n`)

    expect(decrypted).toEqual({ ok: true, value: 'trailing newline' })
  })

  it('logs progress at debug level', async () => {
    const { logger, sink } = makeLogger()
    const key = makeKey()
    const result = await encryptMessage(key, 'x', logger)
    if (!result.ok) throw result.error
    await decryptMessage(key, result.value, logger)

    expect(sink.messages('debug')).toEqual(['Encrypting message...', 'Decrypting message...'])
  })
})

describe('tamper detection', () => {
  it('fails with a CipherError when decrypting with a different key', async () => {
    const ciphertext = await encryptOrThrow(makeKey(), 'for your eyes only')

    const result = await decryptMessage(makeKey(), ciphertext)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(CipherError)
    expect(result.error.operation).toBe('decrypt')
    expect(result.error.severity).toBe('recoverable')
  })

  it('fails when a byte of the ciphertext segment is altered', async () => {
    const key = makeKey()
    const ciphertext = await encryptOrThrow(key, 'a message long enough to alter')

    const result = await decryptMessage(key, alterSegment(ciphertext, 3))

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(CipherError)
  })

  it('fails when the authentication tag is altered', async () => {
    const key = makeKey()
    const ciphertext = await encryptOrThrow(key, 'tagged')

    const result = await decryptMessage(key, alterSegment(ciphertext, 4))

    expect(result.ok).toBe(false)
  })

  it('fails when the IV is altered', async () => {
    const key = makeKey()
    const ciphertext = await encryptOrThrow(key, 'iv check')

    const result = await decryptMessage(key, alterSegment(ciphertext, 2))

    expect(result.ok).toBe(false)
  })

  it('fails on a truncated token', async () => {
    const key = makeKey()
    const ciphertext = await encryptOrThrow(key, 'cut short')
    const truncated = ciphertext.split('.').slice(0, 4).join('.')

    const result = await decryptMessage(key, truncated)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(CipherError)
  })

  it('fails on text that is not a token at all', async () => {
    const result = await decryptMessage(makeKey(), 'just some plaintext')
    expect(result.ok).toBe(false)
  })

  it('logs the failure at error level', async () => {
    const { logger, sink } = makeLogger()
    const result = await decryptMessage(makeKey(), 'garbage', logger)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toMatch(/^Decryption failed: /)
    expect(sink.messages('error')).toEqual([result.error.message])
  })
})

describe('unusable keys', () => {
  it('encrypt fails with a CipherError when the key has the wrong length', async () => {
    const { logger, sink } = makeLogger()
    const shortKey: KeyMaterial = { bytes: new Uint8Array(16), path: '/keys/short.key' }

    const result = await encryptMessage(shortKey, 'hello', logger)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(CipherError)
    expect(result.error.operation).toBe('encrypt')
    expect(result.error.message).toMatch(/^Encryption failed: /)
    expect(sink.messages('error')).toHaveLength(1)
  })
})
