/**
 * Disposable scratch directory for file-based tests.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'

/**
 * A temporary directory under the OS temp dir.
 *
 * @example
 * ```ts
 * const ws = await TempWorkspace.create()
 * await ws.write('note.txt', 'hello')
 * const result = await encryptFile({ keyPath: ws.path('k.key'), messagePath: ws.path('note.txt'), outputDir: ws.root })
 * await ws.dispose()
 * ```
 *
 * @public
 */
export class TempWorkspace {
  /** Absolute path of the directory. */
  readonly root: string

  private constructor(root: string) {
    this.root = root
  }

  static async create(prefix = 'keyseal-test-'): Promise<TempWorkspace> {
    // realpath so paths compare equal to what a child process sees as its cwd
    const root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)))
    return new TempWorkspace(root)
  }

  /** Absolute path of `segments` inside the workspace. */
  path(...segments: string[]): string {
    return path.join(this.root, ...segments)
  }

  /** Write a file, creating parent directories. Returns its absolute path. */
  async write(name: string, content: string | Uint8Array): Promise<string> {
    const target = this.path(name)
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, content)
    return target
  }

  read(name: string): Promise<string> {
    return fs.readFile(this.path(name), 'utf8')
  }

  async readBytes(name: string): Promise<Uint8Array> {
    return new Uint8Array(await fs.readFile(this.path(name)))
  }

  async exists(name: string): Promise<boolean> {
    try {
      await fs.access(this.path(name))
      return true
    } catch {
      return false
    }
  }

  /** Sorted entry names at the workspace root. */
  async list(): Promise<string[]> {
    return (await fs.readdir(this.root)).sort()
  }

  async dispose(): Promise<void> {
    await fs.rm(this.root, { recursive: true, force: true })
  }
}
