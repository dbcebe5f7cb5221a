import fs from 'fs/promises'
import path from 'path'
import { ReasonedError } from '@freeroute/reasons'
import { CheckpointStore } from './CheckpointStore'

/** Checkpoints as files under a base directory. Parent directories are created on save. */
export class FileCheckpointStore implements CheckpointStore {
  readonly baseDir: string

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir)
  }

  async save(key: string, data: Uint8Array): Promise<void> {
    const file = this.resolve(key)
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(file, data)
  }

  async load(key: string): Promise<Uint8Array | undefined> {
    const file = this.resolve(key)
    try {
      return await fs.readFile(file)
    } catch (e) {
      if (isNotFound(e)) return undefined
      throw e
    }
  }

  private resolve(key: string): string {
    const file = path.resolve(this.baseDir, key)
    const rel = path.relative(this.baseDir, file)
    if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) {
      throw ReasonedError.of('CHECKPOINT_INVALID_KEY', { context: { key } })
    }
    return file
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}

export default FileCheckpointStore
