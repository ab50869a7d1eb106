import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { StateFileError } from '../../shared/lib/errors'
import { type LoadedState, parseStateFile, serializeState } from '../../shared/lib/state-file'
import type { PersistedScores } from '../../shared/lib/snapshot'

export interface StateStore {
  load(): Promise<LoadedState>
  save(scores: PersistedScores): Promise<void>
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * JSON state beside the Clone Hero data. Writes go to a temp file that is
 * renamed over the target, so a crash never leaves a half-written state.
 */
export class FileStateStore implements StateStore {
  constructor(
    private readonly filePath: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async load(): Promise<LoadedState> {
    let text: string
    try {
      text = await readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isNotFound(error)) return { kind: 'empty' }
      throw new StateFileError(`Unable to read state file ${this.filePath}`, {
        path: this.filePath,
        cause: error,
      })
    }
    return parseStateFile(text, this.filePath)
  }

  async save(scores: PersistedScores): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true })
      await writeFile(tempPath, serializeState(scores, this.clock()), 'utf8')
      await rename(tempPath, this.filePath)
    } catch (error) {
      throw new StateFileError(`Unable to write state file ${this.filePath}`, {
        path: this.filePath,
        cause: error,
      })
    }
  }
}
