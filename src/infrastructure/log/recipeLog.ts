import { appendFile, mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { StorageError, errorMessage } from '@domain/errors.ts'
import { RECIPE_LOG_HEADER } from '@application/recipes/formatRecipeLogEntry.ts'

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST'
}

/**
 * Append-only text mirror of created recipes. Writes are serialised through a
 * single queue so concurrent requests never interleave their entries.
 */
export class RecipeLog {
  readonly filePath: string
  private tail: Promise<void> = Promise.resolve()
  private closed = false

  constructor(filePath: string) {
    this.filePath = filePath
  }

  async open(): Promise<void> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true })
    } catch (err) {
      throw new StorageError(`Failed to open recipe log: ${errorMessage(err)}`, { cause: err })
    }

    try {
      await writeFile(this.filePath, RECIPE_LOG_HEADER, { encoding: 'utf-8', flag: 'wx' })
    } catch (err) {
      if (!isAlreadyExists(err)) {
        throw new StorageError(`Failed to open recipe log: ${errorMessage(err)}`, { cause: err })
      }
    }
    this.closed = false
  }

  append(entry: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new StorageError('Recipe log is closed'))
    }

    const write = this.tail.then(async () => {
      try {
        await appendFile(this.filePath, entry, 'utf-8')
      } catch (err) {
        throw new StorageError(`Failed to write recipe log: ${errorMessage(err)}`, { cause: err })
      }
    })
    // A failed write is reported to its caller only; the queue carries on.
    this.tail = write.catch(() => undefined)
    return write
  }

  /** Wait for queued writes, then refuse new ones. */
  async close(): Promise<void> {
    this.closed = true
    await this.tail
  }
}
