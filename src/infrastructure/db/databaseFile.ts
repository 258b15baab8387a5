import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { KitchenError, StorageError, errorMessage } from '@domain/errors.ts'
import { type DatabaseSnapshot, snapshotSchema } from './snapshot.ts'

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * JSON file holding the last saved state of the database. Saves run one at a
 * time in call order, and each replaces the file through a rename.
 */
export class DatabaseFile {
  readonly filePath: string
  private tail: Promise<void> = Promise.resolve()

  constructor(filePath: string) {
    this.filePath = filePath
  }

  /** The saved snapshot, or null when nothing has been saved yet. */
  async load(): Promise<DatabaseSnapshot | null> {
    let text: string
    try {
      text = await readFile(this.filePath, 'utf-8')
    } catch (err) {
      if (isNotFound(err)) return null
      throw new StorageError(`Failed to read database file: ${errorMessage(err)}`, { cause: err })
    }

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (err) {
      throw new StorageError(`Database file is not valid JSON: ${errorMessage(err)}`, { cause: err })
    }

    const parsed = snapshotSchema.safeParse(json)
    if (!parsed.success) {
      const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      throw new StorageError(`Database file is malformed: ${problems.join('; ')}`)
    }
    return parsed.data
  }

  /**
   * Queue a save. `take` runs when the save's turn comes, so the file always
   * ends up with the latest state.
   */
  save(take: () => Promise<DatabaseSnapshot>): Promise<void> {
    const write = this.tail.then(async () => {
      try {
        const snapshot = await take()
        const tmpPath = `${this.filePath}.tmp`
        await mkdir(path.dirname(this.filePath), { recursive: true })
        await writeFile(tmpPath, JSON.stringify(snapshot, null, 2), 'utf-8')
        await rename(tmpPath, this.filePath)
      } catch (err) {
        if (err instanceof KitchenError) throw err
        throw new StorageError(`Failed to save database file: ${errorMessage(err)}`, { cause: err })
      }
    })
    this.tail = write.catch(() => undefined)
    return write
  }

  /** Wait for queued saves. */
  async flush(): Promise<void> {
    await this.tail
  }
}
