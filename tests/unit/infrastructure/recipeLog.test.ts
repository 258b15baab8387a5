import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { RecipeLog } from '@infrastructure/log/recipeLog.ts'
import { RECIPE_LOG_HEADER } from '@application/recipes/formatRecipeLogEntry.ts'
import { StorageError } from '@domain/errors.ts'

let dir: string
let logPath: string

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'recipe-log-'))
  logPath = path.join(dir, 'recipes', 'favorite_recipes.txt')
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('RecipeLog', () => {
  it('creates the directory and writes the header on open', async () => {
    const log = new RecipeLog(logPath)
    await log.open()

    expect(await readFile(logPath, 'utf-8')).toBe(RECIPE_LOG_HEADER)
  })

  it('keeps existing content when opened again', async () => {
    await mkdir(path.dirname(logPath), { recursive: true })
    await writeFile(logPath, 'earlier entries\n')

    const log = new RecipeLog(logPath)
    await log.open()

    expect(await readFile(logPath, 'utf-8')).toBe('earlier entries\n')
  })

  it('writes concurrent appends in call order', async () => {
    const log = new RecipeLog(logPath)
    await log.open()

    await Promise.all([log.append('one\n'), log.append('two\n'), log.append('three\n')])

    expect(await readFile(logPath, 'utf-8')).toBe(`${RECIPE_LOG_HEADER}one\ntwo\nthree\n`)
  })

  it('rejects a failed write and keeps accepting later ones', async () => {
    const log = new RecipeLog(logPath)
    await log.open()
    await rm(path.dirname(logPath), { recursive: true })

    await expect(log.append('lost\n')).rejects.toBeInstanceOf(StorageError)

    await mkdir(path.dirname(logPath), { recursive: true })
    await log.append('kept\n')
    expect(await readFile(logPath, 'utf-8')).toBe('kept\n')
  })

  it('waits for pending writes on close and refuses new ones', async () => {
    const log = new RecipeLog(logPath)
    await log.open()

    const pending = log.append('last\n')
    await log.close()
    await pending

    expect(await readFile(logPath, 'utf-8')).toBe(`${RECIPE_LOG_HEADER}last\n`)
    await expect(log.append('late\n')).rejects.toThrow('Recipe log is closed')
  })

  it('reports a path that cannot be created', async () => {
    const blocker = path.join(dir, 'blocker')
    await writeFile(blocker, '')

    const log = new RecipeLog(path.join(blocker, 'nested', 'log.txt'))
    await expect(log.open()).rejects.toBeInstanceOf(StorageError)
  })
})
