import Dexie, { type EntityTable } from 'dexie'
import { IDBKeyRange, indexedDB } from 'fake-indexeddb'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import { KitchenError, StorageError, errorMessage } from '@domain/errors.ts'

type DexieOptions = NonNullable<ConstructorParameters<typeof Dexie>[1]>

/** The IndexedDB implementation Dexie runs on. Node has none built in. */
export type IndexedDbBackend = Required<Pick<DexieOptions, 'indexedDB' | 'IDBKeyRange'>>

const inProcessBackend: IndexedDbBackend = { indexedDB, IDBKeyRange }

export class KitchenDB extends Dexie {
  ingredients!: EntityTable<Ingredient, 'id'>
  recipes!: EntityTable<Recipe, 'id'>

  constructor(name: string, backend: IndexedDbBackend = inProcessBackend) {
    super(name, { ...backend, autoOpen: false })

    this.version(1).stores({
      ingredients: '++id, name, category',
      recipes: '++id, name, cuisineType',
    })
  }
}

/** Run a database operation, reporting anything but a domain error as a StorageError. */
export async function withStorage<T>(action: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run()
  } catch (err) {
    if (err instanceof KitchenError) throw err
    throw new StorageError(`Failed to ${action}: ${errorMessage(err)}`, { cause: err })
  }
}
