import type { Ingredient, IngredientPatch, NewIngredient } from '@domain/models/Ingredient.ts'
import type { NewRecipe, Recipe, RecipeSource } from '@domain/models/Recipe.ts'
import { StorageError, errorMessage } from '@domain/errors.ts'
import { formatRecipeLogEntry } from '@application/recipes/formatRecipeLogEntry.ts'
import {
  DatabaseFile,
  KitchenDB,
  type IndexedDbBackend,
  createIngredient,
  createRecipe,
  deleteIngredient,
  restoreSnapshot,
  takeSnapshot,
  updateIngredient,
} from './db/index.ts'
import { RecipeLog } from './log/recipeLog.ts'

export interface StorageOptions {
  dbName: string
  /** JSON file the tables are saved to after every write and restored from on open. */
  dbPath: string
  recipeLogPath: string
  backend?: IndexedDbBackend
}

/**
 * Owns the database connection, its file and the recipe log. Built once at
 * startup and handed to the routes; every write goes through here so the file
 * follows the tables.
 */
export class KitchenStorage {
  readonly db: KitchenDB
  readonly dbFile: DatabaseFile
  readonly recipeLog: RecipeLog

  constructor({ dbName, dbPath, recipeLogPath, backend }: StorageOptions) {
    this.db = new KitchenDB(dbName, backend)
    this.dbFile = new DatabaseFile(dbPath)
    this.recipeLog = new RecipeLog(recipeLogPath)
  }

  async open(): Promise<void> {
    try {
      await this.db.open()
    } catch (err) {
      throw new StorageError(`Failed to open database: ${errorMessage(err)}`, { cause: err })
    }

    try {
      const snapshot = await this.dbFile.load()
      if (snapshot) await restoreSnapshot(this.db, snapshot)
      await this.recipeLog.open()
    } catch (err) {
      this.db.close()
      throw err
    }
  }

  async close(): Promise<void> {
    await this.recipeLog.close()
    await this.dbFile.flush()
    this.db.close()
  }

  async createIngredient(input: NewIngredient): Promise<Ingredient> {
    const ingredient = await createIngredient(this.db, input)
    await this.persist()
    return ingredient
  }

  async updateIngredient(id: number, patch: IngredientPatch): Promise<Ingredient> {
    const ingredient = await updateIngredient(this.db, id, patch)
    await this.persist()
    return ingredient
  }

  async deleteIngredient(id: number): Promise<void> {
    await deleteIngredient(this.db, id)
    await this.persist()
  }

  /**
   * Insert the recipe, then mirror it to the recipe log. The row is committed
   * before the log write, so a log failure leaves the row in place.
   */
  async saveRecipe(input: NewRecipe, source: RecipeSource): Promise<Recipe> {
    const recipe = await createRecipe(this.db, input)
    await this.persist()
    await this.recipeLog.append(formatRecipeLogEntry(recipe, source))
    return recipe
  }

  private persist(): Promise<void> {
    return this.dbFile.save(() => takeSnapshot(this.db))
  }
}
