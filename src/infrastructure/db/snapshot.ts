import { z } from 'zod'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import { type KitchenDB, withStorage } from './database.ts'

export interface DatabaseSnapshot {
  version: 1
  savedAt: string
  ingredients: Ingredient[]
  recipes: Recipe[]
}

const ingredientRowSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  quantity: z.number(),
  unit: z.string(),
  category: z.string().nullable(),
  expiryDate: z.string().nullable(),
  lastUpdated: z.string(),
})

const recipeRowSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  cuisineType: z.string(),
  preparationTime: z.number().int(),
  difficultyLevel: z.string(),
  tasteProfile: z.string(),
  instructions: z.string(),
  ingredientsList: z.string(),
  createdAt: z.string(),
})

export const snapshotSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  ingredients: z.array(ingredientRowSchema),
  recipes: z.array(recipeRowSchema),
})

export function buildSnapshot(ingredients: Ingredient[], recipes: Recipe[]): DatabaseSnapshot {
  return {
    version: 1,
    savedAt: new Date().toISOString(),
    ingredients,
    recipes,
  }
}

/** Read both tables in one transaction so the snapshot is consistent. */
export async function takeSnapshot(db: KitchenDB): Promise<DatabaseSnapshot> {
  return withStorage('read database', () =>
    db.transaction('r', db.ingredients, db.recipes, async () =>
      buildSnapshot(await db.ingredients.toArray(), await db.recipes.toArray()),
    ),
  )
}

/**
 * Replace the contents of both tables with the snapshot. Rows keep their ids,
 * and new rows are numbered after the highest restored id.
 */
export async function restoreSnapshot(db: KitchenDB, snapshot: DatabaseSnapshot): Promise<void> {
  await withStorage('restore database', () =>
    db.transaction('rw', db.ingredients, db.recipes, async () => {
      await db.ingredients.clear()
      await db.recipes.clear()
      await db.ingredients.bulkAdd(snapshot.ingredients)
      await db.recipes.bulkAdd(snapshot.recipes)
    }),
  )
}
