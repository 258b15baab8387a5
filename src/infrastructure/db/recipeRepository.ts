import { DEFAULT_DIFFICULTY, type NewRecipe, type Recipe, type RecipeQuery } from '@domain/models/Recipe.ts'
import { type KitchenDB, withStorage } from './database.ts'

const DEFAULT_LIMIT = 100

export async function createRecipe(db: KitchenDB, input: NewRecipe): Promise<Recipe> {
  return withStorage('create recipe', () =>
    db.transaction('rw', db.recipes, async () => {
      const row = {
        name: input.name,
        cuisineType: input.cuisineType,
        preparationTime: input.preparationTime,
        difficultyLevel: input.difficultyLevel ?? DEFAULT_DIFFICULTY,
        tasteProfile: input.tasteProfile,
        instructions: input.instructions,
        ingredientsList: input.ingredientsList,
        createdAt: new Date().toISOString(),
      }
      const id = await db.recipes.add(row)
      return { ...row, id }
    }),
  )
}

export async function listRecipes(db: KitchenDB, query: RecipeQuery = {}): Promise<Recipe[]> {
  const { skip = 0, limit = DEFAULT_LIMIT, cuisineType } = query
  return withStorage('list recipes', () => {
    const rows = cuisineType
      ? db.recipes.where('cuisineType').equals(cuisineType)
      : db.recipes.toCollection()
    return rows.offset(skip).limit(limit).toArray()
  })
}

/** Every stored recipe in insertion order. */
export async function getAllRecipes(db: KitchenDB): Promise<Recipe[]> {
  return withStorage('list recipes', () => db.recipes.toArray())
}
