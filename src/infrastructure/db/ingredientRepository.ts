import type { Ingredient, IngredientPatch, IngredientQuery, NewIngredient } from '@domain/models/Ingredient.ts'
import { NotFoundError } from '@domain/errors.ts'
import { type KitchenDB, withStorage } from './database.ts'

const DEFAULT_LIMIT = 100

export async function createIngredient(db: KitchenDB, input: NewIngredient): Promise<Ingredient> {
  return withStorage('create ingredient', () =>
    db.transaction('rw', db.ingredients, async () => {
      const row = {
        name: input.name,
        quantity: input.quantity,
        unit: input.unit,
        category: input.category ?? null,
        expiryDate: input.expiryDate ?? null,
        lastUpdated: new Date().toISOString(),
      }
      const id = await db.ingredients.add(row)
      return { ...row, id }
    }),
  )
}

export async function listIngredients(db: KitchenDB, query: IngredientQuery = {}): Promise<Ingredient[]> {
  const { skip = 0, limit = DEFAULT_LIMIT, category } = query
  return withStorage('list ingredients', () => {
    const rows = category
      ? db.ingredients.where('category').equals(category)
      : db.ingredients.toCollection()
    return rows.offset(skip).limit(limit).toArray()
  })
}

export async function getAllIngredients(db: KitchenDB): Promise<Ingredient[]> {
  return withStorage('list ingredients', () => db.ingredients.toArray())
}

export async function updateIngredient(
  db: KitchenDB,
  id: number,
  patch: IngredientPatch,
): Promise<Ingredient> {
  return withStorage('update ingredient', () =>
    db.transaction('rw', db.ingredients, async () => {
      const existing = await db.ingredients.get(id)
      if (!existing) throw new NotFoundError('Ingredient not found')

      const updated: Ingredient = {
        id: existing.id,
        name: patch.name ?? existing.name,
        quantity: patch.quantity ?? existing.quantity,
        unit: patch.unit ?? existing.unit,
        category: patch.category !== undefined ? patch.category : existing.category,
        expiryDate: patch.expiryDate !== undefined ? patch.expiryDate : existing.expiryDate,
        lastUpdated: new Date().toISOString(),
      }
      await db.ingredients.put(updated)
      return updated
    }),
  )
}

export async function deleteIngredient(db: KitchenDB, id: number): Promise<void> {
  await withStorage('delete ingredient', () =>
    db.transaction('rw', db.ingredients, async () => {
      const existing = await db.ingredients.get(id)
      if (!existing) throw new NotFoundError('Ingredient not found')
      await db.ingredients.delete(id)
    }),
  )
}
