import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'

export function toIngredientResponse(ingredient: Ingredient) {
  return {
    id: ingredient.id,
    name: ingredient.name,
    quantity: ingredient.quantity,
    unit: ingredient.unit,
    category: ingredient.category,
    expiry_date: ingredient.expiryDate,
    last_updated: ingredient.lastUpdated,
  }
}

export function toRecipeResponse(recipe: Recipe) {
  return {
    id: recipe.id,
    name: recipe.name,
    cuisine_type: recipe.cuisineType,
    preparation_time: recipe.preparationTime,
    difficulty_level: recipe.difficultyLevel,
    taste_profile: recipe.tasteProfile,
    instructions: recipe.instructions,
    ingredients_list: recipe.ingredientsList,
    created_at: recipe.createdAt,
  }
}
