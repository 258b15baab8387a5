import type { Recipe } from '@domain/models/Recipe.ts'

let nextId = 1

export function makeRecipe(overrides: Partial<Recipe>): Recipe {
  return {
    id: nextId++,
    name: 'Test Recipe',
    cuisineType: 'Test',
    preparationTime: 10,
    difficultyLevel: 'Medium',
    tasteProfile: 'Mild',
    instructions: 'Cook.',
    ingredientsList: '',
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  }
}

export function sampleRecipes(): Recipe[] {
  return [
    makeRecipe({ name: 'Chocolate Cake', tasteProfile: 'Sweet', ingredientsList: 'flour, sugar, cocoa' }),
    makeRecipe({ name: 'Chicken Curry', tasteProfile: 'Spicy', ingredientsList: 'chicken, rice, curry paste' }),
    makeRecipe({ name: 'Lemon Sorbet', tasteProfile: 'Sweet and Sour', ingredientsList: 'lemons, sugar, water' }),
    makeRecipe({ name: 'Fried Rice', tasteProfile: 'Savory', ingredientsList: 'rice, eggs, soy sauce' }),
  ]
}
