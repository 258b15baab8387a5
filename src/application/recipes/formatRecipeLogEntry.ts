import type { Recipe, RecipeSource } from '@domain/models/Recipe.ts'

export const RECIPE_LOG_HEADER = '# Kitchen Buddy - Recipe Collection\n\n'

const SEPARATOR = '-'.repeat(50)

/** Render one recipe as a plain-text block for the recipe log. */
export function formatRecipeLogEntry(recipe: Recipe, source: RecipeSource): string {
  return [
    '',
    `RECIPE: ${recipe.name}`,
    `Cuisine: ${recipe.cuisineType}`,
    `Prep Time: ${recipe.preparationTime} minutes`,
    `Difficulty: ${recipe.difficultyLevel}`,
    `Taste: ${recipe.tasteProfile}`,
    `Source: ${source}`,
    'Ingredients:',
    recipe.ingredientsList,
    'Instructions:',
    recipe.instructions,
    SEPARATOR,
    '',
  ].join('\n')
}
