import { describe, it, expect } from 'vitest'
import { formatRecipeLogEntry } from '@application/recipes/formatRecipeLogEntry.ts'
import { parseTextRecipe } from '@application/extraction/parseTextRecipe.ts'
import type { Recipe } from '@domain/models/Recipe.ts'

const recipe: Recipe = {
  id: 7,
  name: 'Pancakes',
  cuisineType: 'American',
  preparationTime: 20,
  difficultyLevel: 'Easy',
  tasteProfile: 'Sweet',
  instructions: 'Mix.\nFry.',
  ingredientsList: 'flour, eggs, milk',
  createdAt: '2024-03-01T08:00:00.000Z',
}

describe('formatRecipeLogEntry', () => {
  it('renders a labelled block closed by a separator', () => {
    expect(formatRecipeLogEntry(recipe, 'api')).toBe(
      '\nRECIPE: Pancakes\n' +
        'Cuisine: American\n' +
        'Prep Time: 20 minutes\n' +
        'Difficulty: Easy\n' +
        'Taste: Sweet\n' +
        'Source: api\n' +
        'Ingredients:\nflour, eggs, milk\n' +
        'Instructions:\nMix.\nFry.\n' +
        '-'.repeat(50) +
        '\n',
    )
  })

  it('can be read back by the text parser', () => {
    const entry = formatRecipeLogEntry(recipe, 'image').replace('-'.repeat(50), '')

    expect(parseTextRecipe(entry)).toEqual({
      name: 'Pancakes',
      cuisineType: 'American',
      preparationTime: 20,
      difficultyLevel: 'Easy',
      tasteProfile: 'Sweet',
      ingredientsList: 'flour, eggs, milk',
      instructions: 'Mix.\nFry.',
    })
  })
})
