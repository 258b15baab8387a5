export type RecipeSource = 'api' | 'image'

export interface Recipe {
  id: number
  name: string
  cuisineType: string
  preparationTime: number
  difficultyLevel: string
  tasteProfile: string
  instructions: string
  ingredientsList: string
  createdAt: string
}

export type NewRecipe = Omit<Recipe, 'id' | 'createdAt' | 'difficultyLevel'> & {
  difficultyLevel?: string
}

export interface RecipeQuery {
  skip?: number
  limit?: number
  cuisineType?: string
}

/**
 * Unpersisted recipe produced from OCR text. The optional metadata is only
 * present when the text carried labelled lines such as "Prep Time: 20 minutes".
 */
export interface RecipeDraft {
  name: string
  ingredientsList: string
  instructions: string
  cuisineType?: string
  preparationTime?: number
  difficultyLevel?: string
  tasteProfile?: string
}

export const DEFAULT_DIFFICULTY = 'Medium'
export const UNTITLED_RECIPE = 'Untitled Recipe'
