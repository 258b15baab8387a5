export interface Ingredient {
  id: number
  name: string
  quantity: number
  unit: string
  category: string | null
  expiryDate: string | null
  lastUpdated: string
}

export type NewIngredient = Omit<Ingredient, 'id' | 'lastUpdated' | 'category' | 'expiryDate'> & {
  category?: string | null
  expiryDate?: string | null
}

/** Only the supplied fields are written; `lastUpdated` is refreshed on every update. */
export type IngredientPatch = Partial<Omit<Ingredient, 'id' | 'lastUpdated'>>

export interface IngredientQuery {
  skip?: number
  limit?: number
  category?: string
}
