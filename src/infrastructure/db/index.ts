export { KitchenDB, withStorage } from './database.ts'
export type { IndexedDbBackend } from './database.ts'
export { DatabaseFile } from './databaseFile.ts'
export { takeSnapshot, restoreSnapshot } from './snapshot.ts'
export type { DatabaseSnapshot } from './snapshot.ts'
export {
  createIngredient,
  listIngredients,
  getAllIngredients,
  updateIngredient,
  deleteIngredient,
} from './ingredientRepository.ts'
export { createRecipe, listRecipes, getAllRecipes } from './recipeRepository.ts'
