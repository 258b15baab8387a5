import type { ChatTokens } from '@domain/models/Chat.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import { isTasteWord } from '@domain/constants/tastes.ts'
import { singularForms } from './singularize.ts'
import stopwordList from './stopwords.json'

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList)
const MIN_INGREDIENT_TOKEN = 3

/**
 * Split a chat message into taste words and candidate ingredient words.
 * Duplicates are dropped, first occurrence wins.
 */
export function tokenizeMessage(message: string): ChatTokens {
  const tastes = new Set<string>()
  const ingredients = new Set<string>()

  for (const token of message.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (!token) continue
    if (isTasteWord(token)) {
      tastes.add(token)
    } else if (token.length >= MIN_INGREDIENT_TOKEN && !STOPWORDS.has(token)) {
      ingredients.add(token)
    }
  }

  return { tastes: [...tastes], ingredients: [...ingredients] }
}

/**
 * Keep the recipes whose taste profile mentions any taste word of the message,
 * or whose ingredients list mentions any other word of it. Input order is
 * preserved; there is no ranking.
 */
export function matchRecipes(message: string, recipes: readonly Recipe[]): Recipe[] {
  const { tastes, ingredients } = tokenizeMessage(message)
  if (tastes.length === 0 && ingredients.length === 0) return []

  const ingredientForms = [...new Set(ingredients.flatMap((token) => [token, ...singularForms(token)]))]

  return recipes.filter((recipe) => {
    const taste = recipe.tasteProfile.toLowerCase()
    if (tastes.some((t) => taste.includes(t))) return true

    const list = recipe.ingredientsList.toLowerCase()
    return ingredientForms.some((form) => list.includes(form))
  })
}
