import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { Recipe } from '@domain/models/Recipe.ts'
import { tokenizeMessage } from './matchRecipes.ts'

const PANTRY_QUESTION = /\b(available|pantry|ingredients?|have)\b/i

export const CHAT_HINT =
  'I can help you find recipes by taste or by what you have on hand. ' +
  'Try something like "show me sweet recipes" or "I have chicken and rice".'

interface ChatReplyInput {
  message: string
  matches: readonly Recipe[]
  pantry: readonly Ingredient[]
}

export function composeChatReply({ message, matches, pantry }: ChatReplyInput): string {
  if (matches.length > 0) {
    const { tastes, ingredients } = tokenizeMessage(message)
    const terms = [...tastes, ...ingredients].join(', ')
    const noun = matches.length === 1 ? 'recipe' : 'recipes'
    const names = matches.map((r) => r.name).join(', ')
    return `I found ${matches.length} ${noun} matching ${terms}: ${names}.`
  }

  if (PANTRY_QUESTION.test(message)) {
    if (pantry.length === 0) return 'Your pantry is empty. Add some ingredients first.'
    return `You currently have: ${pantry.map((i) => i.name).join(', ')}.`
  }

  return CHAT_HINT
}
