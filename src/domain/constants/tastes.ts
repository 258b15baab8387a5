/** Taste descriptors the chatbot recognises; matched against a recipe's taste profile. */
export const TASTE_WORDS = [
  'sweet',
  'spicy',
  'sour',
  'savory',
  'savoury',
  'salty',
  'bitter',
  'umami',
  'tangy',
  'smoky',
] as const

export type TasteWord = (typeof TASTE_WORDS)[number]

const TASTE_SET: ReadonlySet<string> = new Set(TASTE_WORDS)

export function isTasteWord(token: string): token is TasteWord {
  return TASTE_SET.has(token)
}
