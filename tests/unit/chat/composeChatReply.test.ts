import { describe, it, expect } from 'vitest'
import { CHAT_HINT, composeChatReply } from '@application/chat/composeChatReply.ts'
import type { Ingredient } from '@domain/models/Ingredient.ts'
import { sampleRecipes } from './fixtures.ts'

function pantryItem(name: string): Ingredient {
  return { id: 1, name, quantity: 1, unit: 'kg', category: null, expiryDate: null, lastUpdated: '2024-01-01T00:00:00.000Z' }
}

describe('composeChatReply', () => {
  const [cake, curry, , rice] = sampleRecipes()

  it('describes a single match', () => {
    expect(composeChatReply({ message: 'sweet', matches: [cake], pantry: [] })).toBe(
      'I found 1 recipe matching sweet: Chocolate Cake.',
    )
  })

  it('lists every match and the words that were searched', () => {
    expect(
      composeChatReply({ message: 'I have chicken and rice', matches: [curry, rice], pantry: [] }),
    ).toBe('I found 2 recipes matching chicken, rice: Chicken Curry, Fried Rice.')
  })

  it('lists the pantry when asked about available ingredients', () => {
    const pantry = [pantryItem('flour'), pantryItem('eggs')]
    expect(composeChatReply({ message: 'What ingredients are available?', matches: [], pantry })).toBe(
      'You currently have: flour, eggs.',
    )
  })

  it('says so when the pantry is empty', () => {
    expect(composeChatReply({ message: 'what is in my pantry', matches: [], pantry: [] })).toBe(
      'Your pantry is empty. Add some ingredients first.',
    )
  })

  it('falls back to a hint', () => {
    expect(composeChatReply({ message: 'hello', matches: [], pantry: [] })).toBe(CHAT_HINT)
  })
})
