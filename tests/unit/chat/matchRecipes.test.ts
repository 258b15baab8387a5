import { describe, it, expect } from 'vitest'
import { matchRecipes, tokenizeMessage } from '@application/chat/matchRecipes.ts'
import { makeRecipe, sampleRecipes } from './fixtures.ts'

const names = (recipes: { name: string }[]) => recipes.map((r) => r.name)

describe('tokenizeMessage', () => {
  it('separates taste words from ingredient words and drops filler', () => {
    expect(tokenizeMessage('Sweet, SWEET chicken please!')).toEqual({
      tastes: ['sweet'],
      ingredients: ['chicken'],
    })
  })

  it('drops words shorter than three letters', () => {
    expect(tokenizeMessage('me an ox')).toEqual({ tastes: [], ingredients: [] })
  })
})

describe('matchRecipes', () => {
  it('returns exactly the recipes whose taste profile mentions the taste word', () => {
    expect(names(matchRecipes('Show me sweet recipes', sampleRecipes()))).toEqual([
      'Chocolate Cake',
      'Lemon Sorbet',
    ])
  })

  it('returns nothing for an empty message', () => {
    expect(matchRecipes('', sampleRecipes())).toEqual([])
    expect(matchRecipes('   ', sampleRecipes())).toEqual([])
  })

  it('returns nothing when no word is recognised', () => {
    expect(matchRecipes('hello there', sampleRecipes())).toEqual([])
  })

  it('matches ingredient words against the ingredients list', () => {
    expect(names(matchRecipes('I have chicken and rice', sampleRecipes()))).toEqual([
      'Chicken Curry',
      'Fried Rice',
    ])
  })

  it('treats several taste words as alternatives', () => {
    expect(names(matchRecipes('SPICY or sour please', sampleRecipes()))).toEqual([
      'Chicken Curry',
      'Lemon Sorbet',
    ])
  })

  it('finds singular ingredients from plural words', () => {
    const recipes = [
      makeRecipe({ name: 'Bruschetta', ingredientsList: 'tomato, basil, bread' }),
      makeRecipe({ name: 'Toast', ingredientsList: 'bread, butter' }),
    ]
    expect(names(matchRecipes('any recipes with tomatoes?', recipes))).toEqual(['Bruschetta'])
  })

  it('finds -ves plurals whose singular ends in e', () => {
    const recipes = [
      makeRecipe({ name: 'Aioli', ingredientsList: 'garlic clove, egg yolk, oil' }),
      makeRecipe({ name: 'Toast', ingredientsList: 'bread, butter' }),
      makeRecipe({ name: 'Tapenade', ingredientsList: 'olive, caper, anchovy' }),
    ]
    expect(names(matchRecipes('I have cloves and olives', recipes))).toEqual(['Aioli', 'Tapenade'])
  })

  it('does not match taste words against ingredients', () => {
    const recipes = [makeRecipe({ name: 'Mash', tasteProfile: 'Savory', ingredientsList: 'sweet potato, butter' })]
    expect(matchRecipes('something sweet', recipes)).toEqual([])
  })

  it('preserves the order of the input', () => {
    const reversed = sampleRecipes().reverse()
    expect(names(matchRecipes('sweet', reversed))).toEqual(['Lemon Sorbet', 'Chocolate Cake'])
  })
})
