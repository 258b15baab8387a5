import type { FastifyPluginAsync } from 'fastify'
import type { KitchenStorage } from '@infrastructure/storage.ts'
import { getAllIngredients, getAllRecipes } from '@infrastructure/db/index.ts'
import { matchRecipes } from '@application/chat/matchRecipes.ts'
import { composeChatReply } from '@application/chat/composeChatReply.ts'
import { chatSchema, parseWith } from './_lib/validation.ts'
import { toRecipeResponse } from './_lib/serialize.ts'

interface ChatbotRoutesOptions {
  storage: KitchenStorage
}

const chatbotRoutes: FastifyPluginAsync<ChatbotRoutesOptions> = async (fastify, { storage }) => {
  fastify.post('/chat', async (request) => {
    const { message } = parseWith(chatSchema, request.body, 'body')

    const [recipes, pantry] = await Promise.all([
      getAllRecipes(storage.db),
      getAllIngredients(storage.db),
    ])
    const matches = matchRecipes(message, recipes)

    return {
      response: composeChatReply({ message, matches, pantry }),
      recipes: matches.map(toRecipeResponse),
    }
  })
}

export default chatbotRoutes
