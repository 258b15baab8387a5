import type { FastifyPluginAsync } from 'fastify'
import type { KitchenStorage } from '@infrastructure/storage.ts'
import { listIngredients } from '@infrastructure/db/index.ts'
import {
  idParamsSchema,
  ingredientCreateSchema,
  ingredientListSchema,
  ingredientUpdateSchema,
  parseWith,
} from './_lib/validation.ts'
import { toIngredientResponse } from './_lib/serialize.ts'

interface IngredientRoutesOptions {
  storage: KitchenStorage
}

const ingredientRoutes: FastifyPluginAsync<IngredientRoutesOptions> = async (fastify, { storage }) => {
  fastify.post('/', async (request, reply) => {
    const input = parseWith(ingredientCreateSchema, request.body, 'body')
    const ingredient = await storage.createIngredient(input)
    return reply.status(201).send(toIngredientResponse(ingredient))
  })

  fastify.get('/', async (request) => {
    const query = parseWith(ingredientListSchema, request.query, 'query')
    const ingredients = await listIngredients(storage.db, query)
    return ingredients.map(toIngredientResponse)
  })

  fastify.put('/:id', async (request) => {
    const { id } = parseWith(idParamsSchema, request.params, 'params')
    const patch = parseWith(ingredientUpdateSchema, request.body ?? {}, 'body')
    const ingredient = await storage.updateIngredient(id, patch)
    return toIngredientResponse(ingredient)
  })

  fastify.delete('/:id', async (request) => {
    const { id } = parseWith(idParamsSchema, request.params, 'params')
    await storage.deleteIngredient(id)
    return { message: 'Ingredient deleted successfully' }
  })
}

export default ingredientRoutes
