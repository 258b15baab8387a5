import type { FastifyPluginAsync, FastifyRequest } from 'fastify'
import type { KitchenStorage } from '@infrastructure/storage.ts'
import type { TextExtractor } from '@infrastructure/ocr/tesseractOcr.ts'
import { listRecipes } from '@infrastructure/db/index.ts'
import { parseTextRecipe } from '@application/extraction/parseTextRecipe.ts'
import { DEFAULT_DIFFICULTY } from '@domain/models/Recipe.ts'
import { ValidationError } from '@domain/errors.ts'
import { parseWith, recipeCreateSchema, recipeListSchema, uploadFieldsSchema } from './_lib/validation.ts'
import { toRecipeResponse } from './_lib/serialize.ts'

const UNSPECIFIED = 'Unspecified'

interface RecipeRoutesOptions {
  storage: KitchenStorage
  extractor: TextExtractor
}

interface ImageUpload {
  image: Buffer | null
  mimetype: string
  fields: Record<string, string>
}

async function readImageUpload(request: FastifyRequest): Promise<ImageUpload> {
  if (!request.isMultipart()) {
    throw new ValidationError('Request must be multipart/form-data', [
      { field: 'file', message: 'An image file is required' },
    ])
  }

  const upload: ImageUpload = { image: null, mimetype: '', fields: {} }
  for await (const part of request.parts()) {
    if (part.type === 'file') {
      // Drain every file part so the stream can finish; only the first is used.
      const buffer = await part.toBuffer()
      if (upload.image === null && part.fieldname === 'file') {
        upload.image = buffer
        upload.mimetype = part.mimetype
      }
    } else if (typeof part.value === 'string') {
      upload.fields[part.fieldname] = part.value
    }
  }
  return upload
}

const recipeRoutes: FastifyPluginAsync<RecipeRoutesOptions> = async (fastify, { storage, extractor }) => {
  fastify.post('/', async (request, reply) => {
    const input = parseWith(recipeCreateSchema, request.body, 'body')
    const recipe = await storage.saveRecipe(input, 'api')
    return reply.status(201).send(toRecipeResponse(recipe))
  })

  fastify.get('/', async (request) => {
    const query = parseWith(recipeListSchema, request.query, 'query')
    const recipes = await listRecipes(storage.db, query)
    return recipes.map(toRecipeResponse)
  })

  fastify.post('/upload-image', async (request, reply) => {
    const upload = await readImageUpload(request)
    if (upload.image === null) {
      throw new ValidationError('Missing image file', [{ field: 'file', message: 'An image file is required' }])
    }
    if (!upload.mimetype.startsWith('image/')) {
      throw new ValidationError('File must be an image', [{ field: 'file', message: 'File must be an image' }])
    }
    const overrides = parseWith(uploadFieldsSchema, upload.fields, 'fields')

    const text = await extractor.extractText(upload.image)
    const draft = parseTextRecipe(text)
    request.log.info({ name: draft.name, characters: text.length }, 'Parsed recipe from image')

    const recipe = await storage.saveRecipe(
      {
        name: draft.name,
        cuisineType: overrides.cuisineType ?? draft.cuisineType ?? UNSPECIFIED,
        preparationTime: overrides.preparationTime ?? draft.preparationTime ?? 0,
        difficultyLevel: overrides.difficultyLevel ?? draft.difficultyLevel ?? DEFAULT_DIFFICULTY,
        tasteProfile: overrides.tasteProfile ?? draft.tasteProfile ?? UNSPECIFIED,
        instructions: draft.instructions,
        ingredientsList: draft.ingredientsList,
      },
      'image',
    )

    return reply.status(201).send({
      message: 'Recipe image processed and saved successfully',
      extracted_text: text,
      recipe: toRecipeResponse(recipe),
    })
  })
}

export default recipeRoutes
