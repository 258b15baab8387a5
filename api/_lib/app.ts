import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify'
import multipart from '@fastify/multipart'
import type { KitchenStorage } from '@infrastructure/storage.ts'
import type { TextExtractor } from '@infrastructure/ocr/tesseractOcr.ts'
import ingredientRoutes from '../ingredients.ts'
import recipeRoutes from '../recipes.ts'
import chatbotRoutes from '../chatbot.ts'
import { handleError } from './errors.ts'

const DEFAULT_MAX_UPLOAD_BYTES = 5 * 1024 * 1024 // 5MB

export interface AppDependencies {
  storage: KitchenStorage
  extractor: TextExtractor
  logger?: FastifyServerOptions['logger']
  maxUploadBytes?: number
}

export async function buildApp({
  storage,
  extractor,
  logger = false,
  maxUploadBytes = DEFAULT_MAX_UPLOAD_BYTES,
}: AppDependencies): Promise<FastifyInstance> {
  const app = Fastify({ logger, ignoreTrailingSlash: true })

  await app.register(multipart, { limits: { fileSize: maxUploadBytes, files: 1 } })
  app.setErrorHandler(handleError)

  app.get('/', async () => ({
    message: 'Welcome to Kitchen Buddy!',
    version: '1.0.0',
  }))

  await app.register(ingredientRoutes, { prefix: '/ingredients', storage })
  await app.register(recipeRoutes, { prefix: '/recipes', storage, extractor })
  await app.register(chatbotRoutes, { prefix: '/chatbot', storage })

  return app
}

/**
 * Open the storage and build the app on it. The app closes the storage when it
 * closes; if the app cannot be built, the storage is closed straight away.
 */
export async function startApp(
  storage: KitchenStorage,
  dependencies: Omit<AppDependencies, 'storage'>,
): Promise<FastifyInstance> {
  await storage.open()
  try {
    const app = await buildApp({ storage, ...dependencies })
    app.addHook('onClose', async () => {
      await storage.close()
    })
    return app
  } catch (err) {
    await storage.close()
    throw err
  }
}
