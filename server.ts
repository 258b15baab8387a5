import 'dotenv/config'
import { loadConfig } from '@infrastructure/config.ts'
import { KitchenStorage } from '@infrastructure/storage.ts'
import { TesseractTextExtractor } from '@infrastructure/ocr/tesseractOcr.ts'
import { startApp } from './api/_lib/app.ts'

const config = loadConfig()

const storage = new KitchenStorage({
  dbName: config.dbName,
  dbPath: config.dbPath,
  recipeLogPath: config.recipeLogPath,
})

const app = await startApp(storage, {
  extractor: new TesseractTextExtractor({ lang: config.ocrLang, langPath: config.ocrLangPath }),
  logger: { level: config.logLevel },
  maxUploadBytes: config.maxUploadBytes,
})

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, 'Shutting down')
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Shutdown failed')
        process.exit(1)
      },
    )
  })
}

try {
  await app.listen({ port: config.port, host: config.host })
} catch (err) {
  app.log.error({ err }, 'Failed to start')
  await app.close()
  process.exit(1)
}
app.log.info({ database: config.dbPath, recipeLog: config.recipeLogPath }, 'Kitchen Buddy ready')
