import { z } from 'zod'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DB_NAME: z.string().min(1).default('kitchen-buddy'),
  DB_PATH: z.string().min(1).default('data/kitchen-buddy.json'),
  RECIPE_LOG_PATH: z.string().min(1).default('recipes/favorite_recipes.txt'),
  OCR_LANG: z.string().min(1).default('eng'),
  OCR_LANG_PATH: z.string().min(1).optional(),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
}).superRefine((c, ctx) => {
  // Only English ships with the install; any other language needs local data.
  if (c.OCR_LANG !== 'eng' && !c.OCR_LANG_PATH) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['OCR_LANG_PATH'], message: `Required for OCR_LANG ${c.OCR_LANG}` })
  }
})

export interface AppConfig {
  port: number
  host: string
  logLevel: (typeof LOG_LEVELS)[number]
  dbName: string
  dbPath: string
  recipeLogPath: string
  ocrLang: string
  ocrLangPath?: string
  maxUploadBytes: number
}

/** Read settings from the environment. Throws with every invalid variable listed. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new Error(`Invalid configuration: ${problems.join('; ')}`)
  }

  const c = parsed.data
  return {
    port: c.PORT,
    host: c.HOST,
    logLevel: c.LOG_LEVEL,
    dbName: c.DB_NAME,
    dbPath: c.DB_PATH,
    recipeLogPath: c.RECIPE_LOG_PATH,
    ocrLang: c.OCR_LANG,
    ocrLangPath: c.OCR_LANG_PATH,
    maxUploadBytes: c.MAX_UPLOAD_BYTES,
  }
}
