import { z } from 'zod'
import { ValidationError } from '@domain/errors.ts'

/** Parse `value` with `schema`, turning zod issues into a ValidationError with per-field messages. */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const result = schema.safeParse(value)
  if (result.success) return result.data

  const fields = result.error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : what,
    message: issue.message,
  }))
  throw new ValidationError(`Invalid ${what}`, fields)
}

const isoDate = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), { message: 'Invalid date' })
  .transform((v) => new Date(v).toISOString())

const listQuery = {
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
}

export const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
})

export const ingredientCreateSchema = z
  .object({
    name: z.string().trim().min(1),
    quantity: z.number().finite(),
    unit: z.string(),
    category: z.string().trim().min(1).nullable().optional(),
    expiry_date: isoDate.nullable().optional(),
  })
  .transform(({ expiry_date, ...rest }) => ({ ...rest, expiryDate: expiry_date }))

export const ingredientUpdateSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    quantity: z.number().finite().optional(),
    unit: z.string().optional(),
    category: z.string().trim().min(1).nullable().optional(),
    expiry_date: isoDate.nullable().optional(),
  })
  .transform(({ expiry_date, ...rest }) => ({ ...rest, expiryDate: expiry_date }))

export const ingredientListSchema = z.object({
  ...listQuery,
  category: z.string().min(1).optional(),
})

export const recipeCreateSchema = z
  .object({
    name: z.string().trim().min(1),
    cuisine_type: z.string().trim().min(1),
    preparation_time: z.number().int().min(0),
    difficulty_level: z.string().trim().min(1).optional(),
    taste_profile: z.string(),
    instructions: z.string(),
    ingredients_list: z.string(),
  })
  .transform((b) => ({
    name: b.name,
    cuisineType: b.cuisine_type,
    preparationTime: b.preparation_time,
    difficultyLevel: b.difficulty_level,
    tasteProfile: b.taste_profile,
    instructions: b.instructions,
    ingredientsList: b.ingredients_list,
  }))

export const recipeListSchema = z
  .object({
    ...listQuery,
    cuisine_type: z.string().min(1).optional(),
  })
  .transform(({ cuisine_type, ...rest }) => ({ ...rest, cuisineType: cuisine_type }))

/** Optional form fields sent alongside an uploaded recipe image. */
export const uploadFieldsSchema = z
  .object({
    cuisine_type: z.string().trim().min(1).optional(),
    preparation_time: z.coerce.number().int().min(0).optional(),
    taste_profile: z.string().trim().min(1).optional(),
    difficulty_level: z.string().trim().min(1).optional(),
  })
  .transform((f) => ({
    cuisineType: f.cuisine_type,
    preparationTime: f.preparation_time,
    tasteProfile: f.taste_profile,
    difficultyLevel: f.difficulty_level,
  }))

export const chatSchema = z.object({
  message: z.string(),
})
