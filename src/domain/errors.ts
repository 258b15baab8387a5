export interface FieldIssue {
  field: string
  message: string
}

/** Base for every error the HTTP layer knows how to turn into a response. */
export class KitchenError extends Error {
  readonly statusCode: number

  constructor(message: string, statusCode: number, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.statusCode = statusCode
  }
}

export class ValidationError extends KitchenError {
  readonly fields: FieldIssue[]

  constructor(message: string, fields: FieldIssue[] = []) {
    super(message, 400)
    this.fields = fields
  }
}

export class NotFoundError extends KitchenError {
  constructor(message: string) {
    super(message, 404)
  }
}

export class ExtractionError extends KitchenError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 422, options)
  }
}

export class StorageError extends KitchenError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 500, options)
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error'
}
