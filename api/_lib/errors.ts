import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify'
import { KitchenError, ValidationError } from '@domain/errors.ts'

/** Every failure leaves as `{ error }`, with `fields` added for validation failures. */
export function handleError(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof ValidationError) {
    request.log.info({ fields: error.fields }, error.message)
    return reply.status(error.statusCode).send({ error: error.message, fields: error.fields })
  }

  if (error instanceof KitchenError) {
    if (error.statusCode >= 500) {
      request.log.error({ err: error }, error.message)
    } else {
      request.log.warn(error.message)
    }
    return reply.status(error.statusCode).send({ error: error.message })
  }

  // Framework errors: malformed JSON, oversized upload, unsupported media type
  if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
    request.log.info({ code: error.code }, error.message)
    return reply.status(error.statusCode).send({ error: error.message })
  }

  request.log.error({ err: error }, 'Unhandled error')
  return reply.status(500).send({ error: 'Internal server error' })
}
