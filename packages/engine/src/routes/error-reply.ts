import { PlanValidationError } from "@waveline/shared/plan"
import type { FastifyReply } from "fastify"

import { ConflictError, NotFoundError } from "../errors.js"

/**
 * Map engine errors to HTTP: plan validation 400, missing records 404,
 * invalid transitions and double resolution 409. Anything else is
 * rethrown for Fastify's default 500 handler.
 */
export function sendError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof PlanValidationError) {
    return reply.status(400).send({ error: "invalid_plan", message: err.message, details: err.errors })
  }
  if (err instanceof NotFoundError) {
    return reply.status(404).send({ error: "not_found", message: err.message })
  }
  if (err instanceof ConflictError) {
    return reply.status(409).send({ error: "conflict", message: err.message })
  }
  throw err
}
