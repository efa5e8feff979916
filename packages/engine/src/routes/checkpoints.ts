/**
 * Checkpoint REST Routes
 *
 * GET  /checkpoints?project=                 Pending checkpoints across all runs of a project
 * POST /checkpoints/:checkpointId/resolve    Record the human response
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify"

import type { EngineService } from "../service.js"
import { sendError } from "./error-reply.js"

interface ListQuery {
  project: string
}

interface ResolveParams {
  checkpointId: string
}

interface ResolveBody {
  response: string
}

export interface CheckpointRouteDeps {
  service: EngineService
}

export function checkpointRoutes(deps: CheckpointRouteDeps) {
  const { service } = deps

  return function register(app: FastifyInstance): void {
    app.get<{ Querystring: ListQuery }>(
      "/checkpoints",
      {
        schema: {
          querystring: {
            type: "object",
            properties: { project: { type: "string", minLength: 1 } },
            required: ["project"],
          },
        },
      },
      async (request: FastifyRequest<{ Querystring: ListQuery }>, reply: FastifyReply) => {
        const checkpoints = await service.listCheckpoints(request.query.project)
        return reply.send({ checkpoints })
      },
    )

    app.post<{ Params: ResolveParams; Body: ResolveBody }>(
      "/checkpoints/:checkpointId/resolve",
      {
        schema: {
          params: {
            type: "object",
            properties: { checkpointId: { type: "string", minLength: 1 } },
            required: ["checkpointId"],
          },
          body: {
            type: "object",
            properties: { response: { type: "string", minLength: 1 } },
            required: ["response"],
          },
        },
      },
      async (request: FastifyRequest<{ Params: ResolveParams; Body: ResolveBody }>, reply: FastifyReply) => {
        try {
          const resolved = await service.resolveCheckpoint(request.params.checkpointId, request.body.response)
          request.log.info({ checkpointId: resolved.checkpoint.id }, "Checkpoint resolved")
          return reply.send(resolved)
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )
  }
}
