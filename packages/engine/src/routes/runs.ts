/**
 * Run REST Routes
 *
 * POST /runs                               Start a run for a plan document
 * GET  /runs                               List runs, newest first (?project=)
 * GET  /runs/:runId                        The run record
 * POST /runs/:runId/resume                 Rehydrate a run and report its next step
 * POST /runs/:runId/execute                Drive the wave runner until the run halts
 * GET  /runs/:runId/next-step              Next ready step, or null
 * POST /runs/:runId/steps/:stepId          Mark a step started/completed/failed/skipped
 * POST /runs/:runId/steps/:stepId/verify   Verify one step
 * POST /runs/:runId/verify                 Run-level verification
 * GET  /runs/:runId/progress               Step counts and run status
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify"

import { MARK_ACTIONS, type EngineService, type MarkAction } from "../service.js"
import { sendError } from "./error-reply.js"

// ---------------------------------------------------------------------------
// Route types
// ---------------------------------------------------------------------------

interface RunParams {
  runId: string
}

interface StepParams extends RunParams {
  stepId: string
}

interface StartRunBody {
  plan: Record<string, unknown>
  project: string
}

interface ListRunsQuery {
  project?: string
}

interface MarkStepBody {
  action: MarkAction
  output?: string
  error?: string
}

const runParamsSchema = {
  type: "object",
  properties: { runId: { type: "string", minLength: 1 } },
  required: ["runId"],
} as const

const stepParamsSchema = {
  type: "object",
  properties: {
    runId: { type: "string", minLength: 1 },
    stepId: { type: "string", minLength: 1 },
  },
  required: ["runId", "stepId"],
} as const

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export interface RunRouteDeps {
  service: EngineService
}

export function runRoutes(deps: RunRouteDeps) {
  const { service } = deps

  return function register(app: FastifyInstance): void {
    app.post<{ Body: StartRunBody }>(
      "/runs",
      {
        schema: {
          body: {
            type: "object",
            properties: {
              plan: { type: "object" },
              project: { type: "string", minLength: 1 },
            },
            required: ["plan", "project"],
          },
        },
      },
      async (request: FastifyRequest<{ Body: StartRunBody }>, reply: FastifyReply) => {
        try {
          const run = await service.startRun(request.body.plan, request.body.project)
          return reply.status(201).send({ run })
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )

    app.get<{ Querystring: ListRunsQuery }>(
      "/runs",
      {
        schema: {
          querystring: {
            type: "object",
            properties: { project: { type: "string" } },
          },
        },
      },
      async (request: FastifyRequest<{ Querystring: ListRunsQuery }>, reply: FastifyReply) => {
        const runs = await service.listRuns(request.query.project)
        return reply.send({ runs })
      },
    )

    app.get<{ Params: RunParams }>(
      "/runs/:runId",
      { schema: { params: runParamsSchema } },
      async (request: FastifyRequest<{ Params: RunParams }>, reply: FastifyReply) => {
        try {
          return reply.send({ run: await service.getRun(request.params.runId) })
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )

    app.post<{ Params: RunParams }>(
      "/runs/:runId/resume",
      { schema: { params: runParamsSchema } },
      async (request: FastifyRequest<{ Params: RunParams }>, reply: FastifyReply) => {
        try {
          return reply.send(await service.resumeRun(request.params.runId))
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )

    app.post<{ Params: RunParams }>(
      "/runs/:runId/execute",
      { schema: { params: runParamsSchema } },
      async (request: FastifyRequest<{ Params: RunParams }>, reply: FastifyReply) => {
        try {
          const outcome = await service.executeRun(request.params.runId)
          return reply.send({ outcome })
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )

    app.get<{ Params: RunParams }>(
      "/runs/:runId/next-step",
      { schema: { params: runParamsSchema } },
      async (request: FastifyRequest<{ Params: RunParams }>, reply: FastifyReply) => {
        try {
          return reply.send({ step: await service.nextStep(request.params.runId) })
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )

    app.post<{ Params: StepParams; Body: MarkStepBody }>(
      "/runs/:runId/steps/:stepId",
      {
        schema: {
          params: stepParamsSchema,
          body: {
            type: "object",
            properties: {
              action: { type: "string", enum: [...MARK_ACTIONS] },
              output: { type: "string" },
              error: { type: "string" },
            },
            required: ["action"],
          },
        },
      },
      async (request: FastifyRequest<{ Params: StepParams; Body: MarkStepBody }>, reply: FastifyReply) => {
        const { runId, stepId } = request.params
        const { action, output, error } = request.body
        try {
          const run = await service.markStep(runId, stepId, action, { output, error })
          return reply.send({ run })
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )

    app.post<{ Params: StepParams }>(
      "/runs/:runId/steps/:stepId/verify",
      { schema: { params: stepParamsSchema } },
      async (request: FastifyRequest<{ Params: StepParams }>, reply: FastifyReply) => {
        try {
          const verification = await service.verifyStep(request.params.runId, request.params.stepId)
          return reply.send({ verification })
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )

    app.post<{ Params: RunParams }>(
      "/runs/:runId/verify",
      { schema: { params: runParamsSchema } },
      async (request: FastifyRequest<{ Params: RunParams }>, reply: FastifyReply) => {
        try {
          return reply.send({ verification: await service.verifyRun(request.params.runId) })
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )

    app.get<{ Params: RunParams }>(
      "/runs/:runId/progress",
      { schema: { params: runParamsSchema } },
      async (request: FastifyRequest<{ Params: RunParams }>, reply: FastifyReply) => {
        try {
          return reply.send(await service.progress(request.params.runId))
        } catch (err) {
          return sendError(reply, err)
        }
      },
    )
  }
}
