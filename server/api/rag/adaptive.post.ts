import type { AdaptiveRag } from '~/server/adaptive/graph'
import consola from 'consola'
import { createError, defineEventHandler, isError, readBody } from 'h3'
import { z } from 'zod'
import { toWorkflowResult } from '~/server/adaptive/state'
import { StructuredOutputError } from '~/server/rag/judge/errors'
import { useAdaptiveRag } from '~/server/util/adaptiveRag'

const inputSchema = z.object({
  question: z.string().min(1),
})

/**
 * @param getRag Resolved on every request, so a failed setup is retried by
 * the next request instead of being cached by the handler.
 */
export function createAdaptiveHandler(getRag: () => Promise<Pick<AdaptiveRag, 'invoke'>>) {
  return defineEventHandler(async (event) => {
    const body = await readBody(event)
    const parsedBody = inputSchema.safeParse(body)
    if (!parsedBody.success) {
      const formattedError = parsedBody.error.flatten()
      consola.error({ tag: 'eventHandler', message: `Invalid input: ${JSON.stringify(formattedError)}` })
      throw createError({
        statusCode: 400,
        statusMessage: 'Bad Request',
        message: JSON.stringify(formattedError) || 'Invalid input',
      })
    }
    const { question } = parsedBody.data
    consola.info({ tag: 'eventHandler', message: `Received question: ${question}` })

    // A client that hangs up cancels the workflow
    const controller = new AbortController()
    event.node.res.on('close', () => {
      if (!event.node.res.writableEnded)
        controller.abort()
    })

    try {
      const rag = await getRag()
      const before = performance.now()
      const state = await rag.invoke(question, { signal: controller.signal })
      const after = performance.now()
      consola.info({ tag: 'eventHandler', message: `Answered in ${after - before}ms` })
      return toWorkflowResult(state)
    }
    catch (error) {
      if (isError(error))
        throw error
      consola.error({ tag: 'eventHandler', message: `Workflow failed: ${error instanceof Error ? error.message : String(error)}` })
      if (error instanceof StructuredOutputError) {
        throw createError({
          statusCode: 502,
          statusMessage: 'Bad Gateway',
          message: error.message,
        })
      }
      throw createError({
        statusCode: 500,
        statusMessage: 'Internal Server Error',
        message: 'Unable to answer the question. Please try again later.',
      })
    }
  })
}

export default createAdaptiveHandler(useAdaptiveRag)
