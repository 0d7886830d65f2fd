import type { VectorStore } from '@langchain/core/vectorstores'
import type { UrlLoader } from '~/server/rag/ingest/indexUrls'
import consola from 'consola'
import { createError, defineEventHandler, isError, readBody } from 'h3'
import { z } from 'zod'
import { indexUrls } from '~/server/rag/ingest/indexUrls'
import { useRuntimeConfig } from '~/server/util/adaptiveRag'
import { useVectorStore } from '~/server/util/embeddingAndVectorStore'

const inputSchema = z.object({
  urls: z.array(z.string().url()).nonempty(),
})

export function createIndexingHandler(getVectorStore: () => Promise<VectorStore>, load?: UrlLoader) {
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
    const { urls } = parsedBody.data
    consola.info({ tag: 'eventHandler', message: `Received URLs: ${urls.join(', ')}` })

    try {
      const vectorStore = await getVectorStore()
      const result = await indexUrls(urls, { vectorStore, load })
      return {
        message: `Successfully added ${result.chunks} chunks to the vector store.`,
        ...result,
      }
    }
    catch (error) {
      if (isError(error))
        throw error
      consola.error({ tag: 'eventHandler', message: `Indexing failed: ${error instanceof Error ? error.message : String(error)}` })
      throw createError({
        statusCode: 500,
        statusMessage: 'Internal Server Error',
        message: 'Unable to index the documents. Please try again later.',
      })
    }
  })
}

export default createIndexingHandler(async () => useVectorStore(useRuntimeConfig()))
