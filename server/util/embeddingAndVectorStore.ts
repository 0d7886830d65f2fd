import type { EmbeddingsInterface } from '@langchain/core/embeddings'
import type { VectorStore } from '@langchain/core/vectorstores'
import type { RuntimeConfig } from './runtimeConfig'
import consola from 'consola'
import { MemoryVectorStore } from 'langchain/vectorstores/memory'
import { makeEmbeddings } from '../shared/utils'
import { pgvectorStore } from './pgvectorStore'

/**
 * Creates the embeddings and the vector store selected by `VECTOR_STORE`.
 * @param config Runtime configuration
 * @param embeddings Overrides the OpenAI embeddings built from `config`
 */
export async function createEmbeddingsAndVectorStore(
  config: RuntimeConfig,
  embeddings: EmbeddingsInterface = makeEmbeddings(config),
): Promise<{ embeddings: EmbeddingsInterface, vectorStore: VectorStore }> {
  if (config.vectorStore === 'pgvector' && config.postgresURL) {
    const vectorStore = await pgvectorStore(embeddings, {
      postgresURL: config.postgresURL,
      dimensions: config.embeddingDimensions,
    })
    consola.info({ tag: 'vectorStore', message: 'Using pgvector store' })
    return { embeddings, vectorStore }
  }
  consola.info({ tag: 'vectorStore', message: 'Using in-memory vector store' })
  return {
    embeddings,
    vectorStore: new MemoryVectorStore(embeddings),
  }
}

let shared: Promise<VectorStore> | undefined

/**
 * Process-wide vector store, so documents indexed over HTTP are visible to
 * the question workflow. A failed initialisation is retried on the next call.
 */
export function useVectorStore(config: RuntimeConfig): Promise<VectorStore> {
  if (!shared) {
    const created = createEmbeddingsAndVectorStore(config).then(result => result.vectorStore)
    shared = created
    void created.catch(() => {
      if (shared === created)
        shared = undefined
    })
  }
  return shared
}
