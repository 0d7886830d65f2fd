import type { RuntimeConfig } from '../util/runtimeConfig'
import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai'

export function makeEmbeddings(config: RuntimeConfig) {
  const embeddings = new OpenAIEmbeddings({
    model: config.embeddingModel,
    apiKey: config.openaiAPIKey,
    dimensions: config.embeddingDimensions,
    timeout: config.callTimeoutMs,
  })
  return embeddings
}

/**
 * Chat model shared by the router, the graders and the generator.
 * Retries are left to the caller: a failed call fails the request.
 */
export function makeModel(config: RuntimeConfig) {
  const model = new ChatOpenAI({
    model: config.chatModel,
    temperature: 0,
    apiKey: config.openaiAPIKey,
    timeout: config.callTimeoutMs,
    maxRetries: 0,
  })
  return model
}
