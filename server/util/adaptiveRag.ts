import type { BaseChatModel } from '@langchain/core/language_models/chat_models'
import type { VectorStore } from '@langchain/core/vectorstores'
import type { TraceSink } from '../adaptive/trace'
import type { RuntimeConfig } from './runtimeConfig'
import process from 'node:process'
import consola from 'consola'
import { Client } from 'langsmith'
import { AdaptiveRag } from '../adaptive/graph'
import { noopTraceSink } from '../adaptive/trace'
import { LlmAnswerGenerator } from '../rag/generate/answerGenerator'
import { LlmAnswerGrader } from '../rag/judge/answer'
import { LlmGroundednessGrader } from '../rag/judge/groundedness'
import { LlmRelevanceGrader } from '../rag/judge/relevance'
import { LlmQuestionRouter } from '../rag/judge/router'
import { VectorStoreRetrieval } from '../rag/retrieve/vectorStoreRetrieval'
import { TavilyWebSearch } from '../rag/search/tavilyWebSearch'
import { LangSmithTraceSink } from '../rag/trace/langsmithTraceSink'
import { makeModel } from '../shared/utils'
import { useVectorStore } from './embeddingAndVectorStore'
import { loadRuntimeConfig } from './runtimeConfig'

export interface FlushableTraceSink extends TraceSink {
  flush: () => Promise<void>
}

/**
 * LangSmith when an API key is configured and tracing is not switched off,
 * otherwise a sink that drops everything.
 */
export function createTraceSink(config: RuntimeConfig): FlushableTraceSink {
  if (config.langsmithAPIKey && config.langsmithTracing) {
    consola.info({ tag: 'trace', message: `Tracing to LangSmith project ${config.langsmithProject}` })
    const client = new Client({ apiKey: config.langsmithAPIKey, apiUrl: config.langsmithEndpoint })
    return new LangSmithTraceSink(client, config.langsmithProject)
  }
  return { ...noopTraceSink, flush: async () => {} }
}

/**
 * LangChain reads these at call time and would report every model call a
 * second time next to the workflow sink. Call after the config is loaded.
 */
export function keepLangChainTracerOff(env: NodeJS.ProcessEnv = process.env) {
  for (const name of ['LANGSMITH_TRACING', 'LANGSMITH_TRACING_V2', 'LANGCHAIN_TRACING', 'LANGCHAIN_TRACING_V2'])
    env[name] = 'false'
}

export function createAdaptiveRag(
  config: RuntimeConfig,
  vectorStore: VectorStore,
  options: { model?: BaseChatModel, traceSink?: TraceSink } = {},
): AdaptiveRag {
  if (!config.openaiAPIKey && !options.model)
    throw new Error('OPENAI_API_KEY environment variable not set')
  const model = options.model ?? makeModel(config)
  return new AdaptiveRag({
    router: new LlmQuestionRouter(model),
    relevanceGrader: new LlmRelevanceGrader(model),
    groundednessGrader: new LlmGroundednessGrader(model),
    answerGrader: new LlmAnswerGrader(model),
    generator: new LlmAnswerGenerator(model),
    retrieval: new VectorStoreRetrieval(vectorStore, config.retrievalK),
    webSearch: new TavilyWebSearch({ apiKey: config.tavilyAPIKey, maxResults: config.webSearchMaxResults }),
    traceSink: options.traceSink ?? noopTraceSink,
    options: {
      retrievalK: config.retrievalK,
      webSearchMaxResults: config.webSearchMaxResults,
      maxGroundednessRetries: config.maxGroundednessRetries,
      callTimeoutMs: config.callTimeoutMs,
    },
  })
}

let runtimeConfig: RuntimeConfig | undefined
let traceSink: FlushableTraceSink | undefined
let adaptiveRag: Promise<AdaptiveRag> | undefined

export function useRuntimeConfig(): RuntimeConfig {
  runtimeConfig ??= loadRuntimeConfig()
  return runtimeConfig
}

export function useTraceSink(): FlushableTraceSink {
  traceSink ??= createTraceSink(useRuntimeConfig())
  return traceSink
}

/** Workflow shared by every request of this process. */
export function useAdaptiveRag(): Promise<AdaptiveRag> {
  if (!adaptiveRag) {
    const config = useRuntimeConfig()
    const created = useVectorStore(config)
      .then(vectorStore => createAdaptiveRag(config, vectorStore, { traceSink: useTraceSink() }))
    adaptiveRag = created
    void created.catch(() => {
      if (adaptiveRag === created)
        adaptiveRag = undefined
    })
  }
  return adaptiveRag
}
