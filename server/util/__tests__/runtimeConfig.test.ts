import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { loadRuntimeConfig } from '../runtimeConfig'

describe('loadRuntimeConfig', () => {
  it('fills in defaults for an empty environment', () => {
    const config = loadRuntimeConfig({})

    expect(config).toEqual({
      openaiAPIKey: '',
      chatModel: 'gpt-4o-mini',
      embeddingModel: 'text-embedding-3-large',
      embeddingDimensions: 1536,
      tavilyAPIKey: '',
      langsmithAPIKey: '',
      langsmithProject: 'adaptive-rag',
      langsmithEndpoint: 'https://api.smith.langchain.com',
      langsmithTracing: true,
      vectorStore: 'memory',
      postgresURL: undefined,
      retrievalK: 4,
      webSearchMaxResults: 3,
      maxGroundednessRetries: 3,
      callTimeoutMs: 8000,
      port: 3000,
    })
    expect(Object.isFrozen(config)).toBe(true)
  })

  it('reads and coerces environment variables', () => {
    const config = loadRuntimeConfig({
      OPENAI_API_KEY: 'test-key',
      RETRIEVAL_K: '6',
      MAX_GROUNDEDNESS_RETRIES: '0',
      CALL_TIMEOUT_MS: '1500',
      LANGSMITH_TRACING: 'false',
      VECTOR_STORE: 'pgvector',
      POSTGRES_URL: 'postgres://localhost:5432/rag',
    })

    expect(config.openaiAPIKey).toBe('test-key')
    expect(config.retrievalK).toBe(6)
    expect(config.maxGroundednessRetries).toBe(0)
    expect(config.callTimeoutMs).toBe(1500)
    expect(config.langsmithTracing).toBe(false)
    expect(config.vectorStore).toBe('pgvector')
    expect(config.postgresURL).toBe('postgres://localhost:5432/rag')
  })

  it('treats empty variables as unset', () => {
    expect(loadRuntimeConfig({ CHAT_MODEL: '', PORT: '' })).toMatchObject({ chatModel: 'gpt-4o-mini', port: 3000 })
  })

  it('rejects a pgvector store without a connection string', () => {
    expect(() => loadRuntimeConfig({ VECTOR_STORE: 'pgvector' })).toThrow('POSTGRES_URL is required')
  })

  it('rejects values that are not numbers', () => {
    expect(() => loadRuntimeConfig({ RETRIEVAL_K: 'four' })).toThrow(ZodError)
  })

  it('rejects a negative retry cap', () => {
    expect(() => loadRuntimeConfig({ MAX_GROUNDEDNESS_RETRIES: '-1' })).toThrow(ZodError)
  })
})
