import process from 'node:process'
import { z } from 'zod'

const runtimeConfigSchema = z.object({
  openaiAPIKey: z.string().default(''),
  chatModel: z.string().min(1).default('gpt-4o-mini'),
  embeddingModel: z.string().min(1).default('text-embedding-3-large'),
  embeddingDimensions: z.coerce.number().int().positive().default(1536),
  tavilyAPIKey: z.string().default(''),
  langsmithAPIKey: z.string().default(''),
  langsmithProject: z.string().min(1).default('adaptive-rag'),
  langsmithEndpoint: z.string().url().default('https://api.smith.langchain.com'),
  langsmithTracing: z.enum(['true', 'false']).default('true').transform(value => value === 'true'),
  vectorStore: z.enum(['memory', 'pgvector']).default('memory'),
  postgresURL: z.string().optional(),
  retrievalK: z.coerce.number().int().positive().default(4),
  webSearchMaxResults: z.coerce.number().int().positive().default(3),
  maxGroundednessRetries: z.coerce.number().int().min(0).default(3),
  callTimeoutMs: z.coerce.number().int().positive().default(8000),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
}).superRefine((config, ctx) => {
  if (config.vectorStore === 'pgvector' && !config.postgresURL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['postgresURL'],
      message: 'POSTGRES_URL is required when VECTOR_STORE=pgvector',
    })
  }
})

export type RuntimeConfig = Readonly<z.infer<typeof runtimeConfigSchema>>

/**
 * Reads the service configuration from environment variables.
 * Empty variables count as unset so `.env` templates can leave them blank.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const read = (name: string) => env[name] || undefined
  return Object.freeze(runtimeConfigSchema.parse({
    openaiAPIKey: read('OPENAI_API_KEY'),
    chatModel: read('CHAT_MODEL'),
    embeddingModel: read('EMBEDDING_MODEL'),
    embeddingDimensions: read('EMBEDDING_DIMENSIONS'),
    tavilyAPIKey: read('TAVILY_API_KEY'),
    langsmithAPIKey: read('LANGSMITH_API_KEY'),
    langsmithProject: read('LANGSMITH_PROJECT'),
    langsmithEndpoint: read('LANGSMITH_ENDPOINT'),
    langsmithTracing: read('LANGSMITH_TRACING'),
    vectorStore: read('VECTOR_STORE'),
    postgresURL: read('POSTGRES_URL'),
    retrievalK: read('RETRIEVAL_K'),
    webSearchMaxResults: read('WEB_SEARCH_MAX_RESULTS'),
    maxGroundednessRetries: read('MAX_GROUNDEDNESS_RETRIES'),
    callTimeoutMs: read('CALL_TIMEOUT_MS'),
    port: read('PORT'),
  }))
}
