import type { EmbeddingsInterface } from '@langchain/core/embeddings'
import { PGVectorStore } from '@langchain/community/vectorstores/pgvector'
import consola from 'consola'
import { createError } from 'h3'
import pg from 'pg'

export interface PgvectorStoreOptions {
  postgresURL: string
  dimensions: number
  tableName?: string
}

export async function pgvectorStore(embeddings: EmbeddingsInterface, options: PgvectorStoreOptions) {
  const { Pool } = pg
  const pool = new Pool({
    connectionString: options.postgresURL,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  })

  try {
    const vectorStore = await PGVectorStore.initialize(embeddings, {
      pool,
      tableName: options.tableName ?? 'rag_vectors',
      dimensions: options.dimensions,
    })
    return vectorStore
  }
  catch (error) {
    consola.error('Error setting up PGVectorStore:', error)
    await pool.end()
    if (error instanceof Error && error.message.includes('ECONNREFUSED')) {
      consola.error(
        'Please make sure your Postgres server is running and that the URL is correct.',
      )
      throw createError({
        statusCode: 503,
        message: 'Unable to connect to Postgres. Please try again later.',
      })
    }
    throw createError({
      statusCode: 500,
      message: 'Error setting up PGVectorStore.',
    })
  }
}
