import type { UrlLoader } from '../indexUrls'
import { Document } from '@langchain/core/documents'
import { MemoryVectorStore } from 'langchain/vectorstores/memory'
import { describe, expect, it, vi } from 'vitest'
import { KeywordEmbeddings } from '../../retrieve/__tests__/keywordEmbeddings'
import { indexUrls } from '../indexUrls'

const pages: Record<string, string> = {
  'https://example.com/agents': 'An agent plans, keeps memory and calls tools.',
  'https://example.com/pizza': 'Pizza dough rests overnight.',
}

const loadPage = vi.fn<UrlLoader>(async (url) => {
  const text = pages[url]
  if (text === undefined)
    throw new Error(`404 for ${url}`)
  return [new Document({ pageContent: text, metadata: { source: url } })]
})

describe('indexUrls', () => {
  it('adds every loaded page to the vector store', async () => {
    const vectorStore = new MemoryVectorStore(new KeywordEmbeddings())

    const result = await indexUrls(Object.keys(pages), { vectorStore, load: loadPage })

    expect(result).toEqual({ documents: 2, chunks: 2, failedUrls: [] })
    expect(vectorStore.memoryVectors.map(vector => vector.content)).toEqual([
      'An agent plans, keeps memory and calls tools.',
      'Pizza dough rests overnight.',
    ])
  })

  it('skips and reports pages that fail to load', async () => {
    const vectorStore = new MemoryVectorStore(new KeywordEmbeddings())

    const result = await indexUrls(
      ['https://example.com/missing', 'https://example.com/pizza'],
      { vectorStore, load: loadPage },
    )

    expect(result).toEqual({ documents: 1, chunks: 1, failedUrls: ['https://example.com/missing'] })
    expect(vectorStore.memoryVectors).toHaveLength(1)
  })

  it('splits long pages into chunks', async () => {
    const vectorStore = new MemoryVectorStore(new KeywordEmbeddings())

    const result = await indexUrls(['https://example.com/agents'], { vectorStore, load: loadPage, chunkSize: 20 })

    expect(result.chunks).toBeGreaterThan(1)
    expect(vectorStore.memoryVectors).toHaveLength(result.chunks)
    expect(vectorStore.memoryVectors.every(vector => vector.content.length <= 20)).toBe(true)
  })

  it('leaves the store untouched when nothing loads', async () => {
    const vectorStore = new MemoryVectorStore(new KeywordEmbeddings())

    const result = await indexUrls(['https://example.com/missing'], { vectorStore, load: loadPage })

    expect(result).toEqual({ documents: 0, chunks: 0, failedUrls: ['https://example.com/missing'] })
    expect(vectorStore.memoryVectors).toEqual([])
  })
})
