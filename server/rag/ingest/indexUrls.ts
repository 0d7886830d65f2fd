import type { Document } from '@langchain/core/documents'
import type { VectorStore } from '@langchain/core/vectorstores'
import { CheerioWebBaseLoader } from '@langchain/community/document_loaders/web/cheerio'
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters'
import consola from 'consola'

export type UrlLoader = (url: string) => Promise<Document[]>

export interface IndexUrlsOptions {
  vectorStore: VectorStore
  load?: UrlLoader
  chunkSize?: number
  chunkOverlap?: number
}

export interface IndexUrlsResult {
  documents: number
  chunks: number
  failedUrls: string[]
}

export const loadWithCheerio: UrlLoader = url => new CheerioWebBaseLoader(url).load()

/**
 * Loads each page, splits it into chunks and adds the chunks to the vector
 * store. A page that cannot be loaded is skipped and reported.
 */
export async function indexUrls(urls: string[], options: IndexUrlsOptions): Promise<IndexUrlsResult> {
  const { vectorStore, load = loadWithCheerio, chunkSize = 250, chunkOverlap = 0 } = options

  const before = performance.now()
  const docsList: Document[] = []
  const failedUrls: string[] = []
  for (const url of urls) {
    try {
      docsList.push(...await load(url))
    }
    catch (error) {
      consola.error({ tag: 'indexUrls', message: `Failed to load ${url}: ${error instanceof Error ? error.message : String(error)}` })
      failedUrls.push(url)
    }
  }
  const after = performance.now()
  consola.info({ tag: 'indexUrls', message: `Loaded ${docsList.length} documents in ${after - before}ms` })

  const beforeSplit = performance.now()
  const splitter = new RecursiveCharacterTextSplitter({ chunkSize, chunkOverlap })
  const allSplits = await splitter.splitDocuments(docsList)
  const afterSplit = performance.now()
  consola.info({ tag: 'indexUrls', message: `Split ${allSplits.length} chunks in ${afterSplit - beforeSplit}ms` })

  if (allSplits.length > 0) {
    const beforeEmbedding = performance.now()
    await vectorStore.addDocuments(allSplits)
    const afterEmbedding = performance.now()
    consola.info({ tag: 'indexUrls', message: `Added ${allSplits.length} chunks to the vector store in ${afterEmbedding - beforeEmbedding}ms` })
  }

  return { documents: docsList.length, chunks: allSplits.length, failedUrls }
}
