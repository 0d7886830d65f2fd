import type { DocumentInterface } from '@langchain/core/documents'
import type { VectorStore } from '@langchain/core/vectorstores'
import type { CallOptions, RetrievalGateway } from '../../adaptive/contracts'
import { withDeadline } from '../../shared/deadline'

/**
 * Nearest-neighbour lookup over any LangChain vector store. Store failures,
 * timeouts and cancellation reject.
 */
export class VectorStoreRetrieval implements RetrievalGateway {
  private vectorStore: VectorStore
  private defaultK: number

  constructor(vectorStore: VectorStore, defaultK = 4) {
    this.vectorStore = vectorStore
    this.defaultK = defaultK
  }

  retrieve = async (query: string, k = this.defaultK, options: CallOptions = {}): Promise<DocumentInterface[]> => {
    const retriever = this.vectorStore.asRetriever(k)
    return withDeadline(options, signal => retriever
      .withConfig({ runName: 'FetchRelevantDocuments' })
      .invoke(query, { signal }))
  }
}
