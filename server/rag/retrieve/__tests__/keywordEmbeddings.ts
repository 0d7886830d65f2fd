import { Embeddings } from '@langchain/core/embeddings'

const KEYWORDS = ['agent', 'memory', 'pizza']

/**
 * One dimension per keyword occurrence count plus a small constant one,
 * so no vector is all zeroes.
 */
export class KeywordEmbeddings extends Embeddings {
  constructor() {
    super({})
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.vectorFor(text))
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vectorFor(text)
  }

  private vectorFor(text: string): number[] {
    const words = text.toLowerCase().split(/\W+/)
    return [...KEYWORDS.map(keyword => words.filter(word => word === keyword).length), 0.01]
  }
}
