import type { CallOptions, WebSearchGateway } from '../../adaptive/contracts'
import { TavilySearchResults } from '@langchain/community/tools/tavily_search'
import consola from 'consola'
import { z } from 'zod'
import { withDeadline } from '../../shared/deadline'

const searchResultsSchema = z.array(z.object({ content: z.string() }))

/**
 * Joins the `content` of every Tavily result with a single space.
 * The tool hands back its results as a JSON string.
 */
export function joinSearchContent(raw: unknown): string {
  try {
    const value: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw
    const results = searchResultsSchema.parse(value)
    return results.map(result => result.content).join(' ')
  }
  catch (error) {
    consola.warn({ tag: 'webSearch', message: `Could not parse search results: ${error instanceof Error ? error.message : String(error)}` })
    return ''
  }
}

export interface TavilyWebSearchOptions {
  apiKey: string
  maxResults?: number
}

export class TavilyWebSearch implements WebSearchGateway {
  private apiKey: string
  private defaultMaxResults: number

  constructor(options: TavilyWebSearchOptions) {
    this.apiKey = options.apiKey
    this.defaultMaxResults = options.maxResults ?? 3
  }

  /**
   * Never throws: transport, status, parse, timeout and cancellation failures
   * all come back as `''`.
   */
  search = async (query: string, maxResults = this.defaultMaxResults, options: CallOptions = {}): Promise<string> => {
    const before = performance.now()
    try {
      const tool = new TavilySearchResults({ apiKey: this.apiKey, maxResults })
      const raw: unknown = await withDeadline(options, signal => tool.invoke(query, { signal }))
      const content = joinSearchContent(raw)
      const after = performance.now()
      consola.info({ tag: 'webSearch', message: `Tavily returned ${content.length} characters in ${after - before}ms` })
      return content
    }
    catch (error) {
      consola.warn({ tag: 'webSearch', message: `Web search failed: ${error instanceof Error ? error.message : String(error)}` })
      return ''
    }
  }
}
