import type { DocumentInterface } from '@langchain/core/documents'
import type { Datasource } from './state'

/**
 * Per-call options every collaborator accepts. `signal` cancels the call,
 * `timeout` bounds it in milliseconds.
 */
export interface CallOptions {
  signal?: AbortSignal
  timeout?: number
}

export interface RouteDecision {
  datasource: Datasource
}

export interface RelevanceGrade {
  relevant: boolean
}

export interface GroundednessGrade {
  grounded: boolean
}

export interface AnswerQualityGrade {
  addressesQuestion: boolean
}

export interface QuestionRouter {
  route: (question: string, options?: CallOptions) => Promise<RouteDecision>
}

export interface RelevanceGrader {
  grade: (document: string, question: string, options?: CallOptions) => Promise<RelevanceGrade>
}

export interface GroundednessGrader {
  grade: (documents: string, generation: string, options?: CallOptions) => Promise<GroundednessGrade>
}

export interface AnswerGrader {
  grade: (question: string, generation: string, options?: CallOptions) => Promise<AnswerQualityGrade>
}

export interface AnswerGenerator {
  generate: (context: string, question: string, options?: CallOptions) => Promise<string>
}

export interface RetrievalGateway {
  /** Up to `k` passages, most similar first. An empty array is a valid answer. */
  retrieve: (query: string, k?: number, options?: CallOptions) => Promise<DocumentInterface[]>
}

export interface WebSearchGateway {
  /** Concatenated result text, or `''` when the search failed. */
  search: (query: string, maxResults?: number, options?: CallOptions) => Promise<string>
}
