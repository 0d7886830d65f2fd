import type { DocumentInterface } from '@langchain/core/documents'
import { Annotation } from '@langchain/langgraph'

export const Datasource = {
  VECTORSTORE: 'vectorstore',
  WEBSEARCH: 'web_search',
} as const

export type Datasource = typeof Datasource[keyof typeof Datasource]

/** Outcome of the last groundedness check. */
export type GroundednessVerdict = 'grounded' | 'retry' | 'exhausted'

/** Outcome of the last answer-quality check. */
export type AnswerQualityVerdict = 'addressed' | 'unaddressed'

/**
 * `correcting` once the answer-quality gate has failed and the single
 * corrective web search + regeneration is under way.
 */
export type Phase = 'answering' | 'correcting'

export const GraphState = Annotation.Root({
  question: Annotation<string>({
    reducer: (x, y) => y ?? x ?? '',
    default: () => '',
  }),
  documents: Annotation<DocumentInterface[]>({
    reducer: (x, y) => y ?? x ?? [],
    default: () => [],
  }),
  generation: Annotation<string | undefined>({
    reducer: (x, y) => y ?? x,
    default: () => undefined,
  }),
  needsWebSearch: Annotation<boolean>({
    reducer: (x, y) => y ?? x,
    default: () => false,
  }),
  datasource: Annotation<Datasource | undefined>({
    reducer: (x, y) => y ?? x,
    default: () => undefined,
  }),
  groundednessRetries: Annotation<number>({
    reducer: (x, y) => y ?? x,
    default: () => 0,
  }),
  groundedness: Annotation<GroundednessVerdict | undefined>({
    reducer: (x, y) => y ?? x,
    default: () => undefined,
  }),
  answerQuality: Annotation<AnswerQualityVerdict | undefined>({
    reducer: (x, y) => y ?? x,
    default: () => undefined,
  }),
  phase: Annotation<Phase>({
    reducer: (x, y) => y ?? x,
    default: () => 'answering',
  }),
})

export type WorkflowState = typeof GraphState.State

export interface WorkflowResult {
  question: string
  generation: string
  documentsUsedCount: number
}

export function toWorkflowResult(state: WorkflowState): WorkflowResult {
  return {
    question: state.question,
    generation: state.generation ?? '',
    documentsUsedCount: state.documents.length,
  }
}
