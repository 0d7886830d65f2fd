import type { DocumentInterface } from '@langchain/core/documents'
import type { RunnableConfig } from '@langchain/core/runnables'
import type {
  AnswerGenerator,
  AnswerGrader,
  CallOptions,
  GroundednessGrader,
  QuestionRouter,
  RelevanceGrader,
  RetrievalGateway,
  WebSearchGateway,
} from './contracts'
import type { TraceSink } from './trace'
import { Document } from '@langchain/core/documents'
import { END, START, StateGraph } from '@langchain/langgraph'
import consola from 'consola'
import { formatDocumentsAsString } from 'langchain/util/document'
import { Datasource, GraphState, type WorkflowState } from './state'
import { noopTraceSink, traceStep } from './trace'

export interface AdaptiveRagOptions {
  retrievalK: number
  webSearchMaxResults: number
  /** Regenerations allowed when the answer is not grounded in the documents. */
  maxGroundednessRetries: number
  /** Timeout applied to every LLM, vector store and web search call. */
  callTimeoutMs: number
}

export const defaultAdaptiveRagOptions: AdaptiveRagOptions = {
  retrievalK: 4,
  webSearchMaxResults: 3,
  maxGroundednessRetries: 3,
  callTimeoutMs: 8000,
}

export interface AdaptiveRagDependencies {
  router: QuestionRouter
  relevanceGrader: RelevanceGrader
  groundednessGrader: GroundednessGrader
  answerGrader: AnswerGrader
  generator: AnswerGenerator
  retrieval: RetrievalGateway
  webSearch: WebSearchGateway
  traceSink?: TraceSink
  options?: Partial<AdaptiveRagOptions>
}

const WEB_SEARCH_SOURCE = 'web_search'
const PREVIEW_LENGTH = 200

function preview(text: string, length = PREVIEW_LENGTH) {
  return text.length > length ? `${text.slice(0, length)}...` : text
}

function parentRunIdOf(config: RunnableConfig | undefined): string | undefined {
  const parentRunId: unknown = config?.configurable?.parentRunId
  return typeof parentRunId === 'string' ? parentRunId : undefined
}

/**
 * Builds the fixed routing / retrieval / grading / generation / self-correction
 * graph around the given collaborators.
 */
export function buildAdaptiveRagGraph(dependencies: AdaptiveRagDependencies) {
  const {
    router,
    relevanceGrader,
    groundednessGrader,
    answerGrader,
    generator,
    retrieval,
    webSearch: webSearchGateway,
  } = dependencies
  const traceSink = dependencies.traceSink ?? noopTraceSink
  const options = { ...defaultAdaptiveRagOptions, ...dependencies.options }

  const callOptions = (config: RunnableConfig | undefined): CallOptions => ({
    signal: config?.signal,
    timeout: options.callTimeoutMs,
  })

  /**
   * Asks the router which datasource should serve the question.
   */
  async function routeQuestion(
    state: WorkflowState,
    config: RunnableConfig | undefined,
  ): Promise<Partial<WorkflowState>> {
    consola.log('---ROUTE QUESTION---')
    const decision = await traceStep(traceSink, {
      runType: 'chain',
      name: 'RouteQuestion',
      inputs: { question: state.question },
      parentRunId: parentRunIdOf(config),
      outputs: result => ({ datasource: result.datasource }),
    }, () => router.route(state.question, callOptions(config)))

    if (decision.datasource === Datasource.VECTORSTORE) {
      consola.log('---ROUTE QUESTION TO RAG---')
      return { datasource: Datasource.VECTORSTORE }
    }
    if (decision.datasource === Datasource.WEBSEARCH)
      consola.log('---ROUTE QUESTION TO WEB SEARCH---')
    else
      consola.log('---UNRECOGNIZED ROUTE, FALLING BACK TO WEB SEARCH---')
    return { datasource: Datasource.WEBSEARCH }
  }

  /**
   * Retrieve documents from the vector store.
   */
  async function retrieve(
    state: WorkflowState,
    config: RunnableConfig | undefined,
  ): Promise<Partial<WorkflowState>> {
    consola.log('---RETRIEVE---')
    const before = performance.now()
    const documents = await traceStep(traceSink, {
      runType: 'retriever',
      name: 'RetrieveDocuments',
      inputs: { question: state.question, k: options.retrievalK },
      parentRunId: parentRunIdOf(config),
      outputs: result => ({
        num_documents: result.length,
        documents: result.map(doc => preview(doc.pageContent)),
      }),
    }, () => retrieval.retrieve(state.question, options.retrievalK, callOptions(config)))
    const after = performance.now()
    consola.info({ tag: 'retrieve', message: `Retrieved ${documents.length} documents in ${after - before}ms` })
    return { documents }
  }

  /**
   * Keeps the documents graded relevant to the question. Flags a web search
   * when at least one document was dropped.
   */
  async function gradeDocuments(
    state: WorkflowState,
    config: RunnableConfig | undefined,
  ): Promise<Partial<WorkflowState>> {
    consola.log('---CHECK DOCUMENT RELEVANCE TO QUESTION---')
    const before = performance.now()
    const graded = await traceStep(traceSink, {
      runType: 'chain',
      name: 'GradeDocuments',
      inputs: { question: state.question, num_documents: state.documents.length },
      parentRunId: parentRunIdOf(config),
      outputs: result => ({
        relevant_documents: result.documents.length,
        total_documents: state.documents.length,
        needs_web_search: result.needsWebSearch,
      }),
    }, async () => {
      const relevant: DocumentInterface[] = []
      let needsWebSearch = false
      for (const doc of state.documents) {
        const grade = await relevanceGrader.grade(doc.pageContent, state.question, callOptions(config))
        if (grade.relevant) {
          consola.log('---GRADE: DOCUMENT RELEVANT---')
          relevant.push(doc)
        }
        else {
          consola.log('---GRADE: DOCUMENT NOT RELEVANT---')
          needsWebSearch = true
        }
      }
      return { documents: relevant, needsWebSearch }
    })
    const after = performance.now()
    consola.info({ tag: 'gradeDocuments', message: `Kept ${graded.documents.length} of ${state.documents.length} documents in ${after - before}ms` })
    return graded
  }

  /**
   * Appends one web search result to the documents. An empty result adds
   * nothing.
   */
  async function webSearch(
    state: WorkflowState,
    config: RunnableConfig | undefined,
  ): Promise<Partial<WorkflowState>> {
    consola.log('---WEB SEARCH---')
    const before = performance.now()
    const results = await traceStep(traceSink, {
      runType: 'tool',
      name: 'WebSearch',
      inputs: { question: state.question },
      parentRunId: parentRunIdOf(config),
      outputs: result => ({
        search_results_length: result.length,
        total_documents: state.documents.length + (result ? 1 : 0),
      }),
    }, () => webSearchGateway.search(state.question, options.webSearchMaxResults, callOptions(config)))
    const after = performance.now()
    consola.info({ tag: 'webSearch', message: `Web search completed in ${after - before}ms` })

    if (!results) {
      consola.warn({ tag: 'webSearch', message: 'Web search returned no content, keeping current documents' })
      return { documents: state.documents }
    }
    const webResults = new Document({ pageContent: results, metadata: { source: WEB_SEARCH_SOURCE } })
    consola.info({ tag: 'webSearch', message: 'Added 1 document to the graph' })
    return { documents: [...state.documents, webResults] }
  }

  /**
   * Generate an answer from the current documents.
   */
  async function generate(
    state: WorkflowState,
    config: RunnableConfig | undefined,
  ): Promise<Partial<WorkflowState>> {
    consola.log('---GENERATE---')
    const context = formatDocumentsAsString(state.documents)
    const before = performance.now()
    const generation = await traceStep(traceSink, {
      runType: 'llm',
      name: 'GenerateAnswer',
      inputs: {
        question: state.question,
        context: preview(context, 500),
        num_documents: state.documents.length,
      },
      parentRunId: parentRunIdOf(config),
      outputs: result => ({ generation: result }),
    }, () => generator.generate(context, state.question, callOptions(config)))
    const after = performance.now()
    consola.info({ tag: 'generate', message: `Generated answer in ${after - before}ms` })
    return { generation }
  }

  /**
   * Checks that the generation is supported by the documents. A failed check
   * schedules a regeneration until the retry budget is spent.
   */
  async function checkGroundedness(
    state: WorkflowState,
    config: RunnableConfig | undefined,
  ): Promise<Partial<WorkflowState>> {
    consola.log('---CHECK HALLUCINATIONS---')
    const generation = state.generation ?? ''
    const grade = await traceStep(traceSink, {
      runType: 'chain',
      name: 'CheckGroundedness',
      inputs: { generation, num_documents: state.documents.length, retries: state.groundednessRetries },
      parentRunId: parentRunIdOf(config),
      outputs: result => ({ grounded: result.grounded }),
    }, () => groundednessGrader.grade(formatDocumentsAsString(state.documents), generation, callOptions(config)))

    if (grade.grounded) {
      consola.log('---DECISION: GENERATION IS GROUNDED IN DOCUMENTS---')
      return { groundedness: 'grounded' }
    }
    if (state.groundednessRetries < options.maxGroundednessRetries) {
      consola.log('---DECISION: GENERATION IS NOT GROUNDED IN DOCUMENTS, RE-TRY---')
      return { groundedness: 'retry', groundednessRetries: state.groundednessRetries + 1 }
    }
    consola.warn({
      tag: 'checkGroundedness',
      message: `Generation still not grounded after ${state.groundednessRetries} regenerations, returning last generation`,
    })
    return { groundedness: 'exhausted' }
  }

  /**
   * Checks that the generation addresses the question.
   */
  async function checkAnswerQuality(
    state: WorkflowState,
    config: RunnableConfig | undefined,
  ): Promise<Partial<WorkflowState>> {
    consola.log('---GRADE GENERATION vs QUESTION---')
    const generation = state.generation ?? ''
    const grade = await traceStep(traceSink, {
      runType: 'chain',
      name: 'CheckAnswerQuality',
      inputs: { question: state.question, generation },
      parentRunId: parentRunIdOf(config),
      outputs: result => ({ addresses_question: result.addressesQuestion }),
    }, () => answerGrader.grade(state.question, generation, callOptions(config)))

    if (grade.addressesQuestion) {
      consola.log('---DECISION: GENERATION ADDRESSES QUESTION---')
      return { answerQuality: 'addressed' }
    }
    consola.log('---DECISION: GENERATION DOES NOT ADDRESS QUESTION---')
    return { answerQuality: 'unaddressed', phase: 'correcting' }
  }

  function decideRoute(state: WorkflowState) {
    return state.datasource === Datasource.VECTORSTORE ? 'retrieve' : 'webSearch'
  }

  function decideToGenerate(state: WorkflowState) {
    consola.log('---ASSESS GRADED DOCUMENTS---')
    if (state.needsWebSearch) {
      consola.log('---DECISION: NOT ALL DOCUMENTS ARE RELEVANT TO QUESTION, INCLUDE WEB SEARCH---')
      return 'webSearch'
    }
    consola.log('---DECISION: GENERATE---')
    return 'generate'
  }

  /**
   * Only the vector store path goes through the quality gate, and only once
   * per answer: the corrective generation after a failed answer check is final.
   */
  function decideAfterGenerate(state: WorkflowState) {
    if (state.datasource !== Datasource.VECTORSTORE || state.phase === 'correcting')
      return END
    return 'checkGroundedness'
  }

  function decideAfterGroundedness(state: WorkflowState) {
    switch (state.groundedness) {
      case 'grounded':
        return 'checkAnswerQuality'
      case 'retry':
        return 'generate'
      default:
        return END
    }
  }

  function decideAfterAnswerQuality(state: WorkflowState) {
    return state.answerQuality === 'addressed' ? END : 'webSearch'
  }

  const workflow = new StateGraph(GraphState)
    .addNode('routeQuestion', routeQuestion)
    .addNode('retrieve', retrieve)
    .addNode('gradeDocuments', gradeDocuments)
    .addNode('webSearch', webSearch)
    .addNode('generate', generate)
    .addNode('checkGroundedness', checkGroundedness)
    .addNode('checkAnswerQuality', checkAnswerQuality)

  workflow.addEdge(START, 'routeQuestion')
  workflow.addConditionalEdges('routeQuestion', decideRoute, ['retrieve', 'webSearch'])
  workflow.addEdge('retrieve', 'gradeDocuments')
  workflow.addConditionalEdges('gradeDocuments', decideToGenerate, ['webSearch', 'generate'])
  workflow.addEdge('webSearch', 'generate')
  workflow.addConditionalEdges('generate', decideAfterGenerate, ['checkGroundedness', END])
  workflow.addConditionalEdges('checkGroundedness', decideAfterGroundedness, ['checkAnswerQuality', 'generate', END])
  workflow.addConditionalEdges('checkAnswerQuality', decideAfterAnswerQuality, ['webSearch', END])

  return {
    graph: workflow.compile().withConfig({ runName: 'AdaptiveRAG' }),
    options,
  }
}

/**
 * Entry point of the question-answering workflow. One invocation owns one
 * state value; instances hold no per-request data and can be shared.
 */
export class AdaptiveRag {
  private readonly graph: ReturnType<typeof buildAdaptiveRagGraph>['graph']
  private readonly options: AdaptiveRagOptions
  private readonly traceSink: TraceSink

  constructor(dependencies: AdaptiveRagDependencies) {
    const { graph, options } = buildAdaptiveRagGraph(dependencies)
    this.graph = graph
    this.options = options
    this.traceSink = dependencies.traceSink ?? noopTraceSink
  }

  /**
   * Supersteps needed by the longest legal run: route, retrieve, grade, web
   * search, generate, one check per groundedness attempt, the regenerations,
   * then answer check, corrective search and generation, with slack.
   */
  get recursionLimit(): number {
    return 12 + 2 * (this.options.maxGroundednessRetries + 1)
  }

  async invoke(question: string, options: { signal?: AbortSignal } = {}): Promise<WorkflowState> {
    consola.info({ tag: 'adaptiveRag', message: `Starting workflow for question: ${question}` })
    const state = await traceStep<WorkflowState>(this.traceSink, {
      runType: 'chain',
      name: 'AdaptiveRAGWorkflow',
      inputs: { question },
      outputs: result => ({
        question: result.question,
        answer: result.generation,
        documents_used: result.documents.length,
      }),
    }, runId => this.graph.invoke({ question }, {
      recursionLimit: this.recursionLimit,
      signal: options.signal,
      configurable: { parentRunId: runId },
    }))
    consola.info({ tag: 'adaptiveRag', message: `Workflow completed. Final answer: ${state.generation}` })
    return state
  }
}
