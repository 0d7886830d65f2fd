import type { BaseChatModel } from '@langchain/core/language_models/chat_models'
import type { CallOptions, QuestionRouter, RouteDecision } from '../../adaptive/contracts'
import { z } from 'zod'
import { Datasource } from '../../adaptive/state'
import { judge } from './errors'

/**
 * Only an explicit `vectorstore` goes to the index. Anything the model
 * invents is sent to web search rather than failing the request.
 */
export function normalizeDatasource(value: string): Datasource {
  return value.trim().toLowerCase() === Datasource.VECTORSTORE
    ? Datasource.VECTORSTORE
    : Datasource.WEBSEARCH
}

export class LlmQuestionRouter implements QuestionRouter {
  private model: BaseChatModel
  private routeOutput = z
    .object({
      datasource: z
        .string()
        .describe('Either \'vectorstore\' or \'web_search\''),
    })
    .describe('Route a user query to the most relevant datasource.')

  private routeInstructions = `You are an expert at routing a user question to a vectorstore or web_search.
The vectorstore contains documents related to agents, prompt engineering and adversarial attacks.
Use the vectorstore for questions on these topics. For everything else, use web_search.
Return either 'vectorstore' or 'web_search' as the datasource.`

  constructor(model: BaseChatModel) {
    this.model = model
  }

  route = async (question: string, options: CallOptions = {}): Promise<RouteDecision> => {
    const structuredLLM = this.model.withStructuredOutput(this.routeOutput, { name: 'route' })
    const messages = [
      { role: 'system', content: this.routeInstructions },
      { role: 'user', content: `Question: ${question}` },
    ]
    const decision = await judge('QuestionRouter', this.routeOutput, () => structuredLLM.invoke(messages, options))
    return { datasource: normalizeDatasource(decision.datasource) }
  }
}
