import type { BaseChatModel } from '@langchain/core/language_models/chat_models'
import type { CallOptions, RelevanceGrade, RelevanceGrader } from '../../adaptive/contracts'
import { z } from 'zod'
import { judge } from './errors'

export class LlmRelevanceGrader implements RelevanceGrader {
  private model: BaseChatModel
  private relevanceOutput = z
    .object({
      relevant: z
        .boolean()
        .describe('True if the document is relevant to the question'),
    })
    .describe('Grade the relevance of a retrieved document to the question.')

  private relevanceInstructions = `You are a grader assessing relevance of a retrieved document to a user question.
If the document contains keyword(s) or semantic meaning related to the question, grade it as relevant.
It does not need to be a stringent test. The goal is to filter out erroneous retrievals.`

  constructor(model: BaseChatModel) {
    this.model = model
  }

  grade = async (document: string, question: string, options: CallOptions = {}): Promise<RelevanceGrade> => {
    const structuredLLM = this.model.withStructuredOutput(this.relevanceOutput, { name: 'grade' })
    const messages = [
      { role: 'system', content: this.relevanceInstructions },
      { role: 'user', content: `Retrieved document:\n\n${document}\n\nUser question: ${question}` },
    ]
    const grade = await judge('RelevanceGrader', this.relevanceOutput, () => structuredLLM.invoke(messages, options))
    return { relevant: grade.relevant }
  }
}
