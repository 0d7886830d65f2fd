import type { BaseChatModel } from '@langchain/core/language_models/chat_models'
import type { AnswerGrader, AnswerQualityGrade, CallOptions } from '../../adaptive/contracts'
import { z } from 'zod'
import { judge } from './errors'

export class LlmAnswerGrader implements AnswerGrader {
  private model: BaseChatModel
  private answerOutput = z
    .object({
      addressesQuestion: z
        .boolean()
        .describe('True if the answer resolves the question'),
    })
    .describe('Whether the answer addresses the question.')

  private answerInstructions = `You are a grader assessing whether an answer addresses / resolves a question.
Give a binary score true or false. True means that the answer resolves the question.`

  constructor(model: BaseChatModel) {
    this.model = model
  }

  grade = async (question: string, generation: string, options: CallOptions = {}): Promise<AnswerQualityGrade> => {
    const structuredLLM = this.model.withStructuredOutput(this.answerOutput, { name: 'answer' })
    const messages = [
      { role: 'system', content: this.answerInstructions },
      { role: 'user', content: `User question:\n${question}\n\nLLM generation: ${generation}` },
    ]
    const grade = await judge('AnswerGrader', this.answerOutput, () => structuredLLM.invoke(messages, options))
    return { addressesQuestion: grade.addressesQuestion }
  }
}
