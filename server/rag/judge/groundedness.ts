/**
    Groundedness: generation vs retrieved documents

    Does the generated answer stay within the facts it was given, or does it
    hallucinate beyond them? No reference answer is needed.
 */

import type { BaseChatModel } from '@langchain/core/language_models/chat_models'
import type { CallOptions, GroundednessGrade, GroundednessGrader } from '../../adaptive/contracts'
import { z } from 'zod'
import { judge } from './errors'

export class LlmGroundednessGrader implements GroundednessGrader {
  private model: BaseChatModel
  private groundedOutput = z
    .object({
      grounded: z
        .boolean()
        .describe('True if the answer is grounded in / supported by the set of facts'),
    })
    .describe('Grounded score for the answer from the retrieved documents.')

  private groundedInstructions = `You are a grader assessing whether an LLM generation is grounded in / supported by a set of retrieved facts.
Give a binary score true or false. True means that the answer is grounded in / supported by the set of facts.`

  constructor(model: BaseChatModel) {
    this.model = model
  }

  grade = async (documents: string, generation: string, options: CallOptions = {}): Promise<GroundednessGrade> => {
    const structuredLLM = this.model.withStructuredOutput(this.groundedOutput, { name: 'grounded' })
    const messages = [
      { role: 'system', content: this.groundedInstructions },
      { role: 'user', content: `Set of facts:\n${documents}\n\nLLM generation: ${generation}` },
    ]
    const grade = await judge('GroundednessGrader', this.groundedOutput, () => structuredLLM.invoke(messages, options))
    return { grounded: grade.grounded }
  }
}
