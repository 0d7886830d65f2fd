import { FakeListChatModel } from '@langchain/core/utils/testing'
import { describe, expect, it } from 'vitest'
import { LlmAnswerGenerator } from '../answerGenerator'

describe('LlmAnswerGenerator', () => {
  it('returns the model text as the answer', async () => {
    const generator = new LlmAnswerGenerator(new FakeListChatModel({
      responses: ['Agents decompose tasks and call tools.'],
    }))

    const answer = await generator.generate('Agents use planning and tools.', 'What do agents do?')

    expect(answer).toBe('Agents decompose tasks and call tools.')
  })

  it('answers from an empty context', async () => {
    const generator = new LlmAnswerGenerator(new FakeListChatModel({ responses: ['I don\'t know.'] }))

    await expect(generator.generate('', 'What is the capital of Atlantis?')).resolves.toBe('I don\'t know.')
  })
})
