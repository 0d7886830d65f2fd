import type { BaseChatModel } from '@langchain/core/language_models/chat_models'
import type { AnswerGenerator, CallOptions } from '../../adaptive/contracts'
import { StringOutputParser } from '@langchain/core/output_parsers'
import { ChatPromptTemplate } from '@langchain/core/prompts'

const generatePrompt = ChatPromptTemplate.fromMessages([
  ['system', `You are an assistant for question-answering tasks. Use the following pieces of retrieved context to answer the question. If you don't know the answer, just say that you don't know. Use three sentences maximum and keep the answer concise.`],
  ['human', `Question: {question}
Context: {context}
Answer:`],
])

export class LlmAnswerGenerator implements AnswerGenerator {
  private model: BaseChatModel

  constructor(model: BaseChatModel) {
    this.model = model
  }

  generate = async (context: string, question: string, options: CallOptions = {}): Promise<string> => {
    // Construct the RAG chain by piping the prompt, model, and output parser
    const ragChain = generatePrompt.pipe(this.model).pipe(new StringOutputParser())
    return ragChain.invoke({ context, question }, options)
  }
}
