import { OutputParserException } from '@langchain/core/output_parsers'
import consola from 'consola'
import { z, ZodError } from 'zod'

/**
 * The model answered but its output does not fit the judgment's schema.
 */
export class StructuredOutputError extends Error {
  readonly judgment: string

  constructor(judgment: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super(`${judgment} returned output that does not match its schema: ${detail}`, { cause })
    this.name = 'StructuredOutputError'
    this.judgment = judgment
  }
}

function isUnparseable(error: unknown) {
  return error instanceof OutputParserException
    || error instanceof ZodError
    || error instanceof SyntaxError
}

/**
 * Runs one structured-output call and checks the reply against `schema`.
 * Unparseable or mis-shaped output becomes `StructuredOutputError`; any other
 * failure passes through untouched.
 */
export async function judge<S extends z.ZodTypeAny>(
  judgment: string,
  schema: S,
  call: () => Promise<unknown>,
): Promise<z.infer<S>> {
  try {
    const raw = await call()
    return schema.parse(raw)
  }
  catch (error) {
    if (isUnparseable(error)) {
      const message = error instanceof Error ? error.message : String(error)
      consola.error({ tag: judgment, message: `Unparseable structured output: ${message}` })
      throw new StructuredOutputError(judgment, error)
    }
    throw error
  }
}
