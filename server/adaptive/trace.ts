import consola from 'consola'

export type RunType = 'chain' | 'llm' | 'retriever' | 'tool'

export type TraceValues = Record<string, unknown>

/**
 * Observability side channel. Both calls are fire-and-forget: a sink must
 * return immediately and never make the workflow wait on its transport.
 */
export interface TraceSink {
  startRun: (runType: RunType, name: string, inputs: TraceValues, parentRunId?: string) => string | undefined
  endRun: (runId: string | undefined, outputs: TraceValues, error?: string) => void
}

export const noopTraceSink: TraceSink = {
  startRun: () => undefined,
  endRun: () => {},
}

export type TraceEvent =
  | { kind: 'start', runId: string, runType: RunType, name: string, inputs: TraceValues, parentRunId?: string }
  | { kind: 'end', runId: string, outputs: TraceValues, error?: string }

/**
 * Keeps every event in memory. Run ids are sequential so two identical
 * workflows produce identical traces.
 */
export class MemoryTraceSink implements TraceSink {
  readonly events: TraceEvent[] = []
  private counter = 0

  startRun(runType: RunType, name: string, inputs: TraceValues, parentRunId?: string): string {
    this.counter += 1
    const runId = `run-${this.counter}`
    this.events.push({ kind: 'start', runId, runType, name, inputs, parentRunId })
    return runId
  }

  endRun(runId: string | undefined, outputs: TraceValues, error?: string): void {
    if (!runId)
      return
    this.events.push({ kind: 'end', runId, outputs, error })
  }

  /** Names of the runs started so far, in order. */
  runNames(): string[] {
    return this.events.flatMap(event => event.kind === 'start' ? [event.name] : [])
  }

  clear(): void {
    this.events.length = 0
    this.counter = 0
  }
}

export interface TraceStep<T> {
  runType: RunType
  name: string
  inputs: TraceValues
  parentRunId?: string
  outputs: (result: T) => TraceValues
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function safeStartRun<T>(sink: TraceSink, step: TraceStep<T>): string | undefined {
  try {
    return sink.startRun(step.runType, step.name, step.inputs, step.parentRunId)
  }
  catch (error) {
    consola.warn({ tag: 'trace', message: `Failed to start run ${step.name}: ${errorMessage(error)}` })
    return undefined
  }
}

function safeEndRun(sink: TraceSink, runId: string | undefined, outputs: () => TraceValues, error?: string) {
  try {
    sink.endRun(runId, outputs(), error)
  }
  catch (sinkError) {
    consola.warn({ tag: 'trace', message: `Failed to end run ${runId}: ${errorMessage(sinkError)}` })
  }
}

/**
 * Runs `work` inside a trace run and hands it the run id so nested steps can
 * attach to it. Sink failures are logged and dropped; failures of `work` end
 * the run with the error and are rethrown.
 */
export async function traceStep<T>(
  sink: TraceSink,
  step: TraceStep<T>,
  work: (runId: string | undefined) => Promise<T>,
): Promise<T> {
  const runId = safeStartRun(sink, step)
  try {
    const result = await work(runId)
    safeEndRun(sink, runId, () => step.outputs(result))
    return result
  }
  catch (error) {
    safeEndRun(sink, runId, () => ({}), errorMessage(error))
    throw error
  }
}
