import type { Client } from 'langsmith'
import type { RunType, TraceSink, TraceValues } from '../../adaptive/trace'
import { randomUUID } from 'node:crypto'
import consola from 'consola'

export type LangSmithRunClient = Pick<Client, 'createRun' | 'updateRun'>

/**
 * Ships runs to LangSmith in the background. Each update waits for its own
 * create so the server never sees an update for an unknown run.
 */
export class LangSmithTraceSink implements TraceSink {
  private client: LangSmithRunClient
  private projectName: string
  private pending = new Map<string, Promise<void>>()

  constructor(client: LangSmithRunClient, projectName: string) {
    this.client = client
    this.projectName = projectName
  }

  startRun = (runType: RunType, name: string, inputs: TraceValues, parentRunId?: string): string => {
    const runId = randomUUID()
    this.track(runId, this.client.createRun({
      id: runId,
      name,
      run_type: runType,
      inputs,
      parent_run_id: parentRunId,
      project_name: this.projectName,
      start_time: Date.now(),
    }), `create run ${name}`)
    return runId
  }

  endRun = (runId: string | undefined, outputs: TraceValues, error?: string): void => {
    if (!runId)
      return
    const created = this.pending.get(runId) ?? Promise.resolve()
    this.track(runId, created.then(() => this.client.updateRun(runId, {
      outputs,
      error,
      end_time: Date.now(),
    })), `update run ${runId}`)
  }

  /** Resolves once every queued create and update has settled. */
  async flush(): Promise<void> {
    await Promise.all(this.pending.values())
  }

  private track(runId: string, request: Promise<void>, label: string) {
    const settled = request.catch((error: unknown) => {
      consola.warn({ tag: 'langsmith', message: `Failed to ${label}: ${error instanceof Error ? error.message : String(error)}` })
    })
    this.pending.set(runId, settled)
    void settled.then(() => {
      if (this.pending.get(runId) === settled)
        this.pending.delete(runId)
    })
  }
}
