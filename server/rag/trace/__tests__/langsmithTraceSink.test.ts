import type { LangSmithRunClient } from '../langsmithTraceSink'
import { describe, expect, it, vi } from 'vitest'
import { LangSmithTraceSink } from '../langsmithTraceSink'

function makeClient() {
  return {
    createRun: vi.fn<LangSmithRunClient['createRun']>(async () => {}),
    updateRun: vi.fn<LangSmithRunClient['updateRun']>(async () => {}),
  }
}

describe('LangSmithTraceSink', () => {
  it('creates a run under the project and parent', async () => {
    const client = makeClient()
    const sink = new LangSmithTraceSink(client, 'adaptive-rag-test')

    const runId = sink.startRun('retriever', 'RetrieveDocuments', { question: 'q' }, 'parent-1')
    await sink.flush()

    expect(client.createRun).toHaveBeenCalledWith(expect.objectContaining({
      id: runId,
      name: 'RetrieveDocuments',
      run_type: 'retriever',
      inputs: { question: 'q' },
      parent_run_id: 'parent-1',
      project_name: 'adaptive-rag-test',
    }))
  })

  it('sends the update only after the create has finished', async () => {
    const client = makeClient()
    let finishCreate = () => {}
    client.createRun.mockImplementation(() => new Promise<void>((resolve) => {
      finishCreate = resolve
    }))
    const sink = new LangSmithTraceSink(client, 'adaptive-rag-test')

    const runId = sink.startRun('chain', 'RouteQuestion', {})
    sink.endRun(runId, { datasource: 'vectorstore' })
    await Promise.resolve()
    expect(client.updateRun).not.toHaveBeenCalled()

    finishCreate()
    await sink.flush()

    expect(client.updateRun).toHaveBeenCalledWith(runId, expect.objectContaining({
      outputs: { datasource: 'vectorstore' },
      error: undefined,
    }))
  })

  it('keeps going when the transport fails', async () => {
    const client = makeClient()
    client.createRun.mockRejectedValue(new Error('503 Service Unavailable'))
    client.updateRun.mockRejectedValue(new Error('503 Service Unavailable'))
    const sink = new LangSmithTraceSink(client, 'adaptive-rag-test')

    const runId = sink.startRun('tool', 'WebSearch', {})
    sink.endRun(runId, {}, 'timeout')

    await expect(sink.flush()).resolves.toBeUndefined()
    expect(client.updateRun).toHaveBeenCalledTimes(1)
  })

  it('ignores an end without a run id', async () => {
    const client = makeClient()
    const sink = new LangSmithTraceSink(client, 'adaptive-rag-test')

    sink.endRun(undefined, {})
    await sink.flush()

    expect(client.updateRun).not.toHaveBeenCalled()
  })
})
