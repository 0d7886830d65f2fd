import { createServer } from 'node:http'
import process from 'node:process'
import consola from 'consola'
import { toNodeListener } from 'h3'
import { createRagApp } from './app'
import { keepLangChainTracerOff, useRuntimeConfig, useTraceSink } from './util/adaptiveRag'

const config = useRuntimeConfig()
keepLangChainTracerOff()
const server = createServer(toNodeListener(createRagApp()))

server.listen(config.port, () => {
  consola.success(`Adaptive RAG listening on http://localhost:${config.port}`)
})

async function shutdown(signal: string) {
  consola.info({ tag: 'server', message: `Received ${signal}, shutting down` })
  server.close()
  await useTraceSink().flush()
  process.exit(0)
}

for (const signal of ['SIGINT', 'SIGTERM']) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      consola.error({ tag: 'server', message: `Shutdown failed: ${error instanceof Error ? error.message : String(error)}` })
      process.exit(1)
    })
  })
}
