import type { EventHandler } from 'h3'
import { createApp, createRouter } from 'h3'
import adaptiveHandler from './api/rag/adaptive.post'
import indexingHandler from './api/rag/indexing.post'

export interface RagRoutes {
  adaptive: EventHandler
  indexing: EventHandler
}

export function createRagApp(routes: RagRoutes = { adaptive: adaptiveHandler, indexing: indexingHandler }) {
  const app = createApp()
  const router = createRouter()
    .post('/api/rag/adaptive', routes.adaptive)
    .post('/api/rag/indexing', routes.indexing)
  app.use(router)
  return app
}
