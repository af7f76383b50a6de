import express, { type NextFunction, type Request, type Response } from 'express'
import cors from 'cors'
import type { PipelineRuntime } from './runtime.js'
import type { ExtractionQueue } from './services/extractionQueue.js'
import { createDocumentRoutes, sendExtractionError } from './routes/documents.js'

const CORS_DENIED = 'CORS_ORIGIN_DENIED'

export function createApp(runtime: PipelineRuntime, queue: ExtractionQueue | null) {
  const app = express()
  const routes = createDocumentRoutes(runtime, queue)
  const corsOrigins = runtime.config.server.corsOrigins

  function isAllowedCorsOrigin(origin: string) {
    return corsOrigins.includes('*') || corsOrigins.includes(origin)
  }

  app.use(cors({
    origin: (origin, callback) => {
      // Requests without an Origin header (curl, server-to-server) are allowed.
      if (!origin) return callback(null, true)
      if (isAllowedCorsOrigin(origin)) return callback(null, true)
      return callback(new Error(CORS_DENIED))
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    optionsSuccessStatus: 204
  }))
  app.use(express.json({ limit: runtime.config.server.jsonBodyLimit }))

  app.get('/health', (_req, res) => res.json({ ok: true }))
  app.get('/version', (_req, res) => res.json({ ok: true, version: process.env.GIT_SHA || 'local', time: new Date().toISOString() }))

  app.post('/documents', routes.processDocument)
  app.post('/documents/queue', routes.queueDocument)
  app.get('/documents/:id/audit', routes.getDocumentAudit)

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (error instanceof Error && error.message === CORS_DENIED) {
      return sendExtractionError(res, 403, CORS_DENIED)
    }
    return next(error)
  })

  return app
}
