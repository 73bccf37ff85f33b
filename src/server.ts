import { createYoga } from 'graphql-yoga'
import type { Plugin } from 'graphql-yoga'
import { createServer } from 'node:http'
import type { IncomingMessage, Server, ServerResponse } from 'node:http'
import { makeExecutableSchema } from '@graphql-tools/schema'
import depthLimit from 'graphql-depth-limit'
import { createComplexityLimitRule } from 'graphql-validation-complexity'
import helmet from 'helmet'
import { typeDefs } from './schema/typeDefs.js'
import { resolvers } from './resolvers/index.js'
import { StalledBootstrapWatchdog } from './jobs/bootstrapWatchdog.js'
import type { ProvisionerServices } from './services/bootstrap/index.js'
import { apiLogger, toError } from './utils/logger.js'

// Security limits for GraphQL queries
const MAX_DEPTH = 8
const MAX_COMPLEXITY = 500

const useValidationRules = (): Plugin => {
  return {
    onValidate({ addValidationRule }) {
      addValidationRule(depthLimit(MAX_DEPTH))
      addValidationRule(
        createComplexityLimitRule(MAX_COMPLEXITY, {
          scalarCost: 1,
          objectCost: 2,
          listFactor: 10,
        })
      )
    },
  }
}

export interface ProvisionerServer {
  server: Server
  watchdog: StalledBootstrapWatchdog
  close(): Promise<void>
}

export function createProvisionerServer(services: ProvisionerServices): ProvisionerServer {
  const { config } = services

  const schema = makeExecutableSchema({
    typeDefs,
    resolvers,
  })

  const yoga = createYoga({
    schema,
    context: () => ({ services }),
    cors: {
      origin: config.appUrl || '*',
      credentials: true,
    },
    graphqlEndpoint: '/graphql',
    landingPage: process.env.NODE_ENV !== 'production',
    maskedErrors: process.env.NODE_ENV === 'production',
    plugins: [useValidationRules()],
  })

  const helmetMiddleware = helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"], // GraphiQL needs inline styles
        scriptSrc: ["'self'", "'unsafe-inline'"], // GraphiQL needs inline scripts
        imgSrc: ["'self'", 'data:', 'https:'],
        connectSrc: ["'self'", config.appUrl || '*'],
      },
    },
    crossOriginEmbedderPolicy: false,
  })

  async function handleHealth(res: ServerResponse) {
    let body: { status: string; bootstrap: string }
    let statusCode = 200
    try {
      const record = await services.store.read()
      body = { status: 'ok', bootstrap: record.state }
    } catch (error) {
      apiLogger.warn('Health check could not read status', { operation: 'healthz' }, toError(error))
      body = { status: 'degraded', bootstrap: 'UNKNOWN' }
      statusCode = 503
    }
    res.writeHead(statusCode, { 'content-type': 'application/json' })
    res.end(JSON.stringify(body))
  }

  async function requestHandler(req: IncomingMessage, res: ServerResponse) {
    const url = new URL(req.url || '/', `http://${req.headers.host}`)

    await new Promise<void>((resolve, reject) => {
      helmetMiddleware(req, res, (err?: unknown) => (err ? reject(toError(err)) : resolve()))
    })

    if (url.pathname === '/healthz') {
      await handleHealth(res)
      return
    }

    return yoga(req, res)
  }

  const server = createServer((req, res) => {
    requestHandler(req, res).catch(error => {
      apiLogger.error('Request failed', { operation: 'http', path: req.url }, toError(error))
      if (!res.headersSent) {
        res.writeHead(500, { 'content-type': 'application/json' })
      }
      res.end(JSON.stringify({ error: 'Internal error' }))
    })
  })

  const watchdog = new StalledBootstrapWatchdog(services.store, {
    staleAfterMs: config.staleAfterMs,
    schedule: config.watchdogCron,
  })

  return {
    server,
    watchdog,
    close: () =>
      new Promise<void>((resolve, reject) => {
        watchdog.stop()
        server.close(err => (err ? reject(err) : resolve()))
      }),
  }
}

export function startProvisionerServer(services: ProvisionerServices): ProvisionerServer {
  const instance = createProvisionerServer(services)
  const { port } = services.config

  instance.watchdog.start()
  instance.server.listen(port, () => {
    apiLogger.info(`GraphQL server running at http://localhost:${port}/graphql`)
  })

  const shutdown = (signal: string) => {
    apiLogger.info(`${signal} signal received: closing HTTP server`)
    instance
      .close()
      .then(() => process.exit(0))
      .catch(error => {
        apiLogger.error('Shutdown failed', { operation: 'shutdown' }, toError(error))
        process.exit(1)
      })
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))

  return instance
}
