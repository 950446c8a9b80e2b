import {swaggerUI} from '@hono/swagger-ui'
import {OpenAPIHono} from '@hono/zod-openapi'
import {openApiDocument} from '@radio/api-contracts'
import {formatZodError} from '@radio/shared-types'
import {cors} from 'hono/cors'
import {secureHeaders} from 'hono/secure-headers'

import type {AppDependencies} from './container'
import {toErrorResponse} from './errors'
import {registerAuthRoutes} from './routes/auth-openapi'
import {registerRadioRoutes} from './routes/radio-openapi'
import {getLogger, runWithLogger} from './utils/LoggerContext'
import {ServiceLogger} from './utils/ServiceLogger'

export type {AppDependencies} from './container'

export function createApp(deps: AppDependencies) {
  const app = new OpenAPIHono({
    defaultHook: (result, c) => {
      if (!result.success) {
        return c.json({code: 'invalid_request' as const, error: formatZodError(result.error)}, 400)
      }
    },
  })

  // Per-request logger, reachable through getLogger() in every service
  app.use('*', async (c, next) => {
    const logger = new ServiceLogger(`${c.req.method} ${c.req.path}`)
    const startedAt = Date.now()
    await runWithLogger(logger, async () => {
      await next()
    })
    logger.info(`${c.res.status} in ${Date.now() - startedAt}ms`)
  })

  // Security headers middleware
  app.use(
    '*',
    secureHeaders({
      permissionsPolicy: {
        camera: [],
        geolocation: [],
        microphone: [],
      },
      referrerPolicy: 'strict-origin-when-cross-origin',
      xContentTypeOptions: 'nosniff',
      xFrameOptions: 'DENY',
      xXssProtection: '1; mode=block',
    }),
  )

  // CORS only for a configured browser frontend
  const {frontendUrl} = deps.config
  if (frontendUrl) {
    app.use(
      '*',
      cors({
        allowHeaders: ['Content-Type', 'X-Radio-Session'],
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        credentials: true,
        origin: frontendUrl,
      }),
    )
  }

  // Health check
  app.get('/health', c => c.json({status: 'healthy'}))

  registerAuthRoutes(app, deps)
  registerRadioRoutes(app, deps)

  app.doc('/api/openapi.json', openApiDocument)
  app.get('/api/docs', swaggerUI({url: '/api/openapi.json'}))

  app.onError((error, c) => {
    const {body, status} = toErrorResponse(error)
    if (status >= 500) {
      getLogger()?.error('Request failed', error, {code: body.code})
    } else {
      getLogger()?.warn('Request rejected', {code: body.code, error: body.error})
    }
    return c.json(body, status)
  })

  return app
}
