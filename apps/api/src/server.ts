/**
 * Node.js entry point
 */

import {serve} from '@hono/node-server'
import {config as loadDotenv} from 'dotenv'

import {type AppConfig, ConfigError, loadConfig} from './config'
import {createDependencies} from './container'
import {createApp} from './index'
import {ServiceLogger} from './utils/ServiceLogger'

loadDotenv()

const logger = new ServiceLogger('server')

function start(): void {
  let config: AppConfig
  try {
    config = loadConfig(process.env)
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Refusing to start', error)
      process.exit(1)
    }
    throw error
  }

  ServiceLogger.setLevel(config.logLevel)
  const deps = createDependencies(config)
  if (config.llm.provider === 'openai' ? !config.llm.openaiApiKey : !config.llm.anthropicApiKey) {
    logger.warn(`No ${config.llm.provider} API key set; /trigger-openai will fail`)
  }

  const app = createApp(deps)
  const server = serve({fetch: app.fetch, hostname: config.host, port: config.port}, info => {
    logger.info(`Listening on http://${info.address}:${info.port}`)
  })

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, closing server`)
    server.close(error => {
      if (error) {
        logger.error('Error while closing server', error)
        process.exit(1)
      }
      process.exit(0)
    })
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

start()
