import 'dotenv/config'
import { loadConfig } from './config.js'
import { createLogger } from './logger.js'
import { startServer } from './server.js'

const logger = createLogger('server')

try {
  await startServer(loadConfig())
} catch (err) {
  if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
    logger.error({ evt: 'server.error', error: 'EADDRINUSE' }, err.message)
  } else {
    logger.error(err)
  }
  process.exitCode = 1
}
