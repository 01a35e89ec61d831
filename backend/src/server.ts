import { createApp } from './app.js'
import { loadConfig, loadEnvFile } from './config.js'
import { createLogger } from './logger.js'

loadEnvFile()

const config = loadConfig()
const logger = createLogger('server', config.logLevel)
const app = createApp(config, logger)

app.listen(config.port, config.host, () => {
  logger.info({ host: config.host, port: config.port }, `Server running on port ${config.port}`)
})
