import {serve} from '@hono/node-server'

import {loadConfig, requireAnthropicKey} from './config'
import {createApp} from './index'
import {createAIService} from './lib/ai-service'
import {SpotifyCatalogClient} from './services/SpotifyCatalogClient'
import {AISuggestionGenerator} from './services/SuggestionGenerator'
import {ServiceLogger} from './utils/ServiceLogger'

const config = loadConfig()
const logger = new ServiceLogger('Server', {minLevel: config.logLevel})
const aiService = createAIService({apiKey: requireAnthropicKey(config), defaultModel: config.anthropic.model})

const app = createApp({
  config,
  createCatalog: accessToken => new SpotifyCatalogClient(accessToken),
  createGenerator: () => new AISuggestionGenerator(aiService),
})

serve({fetch: app.fetch, port: config.port}, info => {
  logger.info(`Listening on http://localhost:${info.port}`)
})
