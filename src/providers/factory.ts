/**
 * Gateway Factory
 *
 * Builds both gateways from a validated AppConfig. Called once at process
 * start; the clients are long-lived and safe to share across requests.
 */

import type { AppConfig } from '../config/schema.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { AzureOpenAIGateway } from './azure-openai.js';
import { AzureSearchGateway } from './azure-search.js';
import type { GenerationGateway, SearchGateway } from './types.js';

export interface Gateways {
  search: SearchGateway;
  generation: GenerationGateway;
}

export interface GatewayFactoryOptions {
  logger?: Logger;
  /** Cap on completion tokens for the generation gateway */
  maxTokens?: number;
}

export function createGateways(
  config: AppConfig,
  options: GatewayFactoryOptions = {}
): Gateways {
  const logger = options.logger ?? consoleLogger;

  return {
    search: new AzureSearchGateway(config.search, {
      maxRetries: config.maxRetries,
      logger,
    }),
    generation: new AzureOpenAIGateway(config.openai, {
      maxRetries: config.maxRetries,
      maxTokens: options.maxTokens,
      logger,
    }),
  };
}
