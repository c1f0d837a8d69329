/**
 * Azure OpenAI Generation Gateway
 *
 * Sends the system prompt plus a user message that embeds the numbered
 * context fragments and the question to a chat deployment.
 *
 * SECURITY: the API key is passed to the client only and never logged.
 */

import { AzureOpenAI } from 'openai';
import type { OpenAIConfig } from '../config/schema.js';
import { GatewayError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { toGatewayError } from './error-classification.js';
import type { GenerationGateway } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AzureOpenAIGatewayOptions {
  /** Retries performed by the openai client (429 and 5xx included) */
  maxRetries?: number;
  /** Cap on completion tokens; the deployment default applies when unset */
  maxTokens?: number;
  logger?: Logger;
}

// ============================================================================
// PROMPT ASSEMBLY
// ============================================================================

/**
 * Build the user turn: numbered fragments, then the question.
 *
 * @example
 * buildUserMessage('¿Cómo calibro el sensor?', ['Paso 1...', 'Paso 2...'])
 * // "Contexto de los manuales:\n\n[Fragmento 1]\nPaso 1...\n\n[Fragmento 2]\nPaso 2...\n\nPregunta: ¿Cómo calibro el sensor?"
 */
export function buildUserMessage(
  question: string,
  contextChunks: readonly string[]
): string {
  const fragments = contextChunks
    .map((chunk, index) => `[Fragmento ${index + 1}]\n${chunk}`)
    .join('\n\n');

  return `Contexto de los manuales:\n\n${fragments}\n\nPregunta: ${question}`;
}

// ============================================================================
// GATEWAY
// ============================================================================

export class AzureOpenAIGateway implements GenerationGateway {
  readonly name = 'azure-openai';

  private readonly client: AzureOpenAI;
  private readonly deployment: string;
  private readonly maxTokens?: number;
  private readonly logger: Logger;

  constructor(config: OpenAIConfig, options: AzureOpenAIGatewayOptions = {}) {
    this.client = new AzureOpenAI({
      endpoint: config.endpoint,
      apiKey: config.apiKey,
      apiVersion: config.apiVersion,
      deployment: config.deploymentName,
      maxRetries: options.maxRetries,
    });
    this.deployment = config.deploymentName;
    this.maxTokens = options.maxTokens;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * @throws GatewayError kind 'rate_limit' when throttled, 'failure' otherwise
   */
  async generate(
    systemPrompt: string,
    userMessage: string,
    contextChunks: readonly string[],
    temperature: number
  ): Promise<string> {
    let content: string | null | undefined;

    try {
      const completion = await this.client.chat.completions.create({
        model: this.deployment,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: buildUserMessage(userMessage, contextChunks) },
        ],
        temperature,
        max_tokens: this.maxTokens,
      });

      content = completion.choices[0]?.message.content;

      if (completion.usage) {
        this.logger.debug?.(
          `Tokens: ${completion.usage.prompt_tokens} de entrada + ${completion.usage.completion_tokens} de salida`
        );
      }
    } catch (error) {
      throw toGatewayError('generation', error, 'Azure OpenAI');
    }

    if (!content) {
      throw new GatewayError(
        'generation',
        'failure',
        'Azure OpenAI devolvió una respuesta vacía'
      );
    }

    return content;
  }
}
