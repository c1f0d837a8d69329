/**
 * Configuration Loader
 *
 * Handles the config lifecycle:
 * 1. Read the (cached) environment
 * 2. Report every missing required variable at once
 * 3. Apply defaults for the optional ones
 * 4. Validate with the Zod schema and return a typed AppConfig
 *
 * A ConfigError here is fatal at startup; the pipeline is never built
 * from a partial configuration.
 */

import { AppConfigSchema, type AppConfig } from './schema.js';
import { DEFAULT_API_VERSION, DEFAULT_MAX_RETRIES } from './defaults.js';
import { loadEnv, getMissingEnvVars } from './env.js';
import { ConfigError } from '../errors/index.js';

/**
 * Parse AZURE_MAX_RETRIES, leaving invalid input for the schema to reject.
 */
function parseRetries(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_MAX_RETRIES;
  }
  return Number(value);
}

/**
 * Load and validate the application configuration.
 *
 * @throws ConfigError listing missing variables, or the invalid fields
 */
export function loadConfig(): AppConfig {
  const missing = getMissingEnvVars();

  if (missing.length > 0) {
    const noun = missing.length === 1 ? 'Variable de entorno requerida' : 'Variables de entorno requeridas';
    throw new ConfigError(
      `${noun} no encontrada${missing.length === 1 ? '' : 's'}: ${missing.join(', ')}`,
      'Por favor, crea un archivo .env basado en .env.example'
    );
  }

  const env = loadEnv();

  const result = AppConfigSchema.safeParse({
    search: {
      endpoint: env.AZURE_SEARCH_ENDPOINT?.trim(),
      apiKey: env.AZURE_SEARCH_API_KEY?.trim(),
      indexName: env.AZURE_SEARCH_INDEX?.trim(),
    },
    openai: {
      endpoint: env.AZURE_OPENAI_ENDPOINT?.trim(),
      apiKey: env.AZURE_OPENAI_API_KEY?.trim(),
      deploymentName: env.AZURE_OPENAI_DEPLOYMENT?.trim(),
      apiVersion: env.AZURE_OPENAI_API_VERSION?.trim() || DEFAULT_API_VERSION,
    },
    maxRetries: parseRetries(env.AZURE_MAX_RETRIES),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Configuración no válida:\n${issues}`,
      'Revisa los valores de tu archivo .env'
    );
  }

  return result.data;
}
