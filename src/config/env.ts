/**
 * Environment Variable Handler
 *
 * Loads the Azure endpoints and credentials from the environment.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist - production uses real env vars
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema.
 *
 * Nothing is required at load time: presence is checked by loadConfig(),
 * which reports every missing variable at once.
 */
export const EnvSchema = z.object({
  AZURE_SEARCH_ENDPOINT: z.string().optional(),
  AZURE_SEARCH_API_KEY: z.string().optional(),
  AZURE_SEARCH_INDEX: z.string().optional(),
  AZURE_OPENAI_ENDPOINT: z.string().optional(),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_DEPLOYMENT: z.string().optional(),
  AZURE_OPENAI_API_VERSION: z.string().optional(),
  AZURE_MAX_RETRIES: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/** Variables without which the pipeline cannot be built */
export const REQUIRED_ENV_VARS = [
  'AZURE_SEARCH_ENDPOINT',
  'AZURE_SEARCH_API_KEY',
  'AZURE_SEARCH_INDEX',
  'AZURE_OPENAI_ENDPOINT',
  'AZURE_OPENAI_API_KEY',
  'AZURE_OPENAI_DEPLOYMENT',
] as const satisfies ReadonlyArray<keyof EnvVars>;

export type RequiredEnvVar = (typeof REQUIRED_ENV_VARS)[number];

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Access through getEnv(); tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Does NOT validate presence - that happens in loadConfig().
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    AZURE_SEARCH_ENDPOINT: process.env.AZURE_SEARCH_ENDPOINT,
    AZURE_SEARCH_API_KEY: process.env.AZURE_SEARCH_API_KEY,
    AZURE_SEARCH_INDEX: process.env.AZURE_SEARCH_INDEX,
    AZURE_OPENAI_ENDPOINT: process.env.AZURE_OPENAI_ENDPOINT,
    AZURE_OPENAI_API_KEY: process.env.AZURE_OPENAI_API_KEY,
    AZURE_OPENAI_DEPLOYMENT: process.env.AZURE_OPENAI_DEPLOYMENT,
    AZURE_OPENAI_API_VERSION: process.env.AZURE_OPENAI_API_VERSION,
    AZURE_MAX_RETRIES: process.env.AZURE_MAX_RETRIES,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  const env = loadEnv();
  return env[key];
}

/**
 * Check that a variable is set to something other than whitespace,
 * WITHOUT exposing its value.
 */
export function hasEnv(key: keyof EnvVars): boolean {
  return Boolean(getEnv(key)?.trim());
}

/**
 * Names of the required variables that are missing, in declaration order.
 */
export function getMissingEnvVars(): RequiredEnvVar[] {
  return REQUIRED_ENV_VARS.filter((key) => !hasEnv(key));
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when a required variable is missing.
 */
export const SETUP_INSTRUCTIONS = `
Para configurar los servicios de Azure:

1. Copia la plantilla:

   cp .env.example .env

2. Completa los valores de Azure AI Search (portal > Servicio de búsqueda > Claves):

   AZURE_SEARCH_ENDPOINT="https://<servicio>.search.windows.net"
   AZURE_SEARCH_API_KEY="<clave de consulta o de administración>"
   AZURE_SEARCH_INDEX="<nombre del índice>"

3. Completa los valores de Azure OpenAI (portal > Azure OpenAI > Claves y punto de conexión):

   AZURE_OPENAI_ENDPOINT="https://<recurso>.openai.azure.com"
   AZURE_OPENAI_API_KEY="<clave>"
   AZURE_OPENAI_DEPLOYMENT="<nombre del despliegue>"
`.trim();
