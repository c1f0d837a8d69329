/**
 * Default Configuration Values
 *
 * Applied by loadConfig() when the optional variables are not set.
 */

/** Azure OpenAI GA API version used when AZURE_OPENAI_API_VERSION is unset */
export const DEFAULT_API_VERSION = '2024-10-21';

export const DEFAULT_MAX_RETRIES = 2;

/**
 * .env template, printed by `manuals check --template`
 * and shipped as .env.example.
 */
export const ENV_TEMPLATE = `# Configuración del chat de manuales
# Copia este archivo a .env y completa los valores

# Azure AI Search
AZURE_SEARCH_ENDPOINT=https://<servicio>.search.windows.net
AZURE_SEARCH_API_KEY=
AZURE_SEARCH_INDEX=

# Azure OpenAI
AZURE_OPENAI_ENDPOINT=https://<recurso>.openai.azure.com
AZURE_OPENAI_API_KEY=
AZURE_OPENAI_DEPLOYMENT=
# AZURE_OPENAI_API_VERSION=${DEFAULT_API_VERSION}

# Reintentos ante fallos transitorios de Azure (0-10)
# AZURE_MAX_RETRIES=${DEFAULT_MAX_RETRIES}
`;
