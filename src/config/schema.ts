/**
 * Configuration Schema
 *
 * Shape of the validated application configuration, built from the
 * environment by loadConfig(). Zod gives both the TypeScript types and the
 * runtime validation.
 */

import { z } from 'zod';

const HttpUrlSchema = z
  .string()
  .url('debe ser una URL válida')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'debe ser una URL HTTP(S)'
  );

/**
 * Azure AI Search connection
 */
export const SearchConfigSchema = z.object({
  endpoint: HttpUrlSchema.describe('Search service endpoint'),
  apiKey: z.string().min(1).describe('Query or admin key'),
  indexName: z.string().min(1).describe('Index holding the manual passages'),
});

/**
 * Azure OpenAI connection
 */
export const OpenAIConfigSchema = z.object({
  endpoint: HttpUrlSchema.describe('Azure OpenAI resource endpoint'),
  apiKey: z.string().min(1),
  deploymentName: z.string().min(1).describe('Chat model deployment name'),
  apiVersion: z.string().min(1).describe('Azure OpenAI REST API version'),
});

/**
 * Root configuration schema
 */
export const AppConfigSchema = z.object({
  search: SearchConfigSchema,
  openai: OpenAIConfigSchema,
  /** Retries the Azure SDK clients perform on transient failures */
  maxRetries: z
    .number({ invalid_type_error: 'debe ser un número entero entre 0 y 10' })
    .int('debe ser un número entero entre 0 y 10')
    .min(0, 'debe ser un número entero entre 0 y 10')
    .max(10, 'debe ser un número entero entre 0 y 10'),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type OpenAIConfig = z.infer<typeof OpenAIConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
