/**
 * Configuration Loader Tests
 *
 * Tests for src/config/loader.ts: presence checks, defaults and
 * schema validation of the Azure settings.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadConfig } from '../loader.js';
import { _clearEnvCache, REQUIRED_ENV_VARS } from '../env.js';
import { DEFAULT_API_VERSION, DEFAULT_MAX_RETRIES } from '../defaults.js';
import { ConfigError } from '../../errors/index.js';

const VALID_ENV = {
  AZURE_SEARCH_ENDPOINT: 'https://manuals.search.windows.net',
  AZURE_SEARCH_API_KEY: 'test-secret',
  AZURE_SEARCH_INDEX: 'manuals-index',
  AZURE_OPENAI_ENDPOINT: 'https://manuals.openai.azure.com',
  AZURE_OPENAI_API_KEY: 'test-secret',
  AZURE_OPENAI_DEPLOYMENT: 'gpt-4o-manuals',
} as const;

function stubValidEnv(): void {
  for (const [key, value] of Object.entries(VALID_ENV)) {
    vi.stubEnv(key, value);
  }
}

function captureConfigError(): ConfigError {
  try {
    loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected loadConfig() to throw');
}

describe('loadConfig', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
    for (const key of REQUIRED_ENV_VARS) {
      vi.stubEnv(key, '');
    }
    vi.stubEnv('AZURE_OPENAI_API_VERSION', '');
    vi.stubEnv('AZURE_MAX_RETRIES', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('valid environment', () => {
    it('builds the typed configuration', () => {
      stubValidEnv();

      expect(loadConfig()).toEqual({
        search: {
          endpoint: 'https://manuals.search.windows.net',
          apiKey: 'test-secret',
          indexName: 'manuals-index',
        },
        openai: {
          endpoint: 'https://manuals.openai.azure.com',
          apiKey: 'test-secret',
          deploymentName: 'gpt-4o-manuals',
          apiVersion: DEFAULT_API_VERSION,
        },
        maxRetries: DEFAULT_MAX_RETRIES,
      });
    });

    it('trims surrounding whitespace', () => {
      stubValidEnv();
      vi.stubEnv('AZURE_SEARCH_INDEX', '  manuals-index \n');

      expect(loadConfig().search.indexName).toBe('manuals-index');
    });

    it('uses AZURE_OPENAI_API_VERSION when set', () => {
      stubValidEnv();
      vi.stubEnv('AZURE_OPENAI_API_VERSION', '2024-06-01');

      expect(loadConfig().openai.apiVersion).toBe('2024-06-01');
    });

    it('uses AZURE_MAX_RETRIES when set', () => {
      stubValidEnv();
      vi.stubEnv('AZURE_MAX_RETRIES', '5');

      expect(loadConfig().maxRetries).toBe(5);
    });
  });

  describe('missing variables', () => {
    it('names the single missing variable', () => {
      stubValidEnv();
      vi.stubEnv('AZURE_OPENAI_DEPLOYMENT', '');

      const error = captureConfigError();

      expect(error.message).toBe(
        'Variable de entorno requerida no encontrada: AZURE_OPENAI_DEPLOYMENT'
      );
      expect(error.hint).toBe('Por favor, crea un archivo .env basado en .env.example');
      expect(error.code).toBe(2);
    });

    it('names every missing variable at once', () => {
      stubValidEnv();
      vi.stubEnv('AZURE_SEARCH_API_KEY', '');
      vi.stubEnv('AZURE_OPENAI_API_KEY', '  ');

      const error = captureConfigError();

      expect(error.message).toBe(
        'Variables de entorno requeridas no encontradas: AZURE_SEARCH_API_KEY, AZURE_OPENAI_API_KEY'
      );
    });

    it('reports all six when nothing is configured', () => {
      const error = captureConfigError();

      expect(error.message).toBe(
        `Variables de entorno requeridas no encontradas: ${REQUIRED_ENV_VARS.join(', ')}`
      );
    });
  });

  describe('invalid values', () => {
    it('rejects an endpoint that is not an http(s) URL', () => {
      stubValidEnv();
      vi.stubEnv('AZURE_OPENAI_ENDPOINT', 'ftp://manuals.openai.azure.com');

      const error = captureConfigError();

      expect(error.message).toBe(
        'Configuración no válida:\n  - openai.endpoint: debe ser una URL HTTP(S)'
      );
      expect(error.hint).toBe('Revisa los valores de tu archivo .env');
    });

    it('rejects an endpoint that is not a URL', () => {
      stubValidEnv();
      vi.stubEnv('AZURE_SEARCH_ENDPOINT', 'manuals-search');

      const error = captureConfigError();

      expect(error.message).toContain('search.endpoint: debe ser una URL válida');
    });

    it('rejects AZURE_MAX_RETRIES above 10', () => {
      stubValidEnv();
      vi.stubEnv('AZURE_MAX_RETRIES', '11');

      const error = captureConfigError();

      expect(error.message).toBe(
        'Configuración no válida:\n  - maxRetries: debe ser un número entero entre 0 y 10'
      );
    });

    it('rejects a non-numeric AZURE_MAX_RETRIES', () => {
      stubValidEnv();
      vi.stubEnv('AZURE_MAX_RETRIES', 'many');

      const error = captureConfigError();

      expect(error.message).toBe(
        'Configuración no válida:\n  - maxRetries: debe ser un número entero entre 0 y 10'
      );
    });
  });
});
