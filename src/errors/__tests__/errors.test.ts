/**
 * Tests for error handling system
 *
 * Tests cover:
 * - Error class instantiation and properties
 * - Gateway error kinds and hints
 * - Error formatting (text and JSON)
 * - Exit code extraction
 */

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import {
  CLIError,
  ConfigError,
  ValidationError,
  GatewayError,
  formatError,
  getExitCode,
} from '../index.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('creates error with custom exit code', () => {
      const error = new CLIError('Critical failure', 'Reboot', 99);

      expect(error.hint).toBe('Reboot');
      expect(error.code).toBe(99);
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('ConfigError', () => {
    it('creates error with default hint', () => {
      const error = new ConfigError('Variable de entorno requerida no encontrada: AZURE_SEARCH_INDEX');

      expect(error.hint).toBe('Crea un archivo .env basado en .env.example');
      expect(error.code).toBe(2);
      expect(error.name).toBe('ConfigError');
      expect(error).toBeInstanceOf(CLIError);
    });

    it('creates error with custom hint', () => {
      const error = new ConfigError('Invalid option', 'Custom hint');

      expect(error.hint).toBe('Custom hint');
    });
  });

  describe('ValidationError', () => {
    it('lists issues in the hint', () => {
      const error = new ValidationError('Parámetros de la pregunta no válidos', [
        'topK: top_k debe estar entre 1 y 10',
        'temperature: temperature debe estar entre 0 y 1',
      ]);

      expect(error.issues).toHaveLength(2);
      expect(error.hint).toBe(
        'Problemas:\n  topK: top_k debe estar entre 1 y 10\n  temperature: temperature debe estar entre 0 y 1'
      );
      expect(error.code).toBe(1);
    });

    it('uses a generic hint without issues', () => {
      const error = new ValidationError('Invalid input');

      expect(error.issues).toEqual([]);
      expect(error.hint).toBe('Revisa los valores e inténtalo de nuevo');
    });
  });

  describe('GatewayError', () => {
    it('carries gateway, kind and status', () => {
      const cause = new Error('429 Too Many Requests');
      const error = new GatewayError('generation', 'rate_limit', 'throttled', {
        status: 429,
        cause,
      });

      expect(error.gateway).toBe('generation');
      expect(error.kind).toBe('rate_limit');
      expect(error.status).toBe(429);
      expect(error.cause).toBe(cause);
      expect(error.code).toBe(7);
      expect(error.name).toBe('GatewayError');
    });

    it('uses a back-off hint for rate limits', () => {
      const error = new GatewayError('search', 'rate_limit', 'throttled');

      expect(error.hint).toBe('Espera un momento antes de volver a preguntar, o reduce --top-k');
    });

    it('points to the check command for other failures', () => {
      const error = new GatewayError('search', 'failure', 'Azure AI Search: 401');

      expect(error.kind).toBe('failure');
      expect(error.status).toBeUndefined();
      expect(error.hint).toBe('Ejecuta: manuals check  para revisar la configuración de Azure');
    });
  });
});

describe('formatError', () => {
  describe('text output', () => {
    it('formats CLIError with hint', () => {
      const error = new CLIError('Something failed', 'Try again');

      expect(formatError(error)).toBe('Error: Something failed\nSugerencia: Try again');
    });

    it('formats CLIError without hint', () => {
      expect(formatError(new CLIError('Bare'))).toBe('Error: Bare');
    });

    it('adds the stack trace in verbose mode', () => {
      const error = new CLIError('Something failed');

      const output = formatError(error, { verbose: true });

      expect(output).toContain('Traza de la pila:');
    });

    it('suggests --verbose for plain errors', () => {
      const output = formatError(new Error('boom'));

      expect(output).toBe('Error: boom\nSugerencia: Ejecuta con --verbose para ver más detalles');
    });

    it('formats non-Error values', () => {
      expect(formatError('plain string')).toBe('Error: plain string');
    });
  });

  describe('JSON output', () => {
    it('formats CLIError as JSON', () => {
      const error = new ConfigError('Missing variable');

      const parsed = JSON.parse(formatError(error, { json: true }));

      expect(parsed).toEqual({
        error: 'Missing variable',
        code: 2,
        hint: 'Crea un archivo .env basado en .env.example',
      });
    });

    it('includes gateway and kind for GatewayError', () => {
      const error = new GatewayError('search', 'failure', 'Azure AI Search: timeout');

      const parsed = JSON.parse(formatError(error, { json: true }));

      expect(parsed.gateway).toBe('search');
      expect(parsed.kind).toBe('failure');
      expect(parsed.code).toBe(7);
    });

    it('formats plain errors with code 1', () => {
      const parsed = JSON.parse(formatError(new Error('boom'), { json: true }));

      expect(parsed).toEqual({ error: 'boom', code: 1 });
    });

    it('formats non-Error values', () => {
      const parsed = JSON.parse(formatError(42, { json: true }));

      expect(parsed).toEqual({ error: '42', code: 1 });
    });
  });
});

describe('getExitCode', () => {
  it('returns the code of CLIError subclasses', () => {
    expect(getExitCode(new ConfigError('x'))).toBe(2);
    expect(getExitCode(new ValidationError('x'))).toBe(1);
    expect(getExitCode(new GatewayError('search', 'failure', 'x'))).toBe(7);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new Error('x'))).toBe(1);
    expect(getExitCode('x')).toBe(1);
  });
});
