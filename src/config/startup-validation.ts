/**
 * Startup Configuration Validation
 *
 * Checks the Azure variables before a command that needs them runs, so a
 * missing key is reported up front instead of as a failed request.
 *
 * Commands that don't talk to Azure (check, --help) still work without them.
 */

import chalk from 'chalk';
import { hasEnv, getEnv, SETUP_INSTRUCTIONS, type EnvVars } from './env.js';

// ============================================================================
// Types
// ============================================================================

export interface StartupValidationResult {
  /** Whether all required variables are present */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Missing or unusable variables */
  errors: string[];
  /** Setup instructions, one per distinct problem */
  hints: string[];
}

export interface StartupValidationOptions {
  /** Skip the Azure AI Search variables */
  skipSearch?: boolean;
  /** Skip the Azure OpenAI variables */
  skipGeneration?: boolean;
}

const SEARCH_VARS = [
  'AZURE_SEARCH_ENDPOINT',
  'AZURE_SEARCH_API_KEY',
  'AZURE_SEARCH_INDEX',
] as const satisfies ReadonlyArray<keyof EnvVars>;

const GENERATION_VARS = [
  'AZURE_OPENAI_ENDPOINT',
  'AZURE_OPENAI_API_KEY',
  'AZURE_OPENAI_DEPLOYMENT',
] as const satisfies ReadonlyArray<keyof EnvVars>;

const ENDPOINT_VARS = [
  'AZURE_SEARCH_ENDPOINT',
  'AZURE_OPENAI_ENDPOINT',
] as const satisfies ReadonlyArray<keyof EnvVars>;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration at CLI startup.
 *
 * Returns errors/warnings rather than throwing; the caller decides whether
 * to stop.
 *
 * @example
 * const result = validateStartupConfig();
 * if (!result.valid) printStartupValidation(result);
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipSearch = false, skipGeneration = false } = options;
  const warnings: string[] = [];
  const errors: string[] = [];

  const required: Array<keyof EnvVars> = [
    ...(skipSearch ? [] : SEARCH_VARS),
    ...(skipGeneration ? [] : GENERATION_VARS),
  ];

  for (const key of required) {
    if (!hasEnv(key)) {
      errors.push(`${key} no está definida`);
    }
  }

  for (const key of ENDPOINT_VARS) {
    const value = getEnv(key)?.trim();
    if (value && !value.startsWith('https://')) {
      warnings.push(`${key} no usa https: ${value}`);
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints: errors.length > 0 ? [SETUP_INSTRUCTIONS] : [],
  };
}

/**
 * Print startup validation warnings/errors to the console.
 *
 * @param verbose - Whether to show warnings too (default: only errors)
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(hint));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that query the index and the model.
 */
export const COMMANDS_REQUIRING_AZURE = ['ask', 'chat'];

export function getValidationOptionsForCommand(
  command: string
): StartupValidationOptions {
  const needsAzure = COMMANDS_REQUIRING_AZURE.includes(command);
  return {
    skipSearch: !needsAzure,
    skipGeneration: !needsAzure,
  };
}
